/**
 * Custom emote
 *
 * Concurrency notes:
 * - `name`, `managed`, `animated` and `user` are plain fields written by the
 *   entity builder as update events arrive. No locking; the last write wins.
 * - The role set is only exposed as a copy (`roles`), except through
 *   `roleSet`, which the entity builder uses to apply role updates.
 * - The guild is never held directly; every access resolves it through the
 *   guild cache, so an evicted guild reads as undefined.
 * - The manager is built once, on first access, and shared afterwards.
 *
 * Equality is by id only: a rename observed by one holder but not yet by
 * another must not make the two compare unequal.
 *
 * @module entities/emote
 */

import { SnowflakeReference } from '../cache/snowflake-reference'
import {
  IllegalStateError,
  InsufficientPermissionError,
  UnsupportedOperationError,
} from '../errors'
import { EmoteManagerImpl } from '../managers/emote-manager'
import { deleteResponseHandler } from '../requests/delete-handler'
import { ErrorResponse } from '../requests/error-response'
import { RestAction } from '../requests/rest-action'
import { Route } from '../requests/route'
import { Err, Ok, unwrap, type Result } from '../types/result'
import { Lazy } from '../utils/lazy'
import { snowflakeHash, snowflakeTimestamp, type Snowflake } from '../utils/snowflake'
import type { Client } from '../client'
import type { GuildImpl } from './guild'
import { Permission } from './permission'
import type { RoleImpl } from './role'
import type { Emote, EmoteModifyError, Member } from './types'
import type { UserImpl } from './user'

export const EMOTE_CDN_URL = 'https://cdn.discordapp.com/emojis/'

interface EmoteInit {
  id: Snowflake
  client: Client
  guildRef: SnowflakeReference<GuildImpl> | undefined
  roles: Set<RoleImpl> | undefined
  fake: boolean
}

export class EmoteImpl implements Emote {
  readonly id: Snowflake
  readonly client: Client
  readonly isFake: boolean
  private readonly guildRef: SnowflakeReference<GuildImpl> | undefined
  private readonly allowedRoles: Set<RoleImpl> | undefined
  private readonly lazyManager: Lazy<EmoteManagerImpl>

  private _name = ''
  private managed = false
  private animated = false
  private _user: UserImpl | undefined

  private constructor(init: EmoteInit) {
    this.id = init.id
    this.client = init.client
    this.guildRef = init.guildRef
    this.allowedRoles = init.roles
    this.isFake = init.fake
    this.lazyManager = new Lazy(() => new EmoteManagerImpl(this))
  }

  /**
   * Emote belonging to a cached guild
   */
  static create(id: Snowflake, guild: GuildImpl): EmoteImpl {
    const client = guild.client
    return new EmoteImpl({
      id,
      client,
      guildRef: SnowflakeReference.of(guild, (guildId) => client.getGuildById(guildId)),
      roles: new Set(),
      fake: false,
    })
  }

  /**
   * Emote known only by id, with no guild and no roles
   */
  static detached(id: Snowflake, client: Client): EmoteImpl {
    return new EmoteImpl({ id, client, guildRef: undefined, roles: undefined, fake: true })
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  get timeCreated(): Date {
    return new Date(snowflakeTimestamp(this.id))
  }

  get guild(): GuildImpl | undefined {
    return this.guildRef?.resolve()
  }

  get roles(): RoleImpl[] {
    if (!this.allowedRoles) {
      throw new IllegalStateError(
        'Unable to return roles because this emote is fake. (We do not know the origin Guild of this emote)',
        { emoteId: this.id }
      )
    }
    return Array.from(this.allowedRoles)
  }

  get canProvideRoles(): boolean {
    return this.allowedRoles !== undefined
  }

  /**
   * The live role set, for the entity builder. Undefined for fake emotes.
   */
  get roleSet(): Set<RoleImpl> | undefined {
    return this.allowedRoles
  }

  get name(): string {
    return this._name
  }

  get isManaged(): boolean {
    return this.managed
  }

  get isAnimated(): boolean {
    return this.animated
  }

  get user(): UserImpl {
    if (!this._user) {
      throw new IllegalStateError('This emote does not have a user', { emoteId: this.id })
    }
    return this._user
  }

  get hasUser(): boolean {
    return this._user !== undefined
  }

  get manager(): EmoteManagerImpl {
    return this.lazyManager.get()
  }

  get asMention(): string {
    return `<${this.animated ? 'a' : ''}:${this._name}:${this.id}>`
  }

  get imageUrl(): string {
    return `${EMOTE_CDN_URL}${this.id}.${this.animated ? 'gif' : 'png'}`
  }

  canInteract(member: Member): boolean {
    if (this.isFake) {
      return false
    }
    const guild = this.guild
    return guild !== undefined
      && member.guild?.id === guild.id
      && member.hasPermission(Permission.MANAGE_EMOTES)
  }

  // ===========================================================================
  // Remote operations
  // ===========================================================================

  /**
   * Local checks shared by delete and modify. Yields the resolved guild so
   * callers do not resolve it a second time.
   */
  checkModifiable(action: 'delete' | 'modify'): Result<GuildImpl, EmoteModifyError> {
    const guild = this.guild
    if (!guild) {
      return Err(new IllegalStateError(
        `The emote you are trying to ${action} is not an actual emote we have access to (it is fake)!`,
        { emoteId: this.id }
      ))
    }
    if (this.managed) {
      return Err(new UnsupportedOperationError(`You cannot ${action} a managed emote!`, { emoteId: this.id }))
    }
    const self = guild.selfMemberIfPresent
    if (!self) {
      return Err(new IllegalStateError(`Guild ${guild.id} has no self member yet`, { guildId: guild.id, emoteId: this.id }))
    }
    if (!self.hasPermission(Permission.MANAGE_EMOTES)) {
      return Err(new InsufficientPermissionError(guild.id, Permission.MANAGE_EMOTES))
    }
    return Ok(guild)
  }

  tryDelete(): Result<RestAction<boolean>, EmoteModifyError> {
    const checked = this.checkModifiable('delete')
    if (!checked.ok) {
      return checked
    }
    const route = Route.Emotes.DELETE_EMOTE.compile(checked.value.id, this.id)
    return Ok(new RestAction(this.client, route, deleteResponseHandler(ErrorResponse.UNKNOWN_EMOJI)))
  }

  delete(): RestAction<boolean> {
    return unwrap(this.tryDelete())
  }

  // ===========================================================================
  // Setters (entity builder)
  // ===========================================================================

  setName(name: string): this {
    this._name = name
    return this
  }

  setAnimated(animated: boolean): this {
    this.animated = animated
    return this
  }

  setManaged(managed: boolean): this {
    this.managed = managed
    return this
  }

  setUser(user: UserImpl | undefined): this {
    this._user = user
    return this
  }

  // ===========================================================================
  // Object overrides
  // ===========================================================================

  equals(other: unknown): boolean {
    if (other === this) {
      return true
    }
    return other instanceof EmoteImpl && other.id === this.id
  }

  hashCode(): number {
    return snowflakeHash(this.id)
  }

  /**
   * Copy sharing the id and guild reference, with its own role set.
   * Fake emotes cannot be cloned and yield undefined.
   */
  clone(): EmoteImpl | undefined {
    if (!this.allowedRoles) {
      return undefined
    }
    const copy = new EmoteImpl({
      id: this.id,
      client: this.client,
      guildRef: this.guildRef,
      roles: new Set(this.allowedRoles),
      fake: false,
    })
    return copy
      .setName(this._name)
      .setAnimated(this.animated)
      .setManaged(this.managed)
      .setUser(this._user)
  }

  toString(): string {
    return `E:${this._name}(${this.id})`
  }
}
