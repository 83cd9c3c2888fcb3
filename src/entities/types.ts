/**
 * Public entity interfaces
 *
 * Entities are mutable cache records: the client updates them in place as
 * state-update events arrive. Plain fields are unsynchronized and follow
 * last-writer-wins; readers may observe either side of an update.
 *
 * @module entities/types
 */

import type { RestAction } from '../requests/rest-action'
import type { Result } from '../types/result'
import type {
  IllegalStateError,
  InsufficientPermissionError,
  UnsupportedOperationError,
} from '../errors'
import type { Snowflake } from '../utils/snowflake'
import type { Permission } from './permission'

export interface SnowflakeEntity {
  readonly id: Snowflake
  /** Creation time decoded from the id */
  readonly timeCreated: Date
}

export interface User extends SnowflakeEntity {
  readonly name: string
  readonly discriminator: string
  readonly isBot: boolean
  /** `name#discriminator` */
  readonly asTag: string
  readonly asMention: string
}

export interface Role extends SnowflakeEntity {
  readonly name: string
  readonly position: number
  readonly permissions: readonly Permission[]
  /** Owning guild, undefined once it left the cache */
  readonly guild: Guild | undefined
  /** The @everyone role shares its id with the guild */
  readonly isPublicRole: boolean
}

export interface Member {
  readonly user: User
  readonly guild: Guild | undefined
  readonly roles: readonly Role[]
  /** Effective permissions across @everyone and every assigned role */
  readonly permissions: readonly Permission[]
  readonly isOwner: boolean
  hasPermission(...permissions: Permission[]): boolean
}

export interface Guild extends SnowflakeEntity {
  readonly name: string
  readonly ownerId: Snowflake
  readonly selfMember: Member
  readonly roles: readonly Role[]
  readonly emotes: readonly Emote[]
  getRoleById(id: Snowflake): Role | undefined
  getEmoteById(id: Snowflake): Emote | undefined
}

/**
 * Errors the local delete/modify checks of an emote can produce
 */
export type EmoteModifyError =
  | IllegalStateError
  | UnsupportedOperationError
  | InsufficientPermissionError

/**
 * A custom emote.
 *
 * Fake emotes are known only by id (and usually name), for instance from a
 * message in a guild this client is not in. They have no guild and cannot
 * report roles.
 */
export interface Emote extends SnowflakeEntity {
  readonly name: string
  readonly isManaged: boolean
  readonly isAnimated: boolean
  readonly isFake: boolean

  /** Owning guild, resolved through the guild cache on every access */
  readonly guild: Guild | undefined

  /**
   * Snapshot of the roles allowed to use this emote. Empty means everyone.
   *
   * @throws IllegalStateError if the emote is fake
   */
  readonly roles: Role[]
  readonly canProvideRoles: boolean

  /**
   * Uploader of the emote
   *
   * @throws IllegalStateError if the uploader is not known
   */
  readonly user: User
  readonly hasUser: boolean

  /** Created once on first access and shared afterwards */
  readonly manager: EmoteManager

  /** `<:name:id>`, or `<a:name:id>` when animated */
  readonly asMention: string
  readonly imageUrl: string

  /**
   * Whether `member` could modify or delete this emote
   */
  canInteract(member: Member): boolean

  /**
   * Delete request resolving to true when deleted, false when it was already
   * gone.
   *
   * @throws IllegalStateError if the emote is fake or its guild left the cache
   * @throws UnsupportedOperationError if the emote is managed
   * @throws InsufficientPermissionError without MANAGE_EMOTES
   */
  delete(): RestAction<boolean>

  /**
   * Same checks as `delete()`, reported as a Result instead of thrown
   */
  tryDelete(): Result<RestAction<boolean>, EmoteModifyError>
}

export type EmoteManagerField = 'name' | 'roles'

/**
 * Collects pending changes to an emote and submits them in one request
 */
export interface EmoteManager {
  readonly emote: Emote
  setName(name: string): this
  /** undefined resets the restriction so everyone may use the emote */
  setRoles(roles: Iterable<Role> | undefined): this
  reset(...fields: EmoteManagerField[]): this
  isSet(field: EmoteManagerField): boolean
  update(): RestAction<void>
}
