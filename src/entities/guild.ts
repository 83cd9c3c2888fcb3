import { SnowflakeCacheView } from '../cache/snowflake-cache-view'
import { IllegalStateError } from '../errors'
import { snowflakeTimestamp, type Snowflake } from '../utils/snowflake'
import type { Client } from '../client'
import type { EmoteImpl } from './emote'
import type { MemberImpl } from './member'
import type { RoleImpl } from './role'
import type { Guild } from './types'

export class GuildImpl implements Guild {
  readonly id: Snowflake
  readonly client: Client
  readonly emoteCache: SnowflakeCacheView<EmoteImpl>
  readonly roleCache: SnowflakeCacheView<RoleImpl>
  name = ''
  ownerId: Snowflake = '0'
  private self: MemberImpl | undefined

  constructor(id: Snowflake, client: Client) {
    this.id = id
    this.client = client
    this.emoteCache = new SnowflakeCacheView<EmoteImpl>({ name: `guilds/${id}/emotes` })
    this.roleCache = new SnowflakeCacheView<RoleImpl>({ name: `guilds/${id}/roles` })
  }

  get timeCreated(): Date {
    return new Date(snowflakeTimestamp(this.id))
  }

  /**
   * @throws IllegalStateError before the self member was set up
   */
  get selfMember(): MemberImpl {
    if (!this.self) {
      throw new IllegalStateError(`Guild ${this.id} has no self member yet`, { guildId: this.id })
    }
    return this.self
  }

  /** Undefined before the self member was set up */
  get selfMemberIfPresent(): MemberImpl | undefined {
    return this.self
  }

  /** The @everyone role */
  get publicRole(): RoleImpl | undefined {
    return this.roleCache.get(this.id)
  }

  /**
   * Highest position first
   */
  get roles(): RoleImpl[] {
    return this.roleCache.values().sort((a, b) => b.position - a.position)
  }

  get emotes(): EmoteImpl[] {
    return this.emoteCache.values()
  }

  getRoleById(id: Snowflake): RoleImpl | undefined {
    return this.roleCache.get(id)
  }

  getEmoteById(id: Snowflake): EmoteImpl | undefined {
    return this.emoteCache.get(id)
  }

  setName(name: string): this {
    this.name = name
    return this
  }

  setOwnerId(ownerId: Snowflake): this {
    this.ownerId = ownerId
    return this
  }

  setSelfMember(member: MemberImpl): this {
    this.self = member
    return this
  }

  toString(): string {
    return `G:${this.name}(${this.id})`
  }
}
