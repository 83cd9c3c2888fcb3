import { SnowflakeReference, type SnowflakeLookup } from '../cache/snowflake-reference'
import { snowflakeTimestamp, type Snowflake } from '../utils/snowflake'
import { permissionsFromRaw, type Permission } from './permission'
import type { GuildImpl } from './guild'
import type { Role } from './types'

export class RoleImpl implements Role {
  readonly id: Snowflake
  name = ''
  position = 0
  rawPermissions = 0n
  private readonly guildRef: SnowflakeReference<GuildImpl>

  constructor(id: Snowflake, guildId: Snowflake, lookup: SnowflakeLookup<GuildImpl>) {
    this.id = id
    this.guildRef = new SnowflakeReference(guildId, lookup)
  }

  get timeCreated(): Date {
    return new Date(snowflakeTimestamp(this.id))
  }

  get guild(): GuildImpl | undefined {
    return this.guildRef.resolve()
  }

  get guildId(): Snowflake {
    return this.guildRef.id
  }

  get permissions(): Permission[] {
    return permissionsFromRaw(this.rawPermissions)
  }

  get isPublicRole(): boolean {
    return this.id === this.guildRef.id
  }

  setName(name: string): this {
    this.name = name
    return this
  }

  setPosition(position: number): this {
    this.position = position
    return this
  }

  setRawPermissions(raw: bigint): this {
    this.rawPermissions = raw
    return this
  }

  toString(): string {
    return `R:${this.name}(${this.id})`
  }
}
