import { SnowflakeReference, type SnowflakeLookup } from '../cache/snowflake-reference'
import type { Snowflake } from '../utils/snowflake'
import { getPermissionRaw, getPermissionsRaw, Permission, permissionsFromRaw } from './permission'
import type { GuildImpl } from './guild'
import type { RoleImpl } from './role'
import type { Member } from './types'
import type { UserImpl } from './user'

export class MemberImpl implements Member {
  readonly user: UserImpl
  private readonly guildRef: SnowflakeReference<GuildImpl>
  private readonly roleIds = new Set<Snowflake>()

  constructor(user: UserImpl, guildId: Snowflake, lookup: SnowflakeLookup<GuildImpl>) {
    this.user = user
    this.guildRef = new SnowflakeReference(guildId, lookup)
  }

  get guild(): GuildImpl | undefined {
    return this.guildRef.resolve()
  }

  get isOwner(): boolean {
    return this.guild?.ownerId === this.user.id
  }

  /**
   * Assigned roles still present in the guild, highest position first.
   * Excludes @everyone.
   */
  get roles(): RoleImpl[] {
    const guild = this.guild
    if (!guild) {
      return []
    }
    const roles: RoleImpl[] = []
    for (const id of this.roleIds) {
      const role = guild.getRoleById(id)
      if (role) {
        roles.push(role)
      }
    }
    return roles.sort((a, b) => b.position - a.position)
  }

  get rawPermissions(): bigint {
    const guild = this.guild
    if (!guild) {
      return 0n
    }
    let raw = guild.publicRole?.rawPermissions ?? 0n
    for (const role of this.roles) {
      raw |= role.rawPermissions
    }
    return raw
  }

  get permissions(): Permission[] {
    if (this.isOwner) {
      return Object.values(Permission)
    }
    const raw = this.rawPermissions
    if ((raw & getPermissionRaw(Permission.ADMINISTRATOR)) !== 0n) {
      return Object.values(Permission)
    }
    return permissionsFromRaw(raw)
  }

  /**
   * The guild owner and administrators hold every permission.
   */
  hasPermission(...permissions: Permission[]): boolean {
    if (this.isOwner) {
      return true
    }
    const raw = this.rawPermissions
    if ((raw & getPermissionRaw(Permission.ADMINISTRATOR)) !== 0n) {
      return true
    }
    const required = getPermissionsRaw(permissions)
    return (raw & required) === required
  }

  /** Live role id set, mutated by the entity builder */
  get roleIdSet(): Set<Snowflake> {
    return this.roleIds
  }

  toString(): string {
    return `MB:${this.user.name}(${this.user.id} / ${this.guildRef.id})`
  }
}
