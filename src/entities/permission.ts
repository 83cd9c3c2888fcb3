/**
 * Guild permissions and their bit offsets in a permission bitfield.
 *
 * @module entities/permission
 */

export enum Permission {
  CREATE_INSTANT_INVITE = 'CREATE_INSTANT_INVITE',
  KICK_MEMBERS = 'KICK_MEMBERS',
  BAN_MEMBERS = 'BAN_MEMBERS',
  ADMINISTRATOR = 'ADMINISTRATOR',
  MANAGE_CHANNEL = 'MANAGE_CHANNEL',
  MANAGE_SERVER = 'MANAGE_SERVER',
  MESSAGE_ADD_REACTION = 'MESSAGE_ADD_REACTION',
  VIEW_AUDIT_LOGS = 'VIEW_AUDIT_LOGS',
  VIEW_CHANNEL = 'VIEW_CHANNEL',
  MESSAGE_WRITE = 'MESSAGE_WRITE',
  MESSAGE_EXT_EMOJI = 'MESSAGE_EXT_EMOJI',
  NICKNAME_CHANGE = 'NICKNAME_CHANGE',
  MANAGE_ROLES = 'MANAGE_ROLES',
  MANAGE_WEBHOOKS = 'MANAGE_WEBHOOKS',
  MANAGE_EMOTES = 'MANAGE_EMOTES',
}

const OFFSETS: Record<Permission, number> = {
  [Permission.CREATE_INSTANT_INVITE]: 0,
  [Permission.KICK_MEMBERS]: 1,
  [Permission.BAN_MEMBERS]: 2,
  [Permission.ADMINISTRATOR]: 3,
  [Permission.MANAGE_CHANNEL]: 4,
  [Permission.MANAGE_SERVER]: 5,
  [Permission.MESSAGE_ADD_REACTION]: 6,
  [Permission.VIEW_AUDIT_LOGS]: 7,
  [Permission.VIEW_CHANNEL]: 10,
  [Permission.MESSAGE_WRITE]: 11,
  [Permission.MESSAGE_EXT_EMOJI]: 18,
  [Permission.NICKNAME_CHANGE]: 26,
  [Permission.MANAGE_ROLES]: 28,
  [Permission.MANAGE_WEBHOOKS]: 29,
  [Permission.MANAGE_EMOTES]: 30,
}

const ALL_PERMISSIONS = Object.values(Permission)

export function getPermissionOffset(permission: Permission): number {
  return OFFSETS[permission]
}

export function getPermissionRaw(permission: Permission): bigint {
  return 1n << BigInt(OFFSETS[permission])
}

/**
 * Combine permissions into a bitfield
 */
export function getPermissionsRaw(permissions: Iterable<Permission>): bigint {
  let raw = 0n
  for (const permission of permissions) {
    raw |= getPermissionRaw(permission)
  }
  return raw
}

/**
 * Known permissions set in a bitfield, in offset order. Unknown bits are ignored.
 */
export function permissionsFromRaw(raw: bigint): Permission[] {
  return ALL_PERMISSIONS
    .filter((permission) => (raw & getPermissionRaw(permission)) !== 0n)
    .sort((a, b) => OFFSETS[a] - OFFSETS[b])
}
