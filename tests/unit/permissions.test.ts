/**
 * Permission bitfields and member permission resolution
 */

import { describe, it, expect } from 'vitest'
import {
  getPermissionOffset,
  getPermissionRaw,
  getPermissionsRaw,
  Permission,
  permissionsFromRaw,
} from '../../src/entities/permission'
import { createTestClient, guildPayload, SELF_USER_ID } from '../factories'

describe('Permission', () => {
  it('should map permissions to their bits', () => {
    expect(getPermissionOffset(Permission.MANAGE_EMOTES)).toBe(30)
    expect(getPermissionRaw(Permission.MANAGE_EMOTES)).toBe(1073741824n)
    expect(getPermissionsRaw([Permission.KICK_MEMBERS, Permission.BAN_MEMBERS])).toBe(6n)
    expect(getPermissionsRaw([])).toBe(0n)
  })

  it('should decode a bitfield in offset order and ignore unknown bits', () => {
    const raw = (1n << 30n) | (1n << 0n) | (1n << 40n)

    expect(permissionsFromRaw(raw)).toEqual([Permission.CREATE_INSTANT_INVITE, Permission.MANAGE_EMOTES])
  })
})

describe('Member permissions', () => {
  it('should combine @everyone with assigned roles', () => {
    const { client } = createTestClient()
    const payload = guildPayload({ selfPermissions: [Permission.MANAGE_EMOTES] })
    const everyone = payload.roles[0]
    if (everyone) {
      everyone.permissions = getPermissionRaw(Permission.VIEW_CHANNEL).toString()
    }

    const member = client.entityBuilder.createGuild(payload).selfMember

    expect(member.permissions).toEqual([Permission.VIEW_CHANNEL, Permission.MANAGE_EMOTES])
    expect(member.hasPermission(Permission.VIEW_CHANNEL, Permission.MANAGE_EMOTES)).toBe(true)
    expect(member.hasPermission(Permission.MANAGE_EMOTES, Permission.BAN_MEMBERS)).toBe(false)
  })

  it('should grant everything to administrators', () => {
    const { client } = createTestClient()

    const member = client.entityBuilder.createGuild(guildPayload({ selfPermissions: [Permission.ADMINISTRATOR] })).selfMember

    expect(member.hasPermission(Permission.MANAGE_EMOTES, Permission.BAN_MEMBERS)).toBe(true)
    expect(member.permissions).toHaveLength(Object.values(Permission).length)
  })

  it('should grant everything to the owner', () => {
    const { client } = createTestClient()

    const member = client.entityBuilder.createGuild(guildPayload({ selfPermissions: [], ownerId: SELF_USER_ID })).selfMember

    expect(member.isOwner).toBe(true)
    expect(member.hasPermission(Permission.MANAGE_EMOTES)).toBe(true)
  })

  it('should hold nothing once the guild left the cache', () => {
    const { client } = createTestClient()
    const guild = client.entityBuilder.createGuild(guildPayload())
    const member = guild.selfMember

    client.guildCache.remove(guild.id)

    expect(member.guild).toBeUndefined()
    expect(member.rawPermissions).toBe(0n)
    expect(member.hasPermission(Permission.MANAGE_EMOTES)).toBe(false)
  })
})
