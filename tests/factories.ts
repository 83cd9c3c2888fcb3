/**
 * Test Data Factories
 *
 * Payload builders with sensible defaults, plus a client wired to the
 * in-process MockRequester. Ids are small made-up snowflakes.
 */

import { Client } from '../src/client'
import { getPermissionsRaw, Permission } from '../src/entities/permission'
import type {
  EmojiPayload,
  GuildPayload,
  MemberPayload,
  RolePayload,
  UserPayload,
} from '../src/entity-builder'
import { MockRequester } from './mocks/requester'

export const SELF_USER_ID = '1000'
export const OWNER_ID = '2000'
export const GUILD_ID = '3000'
export const MOD_ROLE_ID = '3001'
export const EMOTE_ID = '4000'

export function userPayload(overrides: Partial<UserPayload> = {}): UserPayload {
  return {
    id: SELF_USER_ID,
    username: 'test-bot',
    discriminator: '0001',
    bot: true,
    ...overrides,
  }
}

export function rolePayload(overrides: Partial<RolePayload> = {}): RolePayload {
  return {
    id: MOD_ROLE_ID,
    name: 'moderators',
    position: 1,
    permissions: '0',
    ...overrides,
  }
}

export function emojiPayload(overrides: Partial<EmojiPayload> = {}): EmojiPayload {
  return {
    id: EMOTE_ID,
    name: 'party_blob',
    roles: [],
    managed: false,
    animated: false,
    ...overrides,
  }
}

export interface GuildPayloadOptions {
  /** Permissions granted to the self user through the moderator role */
  selfPermissions?: Permission[]
  emojis?: EmojiPayload[]
  ownerId?: string
}

/**
 * Guild with @everyone, a moderator role held by the self user, and one emote
 */
export function guildPayload(options: GuildPayloadOptions = {}): GuildPayload {
  const self: MemberPayload = {
    user: userPayload(),
    roles: [MOD_ROLE_ID],
  }
  return {
    id: GUILD_ID,
    name: 'Test Guild',
    owner_id: options.ownerId ?? OWNER_ID,
    roles: [
      rolePayload({ id: GUILD_ID, name: '@everyone', position: 0, permissions: '0' }),
      rolePayload({
        permissions: getPermissionsRaw(options.selfPermissions ?? [Permission.MANAGE_EMOTES]).toString(),
      }),
    ],
    emojis: options.emojis ?? [emojiPayload()],
    members: [self],
  }
}

export interface TestClient {
  client: Client
  requester: MockRequester
}

export function createTestClient(options: { guildCacheSize?: number } = {}): TestClient {
  const requester = new MockRequester()
  const client = new Client({
    requester,
    selfUser: userPayload(),
    guildCacheSize: options.guildCacheSize,
  })
  return { client, requester }
}
