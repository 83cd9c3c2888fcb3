/**
 * EntityBuilder - wire JSON to cached entities
 *
 * Payloads are validated with zod before anything is cached. Creation
 * methods register the entity in its owning cache; update methods mutate the
 * cached record in place.
 *
 * @module entity-builder
 */

import { z } from 'zod'
import { ErrorCode, ValidationError } from './errors'
import { EmoteImpl } from './entities/emote'
import { GuildImpl } from './entities/guild'
import { MemberImpl } from './entities/member'
import { RoleImpl } from './entities/role'
import { UserImpl } from './entities/user'
import { scopedLogger } from './utils/logger'
import { isSnowflake, parseSnowflake, type Snowflake } from './utils/snowflake'
import type { Client } from './client'

const log = scopedLogger('EntityBuilder')

// =============================================================================
// Payload Schemas
// =============================================================================

const snowflakeSchema = z.string().refine(isSnowflake, { message: 'Invalid snowflake' })

export const userPayloadSchema = z.object({
  id: snowflakeSchema,
  username: z.string(),
  discriminator: z.string().optional(),
  bot: z.boolean().optional(),
})

export const rolePayloadSchema = z.object({
  id: snowflakeSchema,
  name: z.string(),
  position: z.number().int(),
  permissions: z.string().regex(/^\d+$/),
})

export const emojiPayloadSchema = z.object({
  id: snowflakeSchema,
  name: z.string(),
  roles: z.array(snowflakeSchema).optional(),
  user: userPayloadSchema.optional(),
  managed: z.boolean().optional(),
  animated: z.boolean().optional(),
})

export const memberPayloadSchema = z.object({
  user: userPayloadSchema,
  roles: z.array(snowflakeSchema),
})

export const guildPayloadSchema = z.object({
  id: snowflakeSchema,
  name: z.string(),
  owner_id: snowflakeSchema,
  roles: z.array(rolePayloadSchema),
  emojis: z.array(emojiPayloadSchema),
  members: z.array(memberPayloadSchema).optional(),
})

export type UserPayload = z.infer<typeof userPayloadSchema>
export type RolePayload = z.infer<typeof rolePayloadSchema>
export type EmojiPayload = z.infer<typeof emojiPayloadSchema>
export type MemberPayload = z.infer<typeof memberPayloadSchema>
export type GuildPayload = z.infer<typeof guildPayloadSchema>

/**
 * Emoji update events may omit fields that did not change
 */
export const emojiUpdatePayloadSchema = emojiPayloadSchema.partial().required({ id: true })
export type EmojiUpdatePayload = z.infer<typeof emojiUpdatePayloadSchema>

function parsePayload<S extends z.ZodTypeAny>(schema: S, json: unknown, kind: string): z.infer<S> {
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    throw new ValidationError(`Invalid ${kind} payload`, { issues }, ErrorCode.INVALID_PAYLOAD)
  }
  return parsed.data
}

// =============================================================================
// EntityBuilder
// =============================================================================

export class EntityBuilder {
  private readonly client: Client

  constructor(client: Client) {
    this.client = client
  }

  createUser(json: unknown): UserImpl {
    const data = parsePayload(userPayloadSchema, json, 'user')
    const user = this.client.userCache.get(data.id) ?? new UserImpl(data.id)
    user
      .setName(data.username)
      .setDiscriminator(data.discriminator ?? user.discriminator)
      .setBot(data.bot ?? false)
    this.client.userCache.set(user)
    return user
  }

  createRole(guild: GuildImpl, json: unknown): RoleImpl {
    const data = parsePayload(rolePayloadSchema, json, 'role')
    const role = guild.getRoleById(data.id) ?? new RoleImpl(data.id, guild.id, this.guildLookup())
    role
      .setName(data.name)
      .setPosition(data.position)
      .setRawPermissions(BigInt(data.permissions))
    guild.roleCache.set(role)
    return role
  }

  /**
   * Build a guild with its roles, emotes and the self member, and cache it.
   * Without the self user among `members` the self member holds only @everyone.
   */
  createGuild(json: unknown): GuildImpl {
    const data = parsePayload(guildPayloadSchema, json, 'guild')
    const guild = this.client.getGuildById(data.id) ?? new GuildImpl(data.id, this.client)
    guild.setName(data.name).setOwnerId(data.owner_id)

    // Roles first: emotes and the self member refer to them
    for (const role of data.roles) {
      this.createRole(guild, role)
    }
    this.client.guildCache.set(guild)

    const selfUser = this.client.selfUser
    const selfPayload = data.members?.find((member) => member.user.id === selfUser.id)
    const self = new MemberImpl(selfUser, guild.id, this.guildLookup())
    for (const roleId of selfPayload?.roles ?? []) {
      self.roleIdSet.add(roleId)
    }
    guild.setSelfMember(self)

    for (const emoji of data.emojis) {
      this.createEmote(guild, emoji)
    }

    log.debug(`Cached guild ${guild.id} with ${data.roles.length} roles and ${data.emojis.length} emotes`)
    return guild
  }

  createEmote(guild: GuildImpl, json: unknown): EmoteImpl {
    const data = parsePayload(emojiPayloadSchema, json, 'emoji')
    const emote = guild.getEmoteById(data.id) ?? EmoteImpl.create(data.id, guild)
    this.applyEmote(emote, data)
    guild.emoteCache.set(emote)
    return emote
  }

  /**
   * Emote known only from a reference such as `<a:name:id>`, not cached.
   */
  createFakeEmote(id: string | number | bigint, name: string, animated = false): EmoteImpl {
    return EmoteImpl.detached(parseSnowflake(id), this.client)
      .setName(name)
      .setAnimated(animated)
  }

  /**
   * Apply a state-update event to a cached emote. Fields missing from the
   * payload keep their current value.
   */
  updateEmote(emote: EmoteImpl, json: unknown): EmoteImpl {
    const data = parsePayload(emojiUpdatePayloadSchema, json, 'emoji update')
    if (data.id !== emote.id) {
      throw new ValidationError(
        `Emoji update for ${data.id} applied to emote ${emote.id}`,
        { field: 'id', value: data.id },
        ErrorCode.INVALID_PAYLOAD
      )
    }
    this.applyEmote(emote, data)
    return emote
  }

  private applyEmote(emote: EmoteImpl, data: EmojiUpdatePayload): void {
    if (data.name !== undefined) emote.setName(data.name)
    if (data.managed !== undefined) emote.setManaged(data.managed)
    if (data.animated !== undefined) emote.setAnimated(data.animated)
    if (data.user !== undefined) emote.setUser(this.createUser(data.user))
    if (data.roles !== undefined) this.applyEmoteRoles(emote, data.roles)
  }

  private applyEmoteRoles(emote: EmoteImpl, roleIds: Snowflake[]): void {
    const roleSet = emote.roleSet
    const guild = emote.guild
    if (!roleSet || !guild) {
      return
    }

    const next = new Set(roleIds)
    for (const role of roleSet) {
      if (!next.has(role.id)) {
        roleSet.delete(role)
      }
    }
    for (const id of next) {
      const role = guild.getRoleById(id)
      if (role) {
        roleSet.add(role)
      } else {
        log.warn(`Emote ${emote.id} references unknown role ${id} in guild ${guild.id}`)
      }
    }
  }

  private guildLookup(): (id: Snowflake) => GuildImpl | undefined {
    return (id) => this.client.getGuildById(id)
  }
}
