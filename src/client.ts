/**
 * Client - owner of the entity caches and the transport
 *
 * Entities never hold each other directly across cache boundaries; they keep
 * ids and resolve through the lookups exposed here (`getGuildById`,
 * `getUserById`), so eviction from a cache is visible everywhere at once.
 *
 * @example
 * ```typescript
 * const client = Client.fromConfig(loadConfig(), {
 *   selfUser: { id: '107941787418365952', username: 'snowcord-bot', bot: true },
 *   headers: { Authorization: 'Bot test-token' },
 * })
 * const guild = client.entityBuilder.createGuild(guildPayload)
 * const deleted = await guild.getEmoteById(emoteId)?.delete().complete()
 * ```
 *
 * @module client
 */

import { SnowflakeCacheView } from './cache/snowflake-cache-view'
import type { ClientConfig } from './config'
import type { EmoteImpl } from './entities/emote'
import type { GuildImpl } from './entities/guild'
import type { UserImpl } from './entities/user'
import { EntityBuilder, type UserPayload } from './entity-builder'
import { FetchRequester, type Requester } from './requests/requester'
import type { RestContext } from './requests/rest-action'
import type { Snowflake } from './utils/snowflake'

export interface ClientOptions {
  requester: Requester
  /** The account this client acts as */
  selfUser: UserPayload
  /** Max cached guilds (0 or undefined = unlimited) */
  guildCacheSize?: number | undefined
  /** Max cached users (0 or undefined = unlimited) */
  userCacheSize?: number | undefined
}

export class Client implements RestContext {
  readonly requester: Requester
  readonly guildCache: SnowflakeCacheView<GuildImpl>
  readonly userCache: SnowflakeCacheView<UserImpl>
  readonly entityBuilder: EntityBuilder
  readonly selfUser: UserImpl

  constructor(options: ClientOptions) {
    this.requester = options.requester
    this.guildCache = new SnowflakeCacheView<GuildImpl>({ name: 'guilds', maxEntries: options.guildCacheSize })
    this.userCache = new SnowflakeCacheView<UserImpl>({ name: 'users', maxEntries: options.userCacheSize })
    this.entityBuilder = new EntityBuilder(this)
    this.selfUser = this.entityBuilder.createUser(options.selfUser)
  }

  /**
   * Client talking to `config.apiBaseUrl` over fetch
   */
  static fromConfig(
    config: ClientConfig,
    options: { selfUser: UserPayload; headers?: Record<string, string> | undefined }
  ): Client {
    return new Client({
      requester: new FetchRequester({ baseUrl: config.apiBaseUrl, headers: options.headers }),
      selfUser: options.selfUser,
      guildCacheSize: config.guildCacheSize,
      userCacheSize: config.userCacheSize,
    })
  }

  getGuildById(id: Snowflake): GuildImpl | undefined {
    return this.guildCache.get(id)
  }

  getUserById(id: Snowflake): UserImpl | undefined {
    return this.userCache.get(id)
  }

  get guilds(): GuildImpl[] {
    return this.guildCache.values()
  }

  /**
   * Search every cached guild for an emote
   */
  getEmoteById(id: Snowflake): EmoteImpl | undefined {
    for (const guild of this.guildCache) {
      const emote = guild.getEmoteById(id)
      if (emote) {
        return emote
      }
    }
    return undefined
  }
}
