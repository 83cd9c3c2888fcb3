/**
 * Client configuration
 *
 * Read from environment variables:
 * - SNOWCORD_API_URL           base URL of the REST API
 * - SNOWCORD_GUILD_CACHE_SIZE  max cached guilds (0 = unlimited)
 * - SNOWCORD_USER_CACHE_SIZE   max cached users (0 = unlimited)
 * - SNOWCORD_LOG_LEVEL         debug | info | warn | error | silent
 *
 * @module config
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { consoleLogger, createLevelLogger, LOG_LEVELS, setLogger, type LogLevel } from '../utils/logger'

export const DEFAULT_API_URL = 'https://discord.com/api/v10'

export interface ClientConfig {
  apiBaseUrl: string
  guildCacheSize: number
  userCacheSize: number
  logLevel: LogLevel
}

export const DEFAULT_CONFIG: Readonly<ClientConfig> = {
  apiBaseUrl: DEFAULT_API_URL,
  guildCacheSize: 0,
  userCacheSize: 10_000,
  logLevel: 'warn',
}

const ENV_KEYS = {
  apiBaseUrl: 'SNOWCORD_API_URL',
  guildCacheSize: 'SNOWCORD_GUILD_CACHE_SIZE',
  userCacheSize: 'SNOWCORD_USER_CACHE_SIZE',
  logLevel: 'SNOWCORD_LOG_LEVEL',
} as const satisfies Record<keyof ClientConfig, string>

const cacheSizeSchema = z.coerce.number().int().nonnegative()

const configSchemas = {
  apiBaseUrl: z.string().url(),
  guildCacheSize: cacheSizeSchema,
  userCacheSize: cacheSizeSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
} satisfies Record<keyof ClientConfig, z.ZodTypeAny>

function readKey<S extends z.ZodTypeAny>(
  envKey: string,
  schema: S,
  fallback: z.infer<S>,
  env: Record<string, string | undefined>
): z.infer<S> {
  const raw = env[envKey]
  if (raw === undefined || raw === '') {
    return fallback
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for ${envKey}: ${raw} (${parsed.error.issues.map((issue) => issue.message).join(', ')})`,
      { configKey: envKey, actualValue: raw }
    )
  }
  return parsed.data
}

/**
 * Build the configuration from environment variables, falling back to
 * defaults for unset keys.
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
  return {
    apiBaseUrl: readKey(ENV_KEYS.apiBaseUrl, configSchemas.apiBaseUrl, DEFAULT_CONFIG.apiBaseUrl, env),
    guildCacheSize: readKey(ENV_KEYS.guildCacheSize, configSchemas.guildCacheSize, DEFAULT_CONFIG.guildCacheSize, env),
    userCacheSize: readKey(ENV_KEYS.userCacheSize, configSchemas.userCacheSize, DEFAULT_CONFIG.userCacheSize, env),
    logLevel: readKey(ENV_KEYS.logLevel, configSchemas.logLevel, DEFAULT_CONFIG.logLevel, env),
  }
}

/**
 * Route the global logger to the console at the configured level
 */
export function configureLogging(config: Pick<ClientConfig, 'logLevel'>): void {
  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigurationError(`Unknown log level: ${config.logLevel}`, { configKey: 'logLevel', actualValue: config.logLevel })
  }
  setLogger(createLevelLogger(consoleLogger, config.logLevel))
}
