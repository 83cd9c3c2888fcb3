/**
 * Snowcord - chat platform API client core
 *
 * @packageDocumentation
 */

export { Client, type ClientOptions } from './client'
export {
  EntityBuilder,
  type UserPayload,
  type RolePayload,
  type EmojiPayload,
  type EmojiUpdatePayload,
  type MemberPayload,
  type GuildPayload,
} from './entity-builder'

export {
  loadConfig,
  configureLogging,
  DEFAULT_CONFIG,
  DEFAULT_API_URL,
  type ClientConfig,
} from './config'

// Entities
export { EmoteImpl, EMOTE_CDN_URL } from './entities/emote'
export { GuildImpl } from './entities/guild'
export { MemberImpl } from './entities/member'
export { RoleImpl } from './entities/role'
export { UserImpl } from './entities/user'
export {
  Permission,
  getPermissionOffset,
  getPermissionRaw,
  getPermissionsRaw,
  permissionsFromRaw,
} from './entities/permission'
export type {
  Emote,
  EmoteManager,
  EmoteManagerField,
  EmoteModifyError,
  Guild,
  Member,
  Role,
  SnowflakeEntity,
  User,
} from './entities/types'
export { EmoteManagerImpl, type ModifyEmoteBody } from './managers/emote-manager'

// Cache
export { SnowflakeReference, type SnowflakeLookup } from './cache/snowflake-reference'
export { SnowflakeCacheView, type SnowflakeCacheViewOptions } from './cache/snowflake-cache-view'

// Requests
export { Route, formatCompiledRoute, type CompiledRoute, type HttpMethod } from './requests/route'
export { Response } from './requests/response'
export {
  ErrorResponse,
  errorResponseFromCode,
  errorResponseFromJSON,
  type KnownErrorResponse,
  type ErrorBody,
} from './requests/error-response'
export { FetchRequester, type Requester, type FetchRequesterOptions } from './requests/requester'
export {
  RestAction,
  Request,
  okResponseHandler,
  type ResponseHandler,
  type RestContext,
  type SuccessCallback,
  type FailureCallback,
} from './requests/rest-action'
export { classifyDeleteResponse, deleteResponseHandler, type DeleteOutcome } from './requests/delete-handler'

// Errors
export * from './errors'

// Utilities
export { Ok, Err, isOk, isErr, unwrap, map, type Result } from './types/result'
export { Lazy } from './utils/lazy'
export { LRUCache, type LRUCacheOptions, type LRUCacheStats, type EvictionReason } from './utils/lru-cache'
export {
  type Logger,
  type LogLevel,
  consoleLogger,
  noopLogger,
  createLevelLogger,
  scopedLogger,
  logger,
  setLogger,
} from './utils/logger'
export {
  type Snowflake,
  SNOWFLAKE_EPOCH,
  isSnowflake,
  parseSnowflake,
  snowflakeTimestamp,
  snowflakeHash,
} from './utils/snowflake'
