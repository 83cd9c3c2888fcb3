/**
 * Snowcord Error Handling Module
 *
 * All errors raised by the client extend from SnowcordError, which carries:
 * - Error codes for programmatic handling
 * - Context data for debugging
 * - Cause chaining
 * - JSON serialization
 *
 * Error Hierarchy:
 * - SnowcordError (base class)
 *   - IllegalStateError (local precondition violated: fake entity, missing data)
 *   - UnsupportedOperationError (operation disallowed for this kind of entity)
 *   - InsufficientPermissionError (self member lacks a permission)
 *   - ErrorResponseError (remote failure surfaced from a response)
 *   - ValidationError (invalid input or payload)
 *   - ConfigurationError (invalid configuration)
 *   - NetworkError (transport could not produce a response)
 *
 * @module errors
 */

import type { Permission } from '../entities/permission'
import type { ErrorResponse } from '../requests/error-response'
import type { Response } from '../requests/response'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for client operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Local state
  ILLEGAL_STATE = 'ILLEGAL_STATE',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  MISSING_PERMISSION = 'MISSING_PERMISSION',

  // Input
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_SNOWFLAKE = 'INVALID_SNOWFLAKE',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Remote
  REMOTE_FAILURE = 'REMOTE_FAILURE',
  NETWORK_ERROR = 'NETWORK_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

export interface SerializedError {
  name: string
  code: ErrorCode
  message: string
  context?: Record<string, unknown>
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all client errors.
 *
 * @example
 * ```typescript
 * throw new SnowcordError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'delete',
 *   emoteId: '227541476547231744'
 * })
 * ```
 */
export class SnowcordError extends Error {
  override readonly name: string = 'SnowcordError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof SnowcordError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Local State Errors
// =============================================================================

/**
 * Thrown when an operation is attempted on an entity that cannot support it
 * in its current state, e.g. asking a fake emote for its roles.
 */
export class IllegalStateError extends SnowcordError {
  override readonly name = 'IllegalStateError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.ILLEGAL_STATE, context, cause)
    Object.setPrototypeOf(this, IllegalStateError.prototype)
  }
}

/**
 * Thrown when the kind of entity forbids the operation outright.
 */
export class UnsupportedOperationError extends SnowcordError {
  override readonly name = 'UnsupportedOperationError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.UNSUPPORTED_OPERATION, context)
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype)
  }
}

/**
 * Thrown when the self member of a guild lacks a permission required for
 * an operation.
 */
export class InsufficientPermissionError extends SnowcordError {
  override readonly name = 'InsufficientPermissionError'
  readonly permission: Permission
  readonly guildId: string

  constructor(guildId: string, permission: Permission, reason?: string) {
    const reasonPart = reason ? `: ${reason}` : ''
    super(
      `Cannot perform action due to a lack of Permission. Missing permission: ${permission}${reasonPart}`,
      ErrorCode.MISSING_PERMISSION,
      { guildId, permission }
    )
    this.permission = permission
    this.guildId = guildId
    Object.setPrototypeOf(this, InsufficientPermissionError.prototype)
  }
}

// =============================================================================
// Validation & Configuration Errors
// =============================================================================

/**
 * Error thrown when input or payload validation fails.
 */
export class ValidationError extends SnowcordError {
  override readonly name = 'ValidationError'

  constructor(
    message: string,
    context?: {
      field?: string
      value?: unknown
      issues?: string[]
    },
    code: ErrorCode = ErrorCode.VALIDATION_FAILED
  ) {
    super(message, code, context)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }

  get field(): string | undefined {
    const field = this.context.field
    return typeof field === 'string' ? field : undefined
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends SnowcordError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  get configKey(): string | undefined {
    const key = this.context.configKey
    return typeof key === 'string' ? key : undefined
  }
}

// =============================================================================
// Remote Errors
// =============================================================================

/**
 * Error surfaced when a response is neither a success nor a recognized
 * benign outcome. Carries the raw response for the caller to inspect.
 */
export class ErrorResponseError extends SnowcordError {
  override readonly name = 'ErrorResponseError'
  readonly response: Response
  readonly errorResponse: ErrorResponse | undefined

  constructor(response: Response, errorResponse: ErrorResponse | undefined, meaning?: string) {
    const detail = errorResponse
      ? `${errorResponse.code}: ${errorResponse.meaning}`
      : meaning ?? 'Unknown error'
    super(
      `HTTP ${response.code} ${detail}`,
      ErrorCode.REMOTE_FAILURE,
      { status: response.code, errorCode: errorResponse?.code }
    )
    this.response = response
    this.errorResponse = errorResponse
    Object.setPrototypeOf(this, ErrorResponseError.prototype)
  }

  get status(): number {
    return this.response.code
  }
}

/**
 * Error thrown when the transport fails before any response was received.
 */
export class NetworkError extends SnowcordError {
  override readonly name = 'NetworkError'

  constructor(message: string, context?: { method?: string; path?: string }, cause?: Error) {
    super(message, ErrorCode.NETWORK_ERROR, context, cause)
    Object.setPrototypeOf(this, NetworkError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSnowcordError(error: unknown): error is SnowcordError {
  return error instanceof SnowcordError
}

export function isIllegalStateError(error: unknown): error is IllegalStateError {
  return error instanceof IllegalStateError
}

export function isUnsupportedOperationError(error: unknown): error is UnsupportedOperationError {
  return error instanceof UnsupportedOperationError
}

export function isInsufficientPermissionError(error: unknown): error is InsufficientPermissionError {
  return error instanceof InsufficientPermissionError
}

/**
 * Check if an error is a remote failure surfaced from a response
 */
export function isErrorResponseError(error: unknown): error is ErrorResponseError {
  return error instanceof ErrorResponseError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a SnowcordError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): SnowcordError {
  if (error instanceof SnowcordError) {
    return error
  }

  if (error instanceof Error) {
    return new SnowcordError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new SnowcordError(String(error), ErrorCode.UNKNOWN, context)
}
