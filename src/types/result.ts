/**
 * Result Type for Type-Safe Error Handling
 *
 * Local precondition checks report their failure as a value instead of
 * throwing, so a caller can branch on it before any request is built.
 *
 * @example
 * ```typescript
 * const result = emote.tryDelete()
 * if (isOk(result)) {
 *   result.value.queue()
 * } else {
 *   logger.warn(result.error.message)
 * }
 * ```
 */

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// =============================================================================
// Constructors
// =============================================================================

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Extracts the value from a Result, throwing the contained error if the
 * Result is an Err.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error
}

/**
 * Applies a function to the value inside an Ok Result, leaving Err unchanged.
 *
 * @example
 * ```typescript
 * const route = map(checkDeletable(emote), (guild) => Route.Emotes.DELETE_EMOTE.compile(guild.id, emote.id))
 * ```
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (isOk(result)) {
    return Ok(fn(result.value))
  }
  return result
}
