/**
 * Snowflake identifiers
 *
 * Every entity is keyed by a snowflake: an unsigned 64-bit integer carried
 * as its decimal string, since it does not fit a JavaScript number.
 *
 * @module utils/snowflake
 */

import { ErrorCode, ValidationError } from '../errors'

/**
 * Decimal string of an unsigned 64-bit integer
 */
export type Snowflake = string

/** Milliseconds since the Unix epoch at which snowflake timestamps start (2015-01-01) */
export const SNOWFLAKE_EPOCH = 1420070400000n

const MAX_SNOWFLAKE = (1n << 64n) - 1n
const SNOWFLAKE_PATTERN = /^\d{1,20}$/

export function isSnowflake(value: unknown): value is Snowflake {
  if (typeof value !== 'string' || !SNOWFLAKE_PATTERN.test(value)) {
    return false
  }
  return BigInt(value) <= MAX_SNOWFLAKE
}

/**
 * Normalize a snowflake given as a string, a safe integer or a bigint.
 *
 * @throws ValidationError if the value is not an unsigned 64-bit integer
 */
export function parseSnowflake(value: string | number | bigint): Snowflake {
  let asString: string
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw invalid(value)
    }
    asString = String(value)
  } else {
    asString = typeof value === 'bigint' ? value.toString() : value
  }

  if (!isSnowflake(asString)) {
    throw invalid(value)
  }
  // Strip leading zeros so equal ids compare equal as strings
  return BigInt(asString).toString()
}

/**
 * Creation time encoded in the upper 42 bits, as epoch milliseconds.
 */
export function snowflakeTimestamp(id: Snowflake): number {
  return Number((BigInt(id) >> 22n) + SNOWFLAKE_EPOCH)
}

/**
 * 32-bit hash folding the high half of the id into the low half.
 */
export function snowflakeHash(id: Snowflake): number {
  const value = BigInt(id)
  return Number(BigInt.asIntN(32, value ^ (value >> 32n)))
}

function invalid(value: unknown): ValidationError {
  return new ValidationError(
    `Invalid snowflake: ${String(value)}`,
    { field: 'id', value: String(value) },
    ErrorCode.INVALID_SNOWFLAKE
  )
}
