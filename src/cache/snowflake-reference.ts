/**
 * Non-owning reference to a cached entity.
 *
 * Holds only the id and a lookup into the owning cache. `resolve()` asks the
 * cache every time and never keeps what it got back, so once the entity is
 * evicted the reference yields `undefined` on the very next call.
 *
 * The lookup runs synchronously on the caller's stack.
 *
 * @module cache/snowflake-reference
 */

import type { Snowflake } from '../utils/snowflake'

export type SnowflakeLookup<T> = (id: Snowflake) => T | undefined

export class SnowflakeReference<T> {
  readonly id: Snowflake
  private readonly lookup: SnowflakeLookup<T>

  constructor(id: Snowflake, lookup: SnowflakeLookup<T>) {
    this.id = id
    this.lookup = lookup
  }

  /**
   * Reference a live entity by its id
   */
  static of<T extends { readonly id: Snowflake }>(entity: T, lookup: SnowflakeLookup<T>): SnowflakeReference<T> {
    return new SnowflakeReference(entity.id, lookup)
  }

  resolve(): T | undefined {
    return this.lookup(this.id)
  }

  toString(): string {
    return `SnowflakeReference(${this.id})`
  }
}
