/**
 * Snowflake-keyed entity cache
 *
 * The owning store for one kind of entity. Entities leave it by capacity
 * eviction, TTL expiry or explicit removal; back-references resolved through
 * `get` observe the departure immediately.
 *
 * @module cache/snowflake-cache-view
 */

import { LRUCache, type EvictionReason, type LRUCacheStats } from '../utils/lru-cache'
import { scopedLogger } from '../utils/logger'
import type { Snowflake } from '../utils/snowflake'

const log = scopedLogger('cache')

export interface SnowflakeCacheViewOptions<T> {
  /** Name used in log messages, e.g. 'guilds' */
  name: string
  /** Maximum number of cached entities (0 or undefined = unlimited) */
  maxEntries?: number | undefined
  /** Time-to-live in milliseconds */
  ttlMs?: number | undefined
  onEvict?: ((id: Snowflake, entity: T, reason: EvictionReason) => void) | undefined
}

export class SnowflakeCacheView<T extends { readonly id: Snowflake }> implements Iterable<T> {
  readonly name: string
  private readonly store: LRUCache<Snowflake, T>

  constructor(options: SnowflakeCacheViewOptions<T>) {
    this.name = options.name
    const onEvict = options.onEvict
    this.store = new LRUCache<Snowflake, T>({
      maxEntries: options.maxEntries,
      ttlMs: options.ttlMs,
      onEvict: (id, entity, reason) => {
        log.debug(`Evicted ${this.name}/${id} (${reason})`)
        onEvict?.(id, entity, reason)
      },
    })
  }

  /**
   * Look up an entity without affecting its recency.
   *
   * Used by back-references, which must not keep an entity alive merely by
   * resolving it.
   */
  get(id: Snowflake): T | undefined {
    return this.store.peek(id)
  }

  /**
   * Look up an entity and mark it as recently used
   */
  touch(id: Snowflake): T | undefined {
    return this.store.get(id)
  }

  has(id: Snowflake): boolean {
    return this.store.has(id)
  }

  set(entity: T): T {
    this.store.set(entity.id, entity)
    return entity
  }

  remove(id: Snowflake): boolean {
    return this.store.delete(id)
  }

  clear(): void {
    this.store.clear()
  }

  get size(): number {
    return this.store.size
  }

  values(): T[] {
    return Array.from(this.store.values())
  }

  getStats(): LRUCacheStats {
    return this.store.getStats()
  }

  [Symbol.iterator](): Iterator<T> {
    return this.store.values()
  }
}
