/**
 * LRU Cache with optional TTL
 *
 * Backing store for the client's entity caches. Supports:
 * - Maximum entry limit with LRU (Least Recently Used) eviction
 * - Time-to-live (TTL) for automatic entry expiration (optional)
 * - Eviction callback, so owners can observe entities leaving the cache
 * - Cache statistics (hits, misses, evictions, hit rate)
 *
 * @example
 * ```typescript
 * const guilds = new LRUCache<Snowflake, GuildImpl>({ maxEntries: 1000 })
 * guilds.set(guild.id, guild)
 * const g = guilds.get(guild.id)
 * ```
 */

/**
 * Entry in the LRU cache with linked list pointers and metadata
 */
interface CacheEntry<K, V> {
  key: K
  value: V
  expiresAt: number // 0 = no TTL
  prev: CacheEntry<K, V> | null
  next: CacheEntry<K, V> | null
}

export type EvictionReason = 'capacity' | 'expired' | 'removed'

export interface LRUCacheOptions<K = string, V = unknown> {
  /** Maximum number of entries (0 or undefined = unlimited) */
  maxEntries?: number | undefined
  /** Called whenever an entry leaves the cache other than by overwrite or clear() */
  onEvict?: ((key: K, value: V, reason: EvictionReason) => void) | undefined
  /** Time-to-live in milliseconds (undefined = no expiration) */
  ttlMs?: number | undefined
}

export interface LRUCacheStats {
  hits: number
  misses: number
  /** Number of entries evicted due to capacity limits */
  evictions: number
  size: number
  /** Maximum entries allowed (0 = unlimited) */
  maxEntries: number
  /** Hit rate (hits / total accesses) */
  hitRate: number
}

/**
 * Provides O(1) get/set/delete operations using a Map for lookup
 * and a doubly-linked list for LRU ordering.
 *
 * @typeParam K - Key type
 * @typeParam V - Value type
 */
export class LRUCache<K, V> {
  private cache = new Map<K, CacheEntry<K, V>>()
  private head: CacheEntry<K, V> | null = null // Most recently used
  private tail: CacheEntry<K, V> | null = null // Least recently used

  private readonly _maxEntries: number
  private readonly _ttlMs: number
  private readonly _onEvict?: ((key: K, value: V, reason: EvictionReason) => void) | undefined

  private _hits = 0
  private _misses = 0
  private _evictions = 0

  constructor(options: LRUCacheOptions<K, V> = {}) {
    this._maxEntries = options.maxEntries ?? 0
    // -1 represents "no TTL" so that ttlMs: 0 means "immediate expiration"
    this._ttlMs = options.ttlMs !== undefined ? options.ttlMs : -1
    this._onEvict = options.onEvict
  }

  /**
   * Get a value from the cache, marking it as recently used.
   * Returns undefined if key doesn't exist or has expired.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key)

    if (!entry) {
      this._misses++
      return undefined
    }

    if (this.isExpired(entry)) {
      this.removeEntry(entry, 'expired')
      this._misses++
      return undefined
    }

    this.moveToHead(entry)
    this._hits++
    return entry.value
  }

  /**
   * Read a value without affecting LRU order or stats.
   */
  peek(key: K): V | undefined {
    const entry = this.cache.get(key)
    if (!entry || this.isExpired(entry)) {
      return undefined
    }
    return entry.value
  }

  /**
   * Check if key exists and is not expired (does not affect LRU order)
   */
  has(key: K): boolean {
    const entry = this.cache.get(key)

    if (!entry) {
      return false
    }

    if (this.isExpired(entry)) {
      this.removeEntry(entry, 'expired')
      return false
    }

    return true
  }

  /**
   * Set a value in the cache.
   * Overwrites existing value and resets TTL if applicable.
   * May evict least recently used entries if capacity is exceeded.
   */
  set(key: K, value: V): this {
    const expiresAt = this._ttlMs >= 0 ? Date.now() + this._ttlMs : 0
    const existing = this.cache.get(key)

    if (existing) {
      existing.value = value
      existing.expiresAt = expiresAt
      this.moveToHead(existing)
    } else {
      const entry: CacheEntry<K, V> = {
        key,
        value,
        expiresAt,
        prev: null,
        next: this.head,
      }

      if (this.head) {
        this.head.prev = entry
      }
      this.head = entry

      if (!this.tail) {
        this.tail = entry
      }

      this.cache.set(key, entry)
    }

    this.evictIfNeeded()
    return this
  }

  /**
   * Delete a specific key from the cache
   */
  delete(key: K): boolean {
    const entry = this.cache.get(key)
    if (!entry) {
      return false
    }

    this.removeEntry(entry, 'removed')
    return true
  }

  /**
   * Clear all entries and reset stats
   */
  clear(): void {
    this.cache.clear()
    this.head = null
    this.tail = null
    this._hits = 0
    this._misses = 0
    this._evictions = 0
  }

  /**
   * Current number of entries (including potentially expired)
   */
  get size(): number {
    return this.cache.size
  }

  getStats(): LRUCacheStats {
    const totalAccesses = this._hits + this._misses
    return {
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      size: this.cache.size,
      maxEntries: this._maxEntries,
      hitRate: totalAccesses > 0 ? this._hits / totalAccesses : 0,
    }
  }

  /**
   * Iterate over all values (most recently used first)
   */
  *values(): IterableIterator<V> {
    let current = this.head
    while (current) {
      yield current.value
      current = current.next
    }
  }

  keys(): IterableIterator<K> {
    return this.cache.keys()
  }

  /**
   * Iterate over all entries (most recently used first)
   */
  *entries(): IterableIterator<[K, V]> {
    let current = this.head
    while (current) {
      yield [current.key, current.value]
      current = current.next
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private isExpired(entry: CacheEntry<K, V>): boolean {
    return entry.expiresAt > 0 && Date.now() >= entry.expiresAt
  }

  private moveToHead(entry: CacheEntry<K, V>): void {
    if (entry === this.head) {
      return
    }

    this.removeFromList(entry)

    entry.prev = null
    entry.next = this.head
    if (this.head) {
      this.head.prev = entry
    }
    this.head = entry

    if (!this.tail) {
      this.tail = entry
    }
  }

  /**
   * Remove entry from doubly-linked list (but not from Map)
   */
  private removeFromList(entry: CacheEntry<K, V>): void {
    if (entry.prev) {
      entry.prev.next = entry.next
    } else {
      this.head = entry.next
    }

    if (entry.next) {
      entry.next.prev = entry.prev
    } else {
      this.tail = entry.prev
    }

    entry.prev = null
    entry.next = null
  }

  private removeEntry(entry: CacheEntry<K, V>, reason: EvictionReason): void {
    this.removeFromList(entry)
    this.cache.delete(entry.key)

    if (this._onEvict) {
      this._onEvict(entry.key, entry.value, reason)
    }
  }

  private evictIfNeeded(): void {
    while (this.tail && this._maxEntries > 0 && this.cache.size > this._maxEntries) {
      this._evictions++
      this.removeEntry(this.tail, 'capacity')
    }
  }
}
