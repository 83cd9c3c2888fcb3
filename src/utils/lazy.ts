/**
 * Exactly-once lazy construction
 *
 * `Lazy<T>` publishes a single value built on first access and hands the
 * same instance to every later caller.
 *
 * `get()` runs the classic sequence: read the published slot without taking
 * the lock; if empty, take the construction lock, read the slot again,
 * construct, publish, release. In a single event loop a synchronous factory
 * cannot be interleaved by another task, so the only way to reach the lock
 * while it is held is re-entry from inside the factory itself. That is
 * rejected with an IllegalStateError rather than building a second value.
 *
 * @module utils/lazy
 */

import { IllegalStateError } from '../errors'

type Slot<T> = { value: T } | null

export class Lazy<T> {
  private slot: Slot<T> = null
  private locked = false
  private factory: (() => T) | null

  constructor(factory: () => T) {
    this.factory = factory
  }

  /**
   * Return the published value, constructing it on the first call.
   *
   * @throws IllegalStateError if called re-entrantly from the factory
   */
  get(): T {
    const published = this.slot
    if (published !== null) {
      return published.value
    }
    return this.withLock(() => {
      // Re-check under the lock
      if (this.slot === null) {
        const factory = this.factory
        if (factory === null) {
          throw new IllegalStateError('Lazy value has no factory')
        }
        this.slot = { value: factory() }
        // Published values are never replaced; drop the factory and whatever it captured
        this.factory = null
      }
      return this.slot.value
    })
  }

  /**
   * Whether a value has been published
   */
  get isInitialized(): boolean {
    return this.slot !== null
  }

  private withLock<R>(critical: () => R): R {
    if (this.locked) {
      throw new IllegalStateError('Recursive initialization of a lazy value')
    }
    this.locked = true
    try {
      return critical()
    } finally {
      this.locked = false
    }
  }
}
