/**
 * Lazy Tests
 *
 * Exactly-once construction under interleaved first access.
 */

import { describe, it, expect, vi } from 'vitest'
import { Lazy } from '../../src/utils/lazy'
import { IllegalStateError } from '../../src/errors'

describe('Lazy', () => {
  it('should not construct before first access', () => {
    const factory = vi.fn(() => ({ created: true }))
    const lazy = new Lazy(factory)

    expect(factory).not.toHaveBeenCalled()
    expect(lazy.isInitialized).toBe(false)
  })

  it('should construct once and return the same instance afterwards', () => {
    const factory = vi.fn(() => ({ created: true }))
    const lazy = new Lazy(factory)

    const first = lazy.get()
    const second = lazy.get()

    expect(first).toBe(second)
    expect(factory).toHaveBeenCalledTimes(1)
    expect(lazy.isInitialized).toBe(true)
  })

  it('should construct exactly once under many concurrent first accesses', async () => {
    const factory = vi.fn(() => ({ created: Symbol('instance') }))
    const lazy = new Lazy(factory)

    const results = await Promise.all(
      Array.from({ length: 50 }, async (_, i) => {
        // Interleave the tasks across microtasks and timer ticks
        for (let j = 0; j < i % 5; j++) {
          await Promise.resolve()
        }
        if (i % 7 === 0) {
          await new Promise((resolve) => setTimeout(resolve, 0))
        }
        return lazy.get()
      })
    )

    expect(factory).toHaveBeenCalledTimes(1)
    const first = results[0]
    for (const result of results) {
      expect(result).toBe(first)
    }
  })

  it('should reject re-entrant construction', () => {
    const lazy: Lazy<number> = new Lazy(() => lazy.get() + 1)

    expect(() => lazy.get()).toThrow(IllegalStateError)
    expect(() => lazy.get()).toThrow('Recursive initialization of a lazy value')
    expect(lazy.isInitialized).toBe(false)
  })

  it('should allow a retry after the factory throws', () => {
    let attempts = 0
    const lazy = new Lazy(() => {
      attempts++
      if (attempts === 1) {
        throw new Error('boom')
      }
      return 'ready'
    })

    expect(() => lazy.get()).toThrow('boom')
    expect(lazy.isInitialized).toBe(false)
    expect(lazy.get()).toBe('ready')
    expect(lazy.get()).toBe('ready')
    expect(attempts).toBe(2)
  })

  it('should publish falsy values', () => {
    const factory = vi.fn(() => 0)
    const lazy = new Lazy(factory)

    expect(lazy.get()).toBe(0)
    expect(lazy.get()).toBe(0)
    expect(factory).toHaveBeenCalledTimes(1)
  })
})
