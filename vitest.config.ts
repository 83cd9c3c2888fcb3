/**
 * Vitest configuration for Snowcord
 *
 * Unit tests live under tests/unit and run in Node. Nothing leaves the
 * process: the REST transport is replaced by tests/mocks/requester.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    // Setup
    setupFiles: ['tests/setup.ts'],

    // Keep deterministic order for debugging
    sequence: {
      shuffle: false,
    },

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
    },
  },
})
