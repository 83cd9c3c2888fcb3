/**
 * Safe Callback Wrapper Utility
 *
 * Invokes user-supplied callbacks (which may be sync or async) so that a
 * throwing or rejecting callback is logged and never travels back into the
 * code that delivered the value, such as a request's response handler.
 *
 * @module utils/safe-callback
 */

import { logger, type Logger } from './logger'

// =============================================================================
// Types
// =============================================================================

/**
 * A callback that can be either synchronous or asynchronous.
 */
export type MaybeAsyncCallback<TArgs extends unknown[] = []> = (
  ...args: TArgs
) => void | Promise<void>

export interface SafeCallbackOptions<TContext = unknown> {
  /**
   * Custom logger to use for error logging.
   * Defaults to the global logger.
   */
  logger?: Logger | undefined

  /**
   * Prefix for log messages.
   * @default '[SafeCallback]'
   */
  logPrefix?: string | undefined

  /**
   * Context information included in error logs, e.g. the route of the
   * request whose callback failed.
   */
  context?: TContext | undefined
}

/**
 * Indicates whether the callback was sync, async, or errored synchronously.
 */
export type SafeCallbackResult =
  | { type: 'sync'; success: true }
  | { type: 'sync'; success: false; error: Error }
  | { type: 'async'; promise: Promise<void> }

// =============================================================================
// Implementation
// =============================================================================

/**
 * Invoke a callback safely, catching both sync throws and async rejections.
 *
 * @example
 * ```typescript
 * safeCallback(
 *   onSuccess,
 *   { context: { route: 'DELETE guilds/1/emojis/2' }, logPrefix: '[RestAction]' },
 *   true
 * )
 * ```
 */
export function safeCallback<TArgs extends unknown[], TContext = unknown>(
  callback: MaybeAsyncCallback<TArgs>,
  options: SafeCallbackOptions<TContext> = {},
  ...args: TArgs
): SafeCallbackResult {
  const log = options.logger ?? logger
  const prefix = options.logPrefix ?? '[SafeCallback]'
  const context = options.context

  const handleError = (error: unknown): Error => {
    const err = error instanceof Error ? error : new Error(String(error))
    const contextStr = context !== undefined ? ` (context: ${formatContext(context)})` : ''
    log.error(`${prefix} Callback error${contextStr}: ${err.message}`, err)
    return err
  }

  try {
    const result = callback(...args)

    if (result instanceof Promise) {
      // Rejections are logged here; never re-thrown
      const handledPromise = result.then(
        () => undefined,
        (error: unknown) => {
          handleError(error)
        }
      )
      return { type: 'async', promise: handledPromise }
    }

    return { type: 'sync', success: true }
  } catch (error) {
    return { type: 'sync', success: false, error: handleError(error) }
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function formatContext(context: unknown): string {
  if (context === null || context === undefined) {
    return 'none'
  }

  if (typeof context === 'string') {
    return context
  }

  if (typeof context === 'object') {
    const entries = Object.entries(context)
    if (entries.length === 0) {
      return '{}'
    }

    return entries
      .map(([key, value]) => {
        const valueStr = typeof value === 'string'
          ? value
          : typeof value === 'number' || typeof value === 'boolean'
            ? String(value)
            : typeof value
        return `${key}=${valueStr}`
      })
      .join(', ')
  }

  return String(context)
}
