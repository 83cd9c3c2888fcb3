/**
 * Logger utility for Snowcord
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger so a library consumer sees
 * nothing until they opt in.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped.
 */
export function createLevelLogger(target: Logger, level: LogLevel): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel): boolean => LOG_LEVELS.indexOf(l) >= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) target.debug(message, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) target.info(message, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) target.warn(message, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (enabled('error')) target.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger, createLevelLogger } from 'snowcord'
 *
 * setLogger(createLevelLogger(consoleLogger, 'info'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Logger that prefixes every message with `[scope]` and forwards to whatever
 * the global logger is at call time, so later `setLogger` calls still apply.
 */
export function scopedLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug(message: string, ...args: unknown[]): void {
      logger.debug(`${prefix} ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      logger.info(`${prefix} ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      logger.warn(`${prefix} ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      logger.error(`${prefix} ${message}`, error, ...args)
    },
  }
}
