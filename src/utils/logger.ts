/**
 * @fileoverview Structured logging utility for treestore.
 *
 * Emits JSON-friendly log entries through `console`. Components receive a
 * {@link Logger} in their options and derive child loggers carrying their own
 * context (branch, pack file, lock path).
 *
 * @module utils/logger
 *
 * @example Basic usage
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'object-store', minLevel: LogLevel.DEBUG })
 * logger.debug('Loading object', { id: 'a94a8fe5cc' })
 * logger.warn('Could not remove lock file', { path: '/repo/.git/refs/heads/master.lock' })
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Structured log entry handed to the log handler.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  /** Component or module name */
  component?: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  /** Context merged with per-call data */
  data?: Record<string, unknown>
}

/**
 * Logger interface supporting structured logging.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  /**
   * Create a child logger with additional context. A string `component`
   * in the context renames the child instead of becoming data.
   * @param context - Context added to all log entries from the child logger
   */
  child(context: Record<string, unknown>): Logger
}

export interface LoggerOptions {
  /** Component or module name */
  component?: string
  /** Minimum log level to output (default: INFO) */
  minLevel?: LogLevel
  /** Additional context to include in all log entries */
  context?: Record<string, unknown>
  /** Custom log handler (defaults to console output) */
  handler?: (entry: LogEntry) => void
}

// ============================================================================
// Default Log Handler
// ============================================================================

function defaultHandler(entry: LogEntry): void {
  const output = JSON.stringify(entry)

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(output)
      break
    case LogLevel.INFO:
      console.info(output)
      break
    case LogLevel.WARN:
      console.warn(output)
      break
    case LogLevel.ERROR:
      console.error(output)
      break
  }
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a structured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   component: 'transaction',
 *   minLevel: LogLevel.DEBUG,
 *   context: { branch: 'master' }
 * })
 *
 * logger.info('Committed', { id: commit.id })
 * logger.error('Commit failed', error, { branch: 'master' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    component,
    minLevel = LogLevel.INFO,
    context = {},
    handler = defaultHandler,
  } = options

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
  }

  function log(
    level: LogLevel,
    message: string,
    error?: Error,
    data?: Record<string, unknown>
  ): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    if (component) {
      entry.component = component
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        ...(error.stack !== undefined && { stack: error.stack }),
      }
    }

    const mergedData = { ...context, ...data }
    if (Object.keys(mergedData).length > 0) {
      entry.data = mergedData
    }

    handler(entry)
  }

  return {
    debug(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.DEBUG, message, undefined, data)
    },

    info(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.INFO, message, undefined, data)
    },

    warn(message: string, data?: Record<string, unknown>): void {
      log(LogLevel.WARN, message, undefined, data)
    },

    error(message: string, error?: Error, data?: Record<string, unknown>): void {
      log(LogLevel.ERROR, message, error, data)
    },

    child(childContext: Record<string, unknown>): Logger {
      const { component: childComponent, ...rest } = childContext
      const name = typeof childComponent === 'string' ? childComponent : component
      return createLogger({
        ...(name !== undefined && { component: name }),
        minLevel,
        context: { ...context, ...rest },
        handler,
      })
    },
  }
}

/**
 * Parses a level name (case-insensitive) into a {@link LogLevel}.
 *
 * @returns The level, or `undefined` when the name is not a known level
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const normalized = name.trim().toLowerCase()
  return Object.values(LogLevel).find(level => level === normalized)
}

// ============================================================================
// Pre-configured Loggers
// ============================================================================

/**
 * No-op logger that discards all messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
