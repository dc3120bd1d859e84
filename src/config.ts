/**
 * @fileoverview Repository configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 *
 * | Variable                     | Option             | Default  |
 * |------------------------------|--------------------|----------|
 * | `TREESTORE_LOG_LEVEL`        | `logLevel`         | `warn`   |
 * | `TREESTORE_GIT_BINARY`       | `gitBinary`        | `git`    |
 * | `TREESTORE_LOCK_TIMEOUT_MS`  | `lockTimeout`      | none     |
 * | `TREESTORE_LOCK_POLL_MS`     | `lockPollInterval` | `50`     |
 *
 * @module config
 */

import { DEFAULT_BRANCH, DEFAULT_GIT_BINARY, DEFAULT_LOCK_POLL_INTERVAL } from './constants'
import { InvalidArgumentError } from './errors'
import { LogLevel, parseLogLevel } from './utils/logger'

export interface ConfigOptions {
  branch?: string
  logLevel?: LogLevel
  gitBinary?: string
  /** Milliseconds to wait for the branch lock before failing */
  lockTimeout?: number
  /** Milliseconds between lock file attempts */
  lockPollInterval?: number
}

export interface ResolvedConfig {
  branch: string
  logLevel: LogLevel
  gitBinary: string
  /** Undefined means wait forever */
  lockTimeout: number | undefined
  lockPollInterval: number
}

function parseMilliseconds(name: string, value: string): number {
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got '${value}'`)
  }
  return parseInt(trimmed, 10)
}

function checkMilliseconds(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`)
  }
  return value
}

/**
 * Merges options, environment and defaults.
 *
 * @throws {InvalidArgumentError} For an unknown log level or a malformed duration
 */
export function resolveConfig(options: ConfigOptions = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  let logLevel = options.logLevel
  if (logLevel === undefined && env.TREESTORE_LOG_LEVEL) {
    logLevel = parseLogLevel(env.TREESTORE_LOG_LEVEL)
    if (logLevel === undefined) {
      throw new InvalidArgumentError(`Unknown TREESTORE_LOG_LEVEL '${env.TREESTORE_LOG_LEVEL}'`)
    }
  }

  let lockTimeout = options.lockTimeout
  if (lockTimeout === undefined && env.TREESTORE_LOCK_TIMEOUT_MS) {
    lockTimeout = parseMilliseconds('TREESTORE_LOCK_TIMEOUT_MS', env.TREESTORE_LOCK_TIMEOUT_MS)
  }

  let lockPollInterval = options.lockPollInterval
  if (lockPollInterval === undefined && env.TREESTORE_LOCK_POLL_MS) {
    lockPollInterval = parseMilliseconds('TREESTORE_LOCK_POLL_MS', env.TREESTORE_LOCK_POLL_MS)
  }

  return {
    branch: options.branch ?? DEFAULT_BRANCH,
    logLevel: logLevel ?? LogLevel.WARN,
    gitBinary: options.gitBinary ?? (env.TREESTORE_GIT_BINARY || DEFAULT_GIT_BINARY),
    lockTimeout: lockTimeout === undefined ? undefined : checkMilliseconds('lockTimeout', lockTimeout),
    lockPollInterval: checkMilliseconds('lockPollInterval', lockPollInterval ?? DEFAULT_LOCK_POLL_INTERVAL),
  }
}
