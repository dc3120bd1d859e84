/**
 * @fileoverview Exclusive lock files
 *
 * A writer owns a branch while it holds `<head path>.lock`, a file created
 * with `O_CREAT | O_EXCL` that records its owner as `<pid>@<hostname>`.
 * Inside one process, writers for the same path first queue on an
 * {@link AsyncMutex}, so only one of them polls the file system at a time.
 *
 * A lock file is stale, and is removed by the next writer, when its owner is
 * a process on this host that no longer runs, or this process itself (which
 * only happens after a release that could not delete the file). Files whose
 * owner cannot be read, such as those written by `git`, are waited on.
 * Two processes breaking the same stale lock at the same moment are not
 * serialized against each other.
 *
 * Acquisition waits indefinitely unless a timeout is given.
 *
 * @module transaction/lock
 *
 * @example
 * ```typescript
 * const lock = await FileLock.acquire('/repo/.git/refs/heads/master.lock', { timeout: 5000 })
 * try {
 *   // update the branch
 * } finally {
 *   await lock.release()
 * }
 * ```
 */

import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { DEFAULT_LOCK_POLL_INTERVAL } from '../constants'
import { LockError, systemErrorCode } from '../errors'
import { AsyncMutex, type ReleaseFn } from '../utils/async-mutex'
import { noopLogger, type Logger } from '../utils/logger'

export interface FileLockOptions {
  /** Give up after this many milliseconds (default: wait forever) */
  timeout?: number
  /** Delay between attempts to create a held lock file, in milliseconds */
  pollInterval?: number
  logger?: Logger
}

interface LockOwner {
  pid: number
  hostname: string
}

/** In-process queues, one per absolute lock path with a holder or waiters */
const mutexes = new Map<string, AsyncMutex>()

/** Lock files this process released but could not delete */
const abandoned = new Set<string>()

function mutexFor(lockPath: string): AsyncMutex {
  let mutex = mutexes.get(lockPath)
  if (!mutex) {
    mutex = new AsyncMutex()
    mutexes.set(lockPath, mutex)
  }
  return mutex
}

/**
 * Drops the queue for `lockPath` once nobody holds or waits for it.
 *
 * @returns true when another writer still holds or waits for the lock
 */
function forgetIfIdle(lockPath: string, mutex: AsyncMutex): boolean {
  if (mutex.isLocked()) return true
  if (mutexes.get(lockPath) === mutex) mutexes.delete(lockPath)
  return false
}

// ============================================================================
// Ownership
// ============================================================================

function ownerRecord(): string {
  return `${process.pid}@${os.hostname()}\n`
}

function parseOwner(content: string): LockOwner | null {
  const match = content.trim().match(/^(\d+)@(\S+)$/)
  if (!match) return null
  return { pid: Number(match[1]), hostname: match[2] }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return systemErrorCode(error) === 'EPERM'
  }
}

/**
 * Must only be called while holding the in-process queue for `lockPath`.
 */
async function isStale(lockPath: string): Promise<boolean> {
  if (abandoned.has(lockPath)) return true

  let content: string
  try {
    content = await fs.readFile(lockPath, 'utf8')
  } catch (error) {
    const code = systemErrorCode(error)
    if (code === 'ENOENT' || code === 'EISDIR') return false
    throw error
  }

  const owner = parseOwner(content)
  if (!owner || owner.hostname !== os.hostname()) return false
  return owner.pid === process.pid || !isProcessAlive(owner.pid)
}

// ============================================================================
// FileLock
// ============================================================================

export class FileLock {
  private held = true

  private constructor(
    /** Absolute path of the lock file */
    readonly path: string,
    private readonly handle: fs.FileHandle,
    private readonly mutex: AsyncMutex,
    private readonly releaseMutex: ReleaseFn,
    private readonly logger: Logger
  ) {}

  /**
   * Creates the lock file, waiting while another writer holds it.
   *
   * @throws {LockError} `LOCK_TIMEOUT` when `timeout` elapses first,
   * `LOCK_IO` when the file cannot be created for another reason
   */
  static async acquire(lockPath: string, options: FileLockOptions = {}): Promise<FileLock> {
    const target = path.resolve(lockPath)
    const logger = (options.logger ?? noopLogger).child({ lock: target })
    const pollInterval = options.pollInterval ?? DEFAULT_LOCK_POLL_INTERVAL
    const deadline = options.timeout !== undefined ? Date.now() + options.timeout : undefined

    const mutex = mutexFor(target)
    const releaseMutex = options.timeout !== undefined
      ? await mutex.acquireWithin(options.timeout)
      : await mutex.acquire()
    if (!releaseMutex) {
      throw new LockError(`Timed out waiting for lock ${target}`, 'LOCK_TIMEOUT', target)
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true })
      while (true) {
        const handle = await FileLock.tryCreate(target)
        if (handle) {
          abandoned.delete(target)
          logger.debug('Acquired lock')
          return new FileLock(target, handle, mutex, releaseMutex, logger)
        }

        if (await isStale(target)) {
          await fs.rm(target, { recursive: true, force: true })
          abandoned.delete(target)
          logger.warn('Removed stale lock file')
          continue
        }

        if (deadline !== undefined && Date.now() >= deadline) {
          throw new LockError(`Timed out waiting for lock ${target}`, 'LOCK_TIMEOUT', target)
        }
        await sleep(pollInterval)
      }
    } catch (error) {
      releaseMutex()
      forgetIfIdle(target, mutex)
      if (error instanceof LockError) throw error
      throw new LockError(`Cannot create lock file ${target}`, 'LOCK_IO', target, { cause: error })
    }
  }

  /**
   * Creates the lock file and records this process as its owner.
   *
   * @returns null when the file already exists
   */
  private static async tryCreate(target: string): Promise<fs.FileHandle | null> {
    let handle: fs.FileHandle
    try {
      handle = await fs.open(target, 'wx')
    } catch (error) {
      if (systemErrorCode(error) === 'EEXIST') return null
      throw error
    }

    try {
      await handle.writeFile(ownerRecord())
    } catch (error) {
      await handle.close()
      await fs.unlink(target)
      throw error
    }
    return handle
  }

  isHeld(): boolean {
    return this.held
  }

  /**
   * Closes and removes the lock file. Cleanup failures are logged, never
   * thrown; the next writer in this process removes the leftover file.
   * Calling release more than once has no effect.
   */
  async release(): Promise<void> {
    if (!this.held) return
    this.held = false

    try {
      await this.handle.close()
      await fs.unlink(this.path)
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') abandoned.add(this.path)
      this.logger.warn('Could not remove lock file', {
        error: error instanceof Error ? error.message : String(error),
      })
    } finally {
      this.releaseMutex()
    }

    const waiting = forgetIfIdle(this.path, this.mutex)
    this.logger.debug('Released lock', { waiting })
  }
}
