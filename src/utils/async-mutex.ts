/**
 * @fileoverview Async Mutex for in-process writer exclusion
 *
 * Orders concurrent async callers that want the same resource. The file
 * lock keeps one of these per lock path, so writers inside one process queue
 * here before they compete for the lock file with other processes.
 *
 * @module utils/async-mutex
 *
 * @example
 * ```typescript
 * const mutex = new AsyncMutex()
 *
 * const release = await mutex.acquire()
 * try {
 *   await performCriticalOperation()
 * } finally {
 *   release()
 * }
 * ```
 */

/**
 * Release function returned by acquire().
 * Call this to release the mutex lock.
 */
export type ReleaseFn = () => void

/**
 * Async mutex for coordinating exclusive access to shared resources.
 *
 * Waiters are served in FIFO order. The lock is handed directly to the next
 * waiter on release, so no new caller can slip in between.
 *
 * Not reentrant: acquiring twice from the same flow deadlocks.
 */
export class AsyncMutex {
  /** Whether the mutex is currently held */
  private locked = false

  /** Queue of waiters for the lock */
  private waiters: Array<() => void> = []

  /**
   * Acquire the mutex lock. The caller MUST call the returned release
   * function when done, typically in a `finally` block.
   */
  acquire(): Promise<ReleaseFn> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve(this.createReleaseFn())
    }

    return new Promise<ReleaseFn>((resolve) => {
      this.waiters.push(() => resolve(this.createReleaseFn()))
    })
  }

  /**
   * Like {@link acquire}, but gives up after `timeoutMs`.
   *
   * @returns The release function, or null when the timeout elapsed first
   */
  acquireWithin(timeoutMs: number): Promise<ReleaseFn | null> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve(this.createReleaseFn())
    }

    return new Promise<ReleaseFn | null>((resolve) => {
      const waiter = (): void => {
        clearTimeout(timer)
        resolve(this.createReleaseFn())
      }
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== waiter)
        resolve(null)
      }, timeoutMs)
      this.waiters.push(waiter)
    })
  }

  private createReleaseFn(): ReleaseFn {
    let released = false
    return (): void => {
      if (released) return // Prevent double-release
      released = true

      const next = this.waiters.shift()
      if (next) {
        // Ownership passes straight to the next waiter; `locked` stays true
        queueMicrotask(next)
      } else {
        this.locked = false
      }
    }
  }

  /**
   * Check if the mutex is currently locked.
   */
  isLocked(): boolean {
    return this.locked
  }
}
