/**
 * @fileoverview Branch transactions
 *
 * A transaction makes a batch of working-tree edits and the branch pointer
 * update that publishes them atomic with respect to other writers:
 *
 * ```
 * idle ──begin──▶ locked ──commit──▶ committing ──┐
 *                   │                              ├──finish──▶ finished
 *                   └──rollback──▶ rolling-back ──┘
 * ```
 *
 * `begin` holds the branch lock file until `finish`. A failed commit leaves
 * the branch pointer untouched; `rollback` then discards the cached objects
 * and the in-memory edits by reloading from disk.
 *
 * Guards are plain values handed to the caller. There is no ambient
 * per-thread transaction, and transactions do not nest: a second `begin` on
 * the same branch waits until the first one finishes.
 *
 * @module transaction/manager
 */

import { ObjectNotFoundError, TransactionError } from '../errors'
import type { RefResolver } from '../refs/resolver'
import type { ObjectStore } from '../storage/object-store'
import { serializeCommit, type CommitObject, type Identity } from '../types/objects'
import { noopLogger, type Logger } from '../utils/logger'
import type { WorkingTree } from '../worktree/working-tree'
import { FileLock } from './lock'

/**
 * What a transaction operates on. {@link Repository} implements this.
 */
export interface TransactionHost {
  readonly branch: string
  readonly head: CommitObject | null
  readonly root: WorkingTree
  readonly objects: ObjectStore
  readonly refs: RefResolver
  /** Reloads when the branch pointer on disk moved */
  refresh(): Promise<void>
  /** Reloads head and working tree from the branch pointer */
  load(): Promise<void>
  defaultIdentity(): Promise<Identity>
}

export type TransactionState = 'locked' | 'committing' | 'rolling-back' | 'finished'

export interface TransactionManagerOptions {
  /** Give up acquiring the branch lock after this many milliseconds */
  lockTimeout?: number
  /** Delay between lock file attempts, in milliseconds */
  lockPollInterval?: number
  logger?: Logger
}

let nextGuardId = 1

/**
 * Handle for one transaction, returned by {@link TransactionManager.begin}.
 */
export class TransactionGuard {
  readonly id = nextGuardId++
  private currentState: TransactionState = 'locked'

  constructor(
    /** Branch the lock was taken on */
    readonly branch: string
  ) {}

  get state(): TransactionState {
    return this.currentState
  }

  /** @internal */
  transition(state: TransactionState): void {
    this.currentState = state
  }
}

export class TransactionManager {
  private readonly locks = new Map<TransactionGuard, FileLock>()
  private readonly logger: Logger

  constructor(
    private readonly host: TransactionHost,
    private readonly options: TransactionManagerOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ component: 'transaction' })
  }

  /** True while a guard from this manager is not finished */
  get active(): boolean {
    return this.locks.size > 0
  }

  /**
   * Locks the current branch and reloads when it moved on disk.
   */
  async begin(): Promise<TransactionGuard> {
    const branch = this.host.branch
    const lock = await FileLock.acquire(this.host.refs.lockPath(branch), {
      ...(this.options.lockTimeout !== undefined && { timeout: this.options.lockTimeout }),
      ...(this.options.lockPollInterval !== undefined && { pollInterval: this.options.lockPollInterval }),
      logger: this.logger,
    })

    try {
      await this.host.refresh()
    } catch (error) {
      await lock.release()
      throw error
    }

    const guard = new TransactionGuard(branch)
    this.locks.set(guard, lock)
    this.logger.debug('Transaction started', { guard: guard.id, branch })
    return guard
  }

  /**
   * Publishes the working tree as a new commit on the guarded branch.
   *
   * @param author - Defaults to the host's default identity
   * @param committer - Defaults to the author
   * @returns The new commit, or null when nothing was modified
   */
  async commit(
    guard: TransactionGuard,
    message: string,
    author?: Identity,
    committer?: Identity
  ): Promise<CommitObject | null> {
    this.check(guard, ['locked'])
    guard.transition('committing')

    const { host } = this
    if (!host.root.modified) {
      return null
    }

    const commitAuthor = author ?? (await host.defaultIdentity())
    const tree = await host.root.save()
    const data = serializeCommit({
      tree,
      parents: host.head ? [host.head.id] : [],
      author: commitAuthor,
      committer: committer ?? commitAuthor,
      message,
    })

    const id = await host.objects.put('commit', data)
    await host.refs.writeHead(guard.branch, id)
    await host.load()

    const commit = await host.objects.getCommit(id)
    if (!commit) {
      throw new ObjectNotFoundError(id)
    }
    this.logger.debug('Committed', { guard: guard.id, branch: guard.branch, id })
    return commit
  }

  /**
   * Discards cached objects and in-memory edits by reloading from disk.
   */
  async rollback(guard: TransactionGuard): Promise<void> {
    this.check(guard, ['locked', 'committing'])
    guard.transition('rolling-back')

    this.host.objects.clearCache()
    await this.host.load()
    this.logger.debug('Rolled back', { guard: guard.id, branch: guard.branch })
  }

  /**
   * Releases the branch lock. Finishing a finished guard does nothing.
   */
  async finish(guard: TransactionGuard): Promise<void> {
    if (guard.state === 'finished') return

    const lock = this.locks.get(guard)
    if (!lock) {
      throw new TransactionError(`Transaction ${guard.id} does not belong to this manager`)
    }

    this.locks.delete(guard)
    guard.transition('finished')
    await lock.release()
  }

  /**
   * Runs `fn` inside a transaction and commits with `message`. On any error
   * the transaction is rolled back and the error re-thrown; the lock is
   * always released.
   */
  async run<T>(fn: (guard: TransactionGuard) => Promise<T> | T, message = ''): Promise<T> {
    const guard = await this.begin()
    try {
      const result = await fn(guard)
      await this.commit(guard, message)
      return result
    } catch (error) {
      await this.rollbackAfterFailure(guard, error)
      throw error
    } finally {
      await this.finish(guard)
    }
  }

  private async rollbackAfterFailure(guard: TransactionGuard, cause: unknown): Promise<void> {
    if (guard.state !== 'locked' && guard.state !== 'committing') return
    try {
      await this.rollback(guard)
    } catch (error) {
      this.logger.error('Rollback failed', error instanceof Error ? error : undefined, {
        guard: guard.id,
        cause: cause instanceof Error ? cause.message : String(cause),
      })
    }
  }

  private check(guard: TransactionGuard, allowed: TransactionState[]): void {
    if (guard.state === 'finished') {
      throw new TransactionError(`Transaction ${guard.id} is already finished`)
    }
    if (!this.locks.has(guard)) {
      throw new TransactionError(`Transaction ${guard.id} does not belong to this manager`)
    }
    if (!allowed.includes(guard.state)) {
      throw new TransactionError(`Transaction ${guard.id} is ${guard.state}`)
    }
  }
}
