/**
 * @fileoverview Repository façade
 *
 * Binds the object store, the branch pointer, a working tree and the
 * transaction manager for one branch of one git directory.
 *
 * @module repository
 *
 * @example
 * ```typescript
 * import { Repository } from 'treestore'
 *
 * const repo = await Repository.open({ path: '/srv/content', create: true })
 *
 * await repo.transaction(async () => {
 *   await repo.root.set('pages/home.md', '# Welcome')
 * }, 'Add home page')
 *
 * console.log(repo.head?.id)
 * await repo.close()
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { resolveConfig, type ConfigOptions, type ResolvedConfig } from './config'
import { DEFAULT_LOG_LIMIT } from './constants'
import { InvalidArgumentError, ObjectNotFoundError, systemErrorCode, TransactionError } from './errors'
import { RefResolver } from './refs/resolver'
import { ObjectStore } from './storage/object-store'
import {
  TransactionManager,
  type TransactionGuard,
  type TransactionHost,
} from './transaction/manager'
import type {
  BlobObject,
  CommitObject,
  GitObject,
  Identity,
  ObjectType,
  TagObject,
  TreeObject,
} from './types/objects'
import { createLogger, type Logger } from './utils/logger'
import type { DiffResult, HistoryRecord, VersionControlClient } from './vcs/client'
import { GitCliClient } from './vcs/git-cli'
import { defaultIdentity } from './vcs/identity'
import { WorkingTree } from './worktree/working-tree'

export interface RepositoryOptions extends ConfigOptions {
  /** Work tree (or, when bare, the git directory itself) */
  path: string
  /** The repository has no work tree; `path` is the git directory */
  bare?: boolean
  /** Run `git init` when `objects/` is missing */
  create?: boolean
  logger?: Logger
  client?: VersionControlClient
  /** Environment consulted for configuration (default: `process.env`) */
  env?: NodeJS.ProcessEnv
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory()
  } catch (error) {
    const code = systemErrorCode(error)
    if (code === 'ENOENT' || code === 'ENOTDIR') return false
    throw error
  }
}

export class Repository implements TransactionHost {
  private currentBranch: string
  private currentHead: CommitObject | null = null
  private currentRoot: WorkingTree
  private readonly transactions: TransactionManager

  private constructor(
    /** The git directory */
    readonly path: string,
    readonly bare: boolean,
    readonly objects: ObjectStore,
    readonly refs: RefResolver,
    readonly client: VersionControlClient,
    private readonly config: ResolvedConfig,
    private readonly logger: Logger
  ) {
    this.currentBranch = config.branch
    this.currentRoot = WorkingTree.empty(objects)
    this.transactions = new TransactionManager(this, {
      ...(config.lockTimeout !== undefined && { lockTimeout: config.lockTimeout }),
      lockPollInterval: config.lockPollInterval,
      logger,
    })
  }

  /**
   * Opens (and with `create`, initializes) a repository and loads the
   * branch head.
   *
   * @throws {InvalidArgumentError} When the git directory has no `objects` directory
   */
  static async open(options: RepositoryOptions): Promise<Repository> {
    const config = resolveConfig(options, options.env)
    const logger = options.logger ?? createLogger({ component: 'treestore', minLevel: config.logLevel })

    const root = path.resolve(options.path)
    const bare = options.bare ?? false
    const gitDir = bare ? root : path.join(root, '.git')
    const objectsDir = path.join(gitDir, 'objects')

    const client = options.client ?? new GitCliClient({
      gitDir,
      cwd: root,
      binary: config.gitBinary,
      ...(options.env !== undefined && { env: options.env }),
      logger,
    })

    if (options.create && !(await isDirectory(objectsDir))) {
      await fs.mkdir(root, { recursive: true })
      await client.init({ bare })
      logger.info('Initialized repository', { path: gitDir, bare })
    }

    if (!(await isDirectory(objectsDir))) {
      throw new InvalidArgumentError(`Not a valid Git repository: '${gitDir}'`)
    }

    const refs = new RefResolver({ gitDir, logger })
    refs.headPath(config.branch)

    const objects = await ObjectStore.open({ objectsDir, logger })
    const repository = new Repository(gitDir, bare, objects, refs, client, config, logger)
    try {
      await repository.load()
    } catch (error) {
      await objects.close()
      throw error
    }
    return repository
  }

  get branch(): string {
    return this.currentBranch
  }

  /** Tip commit of the branch as last loaded, null for an unborn branch */
  get head(): CommitObject | null {
    return this.currentHead
  }

  /** Working tree of the head commit, with any uncommitted edits */
  get root(): WorkingTree {
    return this.currentRoot
  }

  /** True while a transaction holds the branch lock */
  get inTransaction(): boolean {
    return this.transactions.active
  }

  /**
   * True when the branch pointer on disk differs from the loaded head. An
   * unborn head always counts as changed.
   */
  async changed(): Promise<boolean> {
    if (!this.currentHead) return true
    return this.currentHead.id !== (await this.refs.readHead(this.currentBranch))
  }

  /**
   * Reloads when {@link changed}. The object cache is dropped when the
   * branch pointer moved.
   */
  async refresh(): Promise<void> {
    const loaded = this.currentHead?.id ?? null
    const onDisk = await this.refs.readHead(this.currentBranch)
    if (loaded !== null && loaded === onDisk) return

    if (loaded !== onDisk) {
      this.objects.clearCache()
    }
    await this.load()
  }

  /**
   * Loads head and working tree from the branch pointer, discarding
   * uncommitted edits.
   */
  async load(): Promise<void> {
    const id = await this.refs.readHead(this.currentBranch)
    if (id) {
      const head = await this.objects.getCommit(id)
      if (!head) throw new ObjectNotFoundError(id)
      this.currentHead = head
      this.currentRoot = WorkingTree.load(this.objects, head.tree)
    } else {
      this.currentHead = null
      this.currentRoot = WorkingTree.empty(this.objects)
    }
    this.logger.debug('Reloaded', { branch: this.currentBranch, head: this.currentHead?.id ?? null })
  }

  /**
   * Moves to another branch and loads its head.
   *
   * @throws {TransactionError} While a transaction is open
   */
  async switchBranch(branch: string): Promise<void> {
    if (this.inTransaction) {
      throw new TransactionError(`Cannot switch to '${branch}' during a transaction`)
    }
    this.refs.headPath(branch)
    this.currentBranch = branch
    await this.load()
  }

  get(key: string): Promise<GitObject | null> {
    return this.objects.get(key)
  }

  read(key: string): Promise<GitObject> {
    return this.objects.read(key)
  }

  getBlob(key: string): Promise<BlobObject | null> {
    return this.objects.getBlob(key)
  }

  getTree(key: string): Promise<TreeObject | null> {
    return this.objects.getTree(key)
  }

  getCommit(key: string): Promise<CommitObject | null> {
    return this.objects.getCommit(key)
  }

  getTag(key: string): Promise<TagObject | null> {
    return this.objects.getTag(key)
  }

  put(type: ObjectType, data: Uint8Array): Promise<string> {
    return this.objects.put(type, data)
  }

  /**
   * Runs `fn` with the branch locked and commits the working tree with
   * `message`. Any error rolls the repository back before propagating.
   */
  transaction<T>(fn: (guard: TransactionGuard) => Promise<T> | T, message = ''): Promise<T> {
    return this.transactions.run(fn, message)
  }

  /**
   * Explicit transaction control, for callers that cannot wrap their work
   * in a single callback.
   */
  get transactionManager(): TransactionManager {
    return this.transactions
  }

  /**
   * History of the branch, newest first.
   *
   * @param start - Revision to start from (default: the loaded head)
   * @param filePath - Only commits touching this path
   */
  async log(limit: number = DEFAULT_LOG_LIMIT, start?: string, filePath?: string): Promise<HistoryRecord[]> {
    const from = start ?? this.currentHead?.id
    if (from === undefined) return []
    return this.client.log({ limit, start: from, ...(filePath !== undefined && { path: filePath }) })
  }

  diff(from: string | CommitObject, to: string | CommitObject, filePath?: string): Promise<DiffResult> {
    const fromId = typeof from === 'string' ? from : from.id
    const toId = typeof to === 'string' ? to : to.id
    return this.client.diff(fromId, toId, filePath)
  }

  defaultIdentity(): Promise<Identity> {
    return defaultIdentity(this.client)
  }

  /**
   * A second handle on the same repository and branch with its own object
   * cache and pack readers. Close it independently.
   */
  async fork(): Promise<Repository> {
    const objects = await ObjectStore.open({ objectsDir: this.objects.objectsDir, logger: this.logger })
    const copy = new Repository(
      this.path,
      this.bare,
      objects,
      this.refs,
      this.client,
      { ...this.config, branch: this.currentBranch },
      this.logger
    )
    try {
      await copy.load()
    } catch (error) {
      await objects.close()
      throw error
    }
    return copy
  }

  /**
   * Releases pack file handles.
   */
  async close(): Promise<void> {
    await this.objects.close()
  }
}
