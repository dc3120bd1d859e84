/**
 * @fileoverview treestore - git-compatible object storage for Node.js
 *
 * Stores content as git objects (loose files and read-only packs), tracks a
 * branch pointer, and publishes batches of edits as commits under an
 * exclusive lock.
 *
 * **Architecture Overview**:
 * - **Repository**: façade binding store, branch pointer and working tree
 * - **Objects**: envelope framing, digests, typed blob/tree/commit/tag codecs
 * - **Storage**: prefix trie and the cache → loose → pack object store
 * - **Pack**: version 2 pack and index reading with delta resolution
 * - **Transactions**: lock files and commit/rollback guards
 * - **VCS**: history and diffs through the `git` executable
 *
 * @module treestore
 *
 * @example
 * ```typescript
 * import { Repository } from 'treestore'
 *
 * const repo = await Repository.open({ path: '/srv/content', create: true })
 * await repo.transaction(async () => {
 *   await repo.root.set('a', 'b')
 * }, 'init')
 * ```
 */

// =============================================================================
// Repository
// =============================================================================

export { Repository, type RepositoryOptions } from './repository'
export { resolveConfig, type ConfigOptions, type ResolvedConfig } from './config'

// =============================================================================
// Objects
// =============================================================================

export {
  type ObjectType,
  type Identity,
  type TreeEntry,
  type BlobObject,
  type TreeObject,
  type CommitObject,
  type TagObject,
  type GitObject,
  OBJECT_TYPES,
  FILE_MODE,
  EXECUTABLE_MODE,
  TREE_MODE,
  createIdentity,
  isValidObjectType,
  isTreeEntryDirectory,
  parseObject,
  serializeTree,
  serializeCommit,
  serializeTag,
} from './types/objects'

export {
  type Frame,
  type FrameSource,
  digestOf,
  encodeEnvelope,
  compressEnvelope,
  isLegacyFrame,
  inflate,
  parseEnvelope,
  decodeFrame,
} from './objects/envelope'

// =============================================================================
// Storage
// =============================================================================

export { PrefixTrie } from './storage/trie'
export { ObjectStore, type ObjectStoreOptions, type PackLocation } from './storage/object-store'
export { PackReader, listPackFiles, type PackEntry, type PackReaderOptions } from './pack/reader'
export { parsePackIndex, lookupObject, type PackIndex, type PackIndexEntry } from './pack/index'
export { applyDelta } from './pack/delta'

// =============================================================================
// Refs, working tree and transactions
// =============================================================================

export { RefResolver, isValidRefName, parsePackedRefs, type RefResolverOptions } from './refs/resolver'
export { WorkingTree, type WorkingTreeEntry } from './worktree/working-tree'
export { FileLock, type FileLockOptions } from './transaction/lock'
export {
  TransactionManager,
  TransactionGuard,
  type TransactionHost,
  type TransactionState,
  type TransactionManagerOptions,
} from './transaction/manager'

// =============================================================================
// Version control client
// =============================================================================

export {
  type VersionControlClient,
  type HistoryRecord,
  type HistoryIdentity,
  type LogOptions,
  type DiffResult,
  parseLogOutput,
} from './vcs/client'
export {
  GitCliClient,
  execFileRunner,
  type GitCliClientOptions,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from './vcs/git-cli'
export { defaultIdentity } from './vcs/identity'

// =============================================================================
// Errors and logging
// =============================================================================

export {
  TreestoreError,
  InvalidArgumentError,
  ObjectNotFoundError,
  AmbiguousObjectError,
  CorruptObjectError,
  TypeMismatchError,
  RefError,
  LockError,
  TransactionError,
  SubprocessError,
  isTreestoreError,
  hasErrorCode,
  type TreestoreErrorCode,
  type CorruptObjectErrorCode,
  type RefErrorCode,
  type LockErrorCode,
} from './errors'

export {
  LogLevel,
  createLogger,
  parseLogLevel,
  noopLogger,
  type Logger,
  type LogEntry,
  type LoggerOptions,
} from './utils/logger'
