/**
 * @fileoverview Error hierarchy for treestore
 *
 * Every error raised by the storage engine extends {@link TreestoreError},
 * which carries a machine-readable `code`, optional cause chaining and a
 * `toJSON()` form suitable for structured logs.
 *
 * The storage-layer taxonomy maps onto these classes:
 *
 * | Condition                                   | Class                  |
 * |---------------------------------------------|------------------------|
 * | Digest absent everywhere                    | ObjectNotFoundError    |
 * | Abbreviation matches several digests        | AmbiguousObjectError   |
 * | Framing, checksum or length validation fails | CorruptObjectError    |
 * | Decoded type differs from the expected one  | TypeMismatchError      |
 * | Lock file cannot be created or locked       | LockError              |
 * | External `git` exits non-zero               | SubprocessError        |
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { AmbiguousObjectError, CorruptObjectError } from 'treestore'
 *
 * try {
 *   await repo.get('a94a8')
 * } catch (error) {
 *   if (error instanceof AmbiguousObjectError) {
 *     console.log(`Need a longer prefix: ${error.candidates.join(', ')}`)
 *   } else if (error instanceof CorruptObjectError) {
 *     console.log(`Object ${error.id} is damaged: ${error.code}`)
 *   }
 * }
 * ```
 */

import type { ObjectType } from './types/objects'

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes shared by every treestore error.
 */
export type TreestoreErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'INTERNAL'

/**
 * Base error class for all treestore errors.
 *
 * @example
 * ```typescript
 * try {
 *   await riskyOperation()
 * } catch (cause) {
 *   throw new TreestoreError('Wrapper error', 'INTERNAL', { cause })
 * }
 * ```
 */
export class TreestoreError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: string

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param options - Additional options including cause
   */
  constructor(
    message: string,
    code: TreestoreErrorCode | string = 'UNKNOWN',
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'TreestoreError'
    this.code = code
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }

  /**
   * Wraps any thrown value as the cause of an INTERNAL error.
   */
  static wrap(cause: unknown, message?: string): TreestoreError {
    const msg = message || (cause instanceof Error ? cause.message : String(cause))
    return new TreestoreError(msg, 'INTERNAL', { cause })
  }
}

/**
 * Raised when a caller passes a value the engine cannot work with
 * (bad configuration, malformed digest, missing repository directory).
 */
export class InvalidArgumentError extends TreestoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_ARGUMENT', options)
    this.name = 'InvalidArgumentError'
  }
}

// =============================================================================
// Object Errors
// =============================================================================

/**
 * Raised by `read()` style lookups when a digest or abbreviation resolves to
 * nothing in the cache, the loose objects or any pack.
 */
export class ObjectNotFoundError extends TreestoreError {
  /** The key that was looked up (full digest or abbreviation) */
  readonly id: string

  constructor(id: string) {
    super(`Object not found: ${id}`, 'NOT_FOUND')
    this.name = 'ObjectNotFoundError'
    this.id = id
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id }
  }
}

/**
 * Raised when an abbreviated id matches more than one object.
 *
 * Callers must treat this differently from {@link ObjectNotFoundError}:
 * a longer prefix is needed, not a different one.
 */
export class AmbiguousObjectError extends TreestoreError {
  /** The abbreviation that was looked up */
  readonly id: string
  /** Every full digest (or file name) that matched */
  readonly candidates: string[]

  constructor(id: string, candidates: string[]) {
    super(`Object id not unique: ${id} matches ${candidates.length} objects`, 'AMBIGUOUS')
    this.name = 'AmbiguousObjectError'
    this.id = id
    this.candidates = candidates
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id, candidates: this.candidates }
  }
}

/**
 * Error codes for corrupt objects.
 *
 * - `NOT_A_LOOSE_OBJECT`: the loose file fails the zlib framing check
 * - `BAD_OBJECT`: declared length differs from the payload length
 * - `BAD_HEADER`: envelope header is missing or malformed
 * - `UNKNOWN_TYPE`: type tag is not blob, tree, commit or tag
 * - `DECOMPRESSION_FAILED`: zlib stream is damaged or truncated
 * - `BAD_PACK`: pack or index structure is invalid
 * - `BAD_DELTA`: delta base cannot be resolved or the delta does not apply
 * - `MALFORMED`: typed content (tree, commit, tag) cannot be parsed
 */
export type CorruptObjectErrorCode =
  | 'NOT_A_LOOSE_OBJECT'
  | 'BAD_OBJECT'
  | 'BAD_HEADER'
  | 'UNKNOWN_TYPE'
  | 'DECOMPRESSION_FAILED'
  | 'BAD_PACK'
  | 'BAD_DELTA'
  | 'MALFORMED'

/**
 * Raised when framing, checksum or length validation fails on a loose or
 * packed object. Never converted into "not found".
 */
export class CorruptObjectError extends TreestoreError {
  /** Digest of the damaged object, when known */
  readonly id?: string
  /** File the damaged bytes came from, when known */
  readonly path?: string

  constructor(
    message: string,
    code: CorruptObjectErrorCode,
    options?: { id?: string; path?: string; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'CorruptObjectError'
    this.id = options?.id
    this.path = options?.path
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id, path: this.path }
  }
}

/**
 * Raised by the typed accessors when the decoded object has another type.
 */
export class TypeMismatchError extends TreestoreError {
  readonly id: string
  readonly expected: ObjectType
  readonly actual: ObjectType

  constructor(id: string, expected: ObjectType, actual: ObjectType) {
    super(`Wrong type ${actual}, expected ${expected}: ${id}`, 'TYPE_MISMATCH')
    this.name = 'TypeMismatchError'
    this.id = id
    this.expected = expected
    this.actual = actual
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id, expected: this.expected, actual: this.actual }
  }
}

// =============================================================================
// Ref Errors
// =============================================================================

/**
 * Error codes for branch pointer operations.
 */
export type RefErrorCode =
  | 'INVALID_NAME'
  | 'INVALID_SHA'
  | 'WRITE_FAILED'

/**
 * Error thrown by the ref resolver.
 */
export class RefError extends TreestoreError {
  /** The ref that caused the error */
  readonly refName?: string

  constructor(message: string, code: RefErrorCode, options?: { refName?: string; cause?: unknown }) {
    super(message, code, options)
    this.name = 'RefError'
    this.refName = options?.refName
  }
}

// =============================================================================
// Locking and Transactions
// =============================================================================

/**
 * Error codes for lock acquisition.
 *
 * - `LOCK_TIMEOUT`: the configured lock timeout elapsed while another writer held the lock
 * - `LOCK_IO`: the lock file could not be created or opened
 */
export type LockErrorCode = 'LOCK_TIMEOUT' | 'LOCK_IO'

export class LockError extends TreestoreError {
  /** Path of the lock file */
  readonly path: string

  constructor(message: string, code: LockErrorCode, path: string, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'LockError'
    this.path = path
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path }
  }
}

/**
 * Raised when a transaction guard is used outside its valid states
 * (after `finish`, or with another manager).
 */
export class TransactionError extends TreestoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_STATE', options)
    this.name = 'TransactionError'
  }
}

// =============================================================================
// Subprocess Errors
// =============================================================================

/**
 * Raised when the external `git` executable exits with a non-zero status
 * other than the clean "no results" case.
 */
export class SubprocessError extends TreestoreError {
  /** Command line that was run, for diagnostics */
  readonly command: string
  /** Exit status, or null when the process was killed by a signal */
  readonly exitCode: number | null
  /** Captured stdout and stderr */
  readonly output: string

  constructor(command: string, exitCode: number | null, output: string, options?: { cause?: unknown }) {
    super(`${command}: ${output.trim() || `exited with status ${exitCode}`}`, 'SUBPROCESS_FAILED', options)
    this.name = 'SubprocessError'
    this.command = command
    this.exitCode = exitCode
    this.output = output
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), command: this.command, exitCode: this.exitCode, output: this.output }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isTreestoreError(error: unknown): error is TreestoreError {
  return error instanceof TreestoreError
}

/**
 * Checks whether an error is a treestore error carrying the given code.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(error, 'LOCK_TIMEOUT')) {
 *   // another writer held the branch for too long
 * }
 * ```
 */
export function hasErrorCode<T extends string>(error: unknown, code: T): error is TreestoreError & { code: T } {
  return error instanceof TreestoreError && error.code === code
}

/**
 * Reads the `code` property Node.js attaches to system errors (ENOENT, EEXIST, ...).
 *
 * @internal
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}
