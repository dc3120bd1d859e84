/**
 * @fileoverview Branch pointer storage
 *
 * A branch points at its tip commit through `refs/heads/<branch>`, a file
 * holding the bare 40-character id. Repositories that have been packed keep
 * some pointers in `packed-refs` instead:
 *
 * ```
 * # pack-refs with: peeled fully-peeled sorted
 * 8a3f2c1b9d4e5f6a7b8c9d0e1f2a3b4c5d6e7f8a refs/heads/master
 * ^1234567890abcdef1234567890abcdef12345678
 * ```
 *
 * The per-branch file always wins over `packed-refs`. Writes only ever touch
 * the per-branch file.
 *
 * @module refs/resolver
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { RefError } from '../errors'
import { readDirIfExists, readFileIfExists, writeFileAtomic } from '../utils/fs'
import { isFullDigest } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'

const decoder = new TextDecoder()

const HEADS_PREFIX = 'refs/heads/'

export interface RefResolverOptions {
  /** The git directory (`.git`, or the repository root when bare) */
  gitDir: string
  logger?: Logger
}

/**
 * Validates a ref name against git's rules (`git check-ref-format`).
 */
export function isValidRefName(name: string): boolean {
  if (!name || name === '@') {
    return false
  }

  if (name.endsWith('/') || name.endsWith('.lock')) {
    return false
  }

  if (name.includes('@{') || name.includes('..')) {
    return false
  }

  // Control characters, space, ~, ^, :, ?, *, [, \
  const invalidChars = /[\x00-\x1f\x7f ~^:?*[\]\\]/
  if (invalidChars.test(name)) {
    return false
  }

  for (const component of name.split('/')) {
    if (component.length === 0 || component.startsWith('.') || component.endsWith('.')) {
      return false
    }
  }

  return true
}

/**
 * Parses `packed-refs` into a ref name -> id map. Comment lines and peeled
 * (`^`) lines are skipped.
 */
export function parsePackedRefs(content: string): Map<string, string> {
  const refs = new Map<string, string>()

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('^')) {
      continue
    }

    const spaceIndex = trimmed.indexOf(' ')
    if (spaceIndex > 0) {
      refs.set(trimmed.slice(spaceIndex + 1), trimmed.slice(0, spaceIndex))
    }
  }

  return refs
}

export class RefResolver {
  readonly gitDir: string
  private readonly logger: Logger

  constructor(options: RefResolverOptions) {
    this.gitDir = options.gitDir
    this.logger = (options.logger ?? noopLogger).child({ component: 'refs' })
  }

  /**
   * Path of the per-branch pointer file.
   *
   * @throws {RefError} `INVALID_NAME` for names git would reject
   */
  headPath(branch: string): string {
    if (!isValidRefName(branch)) {
      throw new RefError(`Invalid branch name: '${branch}'`, 'INVALID_NAME', { refName: branch })
    }
    return path.join(this.gitDir, 'refs', 'heads', ...branch.split('/'))
  }

  /**
   * Path of the lock file guarding the branch pointer.
   */
  lockPath(branch: string): string {
    return `${this.headPath(branch)}.lock`
  }

  /**
   * Id the branch points at, or null when the branch does not exist.
   */
  async readHead(branch: string): Promise<string | null> {
    const loose = await readFileIfExists(this.headPath(branch))
    if (loose) {
      return decoder.decode(loose).trim()
    }

    const packed = await this.readPackedRefs()
    return packed.get(HEADS_PREFIX + branch) ?? null
  }

  /**
   * Points the branch at `id`, replacing the pointer file atomically.
   *
   * @throws {RefError} `INVALID_SHA` when `id` is not a full id,
   * `WRITE_FAILED` when the file cannot be written
   */
  async writeHead(branch: string, id: string): Promise<void> {
    if (!isFullDigest(id)) {
      throw new RefError(`Invalid commit id: '${id}'`, 'INVALID_SHA', { refName: branch })
    }

    const file = this.headPath(branch)
    try {
      await writeFileAtomic(file, id)
    } catch (cause) {
      throw new RefError(`Failed to update ${HEADS_PREFIX}${branch}`, 'WRITE_FAILED', { refName: branch, cause })
    }
    this.logger.debug('Updated branch', { branch, id })
  }

  /**
   * Names of every branch, loose or packed, sorted.
   */
  async listBranches(): Promise<string[]> {
    const names = new Set<string>()
    await this.collectLoose(path.join(this.gitDir, 'refs', 'heads'), '', names)

    for (const ref of (await this.readPackedRefs()).keys()) {
      if (ref.startsWith(HEADS_PREFIX)) {
        names.add(ref.slice(HEADS_PREFIX.length))
      }
    }

    return [...names].sort()
  }

  private async readPackedRefs(): Promise<Map<string, string>> {
    const content = await readFileIfExists(path.join(this.gitDir, 'packed-refs'))
    return content ? parsePackedRefs(decoder.decode(content)) : new Map()
  }

  private async collectLoose(dir: string, prefix: string, names: Set<string>): Promise<void> {
    for (const entry of await readDirIfExists(dir)) {
      const full = path.join(dir, entry)
      const name = prefix + entry
      const stat = await fs.stat(full)
      if (stat.isDirectory()) {
        await this.collectLoose(full, `${name}/`, names)
      } else if (isValidRefName(name)) {
        names.add(name)
      }
    }
  }
}
