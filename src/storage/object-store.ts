/**
 * @fileoverview Content-addressable object store
 *
 * Resolves object ids (full or abbreviated) against three tiers, in order:
 *
 * 1. the in-memory cache of decoded objects,
 * 2. loose objects under `objects/<2 hex>/<38 hex>`,
 * 3. every pack under `objects/pack`, through one combined prefix index.
 *
 * New objects are always written loose. Packs are read-only.
 *
 * A tier answers as soon as it has exactly one candidate, so an abbreviation
 * that matches one loose object and another packed object resolves to the
 * loose one. Ambiguity is only reported within the loose tier and within the
 * pack tier.
 *
 * @module storage/object-store
 *
 * @example
 * ```typescript
 * const store = await ObjectStore.open({ objectsDir: '/repo/.git/objects' })
 *
 * const id = await store.put('blob', new TextEncoder().encode('hello'))
 * const blob = await store.getBlob(id.slice(0, 7))
 *
 * await store.close()
 * ```
 */

import * as path from 'path'
import { FANOUT_PREFIX_LENGTH, MIN_ABBREV_LENGTH } from '../constants'
import { AmbiguousObjectError, ObjectNotFoundError, TypeMismatchError } from '../errors'
import { compressEnvelope, decodeFrame, digestOf } from '../objects/envelope'
import { listPackFiles, PackReader } from '../pack/reader'
import {
  parseObject,
  type BlobObject,
  type CommitObject,
  type GitObject,
  type ObjectType,
  type TagObject,
  type TreeObject,
} from '../types/objects'
import { pathExists, readDirIfExists, readFileIfExists, writeFileAtomic } from '../utils/fs'
import { isFullDigest, isHex } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'
import { PrefixTrie } from './trie'

export interface ObjectStoreOptions {
  /** Path of the `objects` directory */
  objectsDir: string
  logger?: Logger
}

/**
 * Where a packed object lives.
 */
export interface PackLocation {
  reader: PackReader
  offset: number
}

export class ObjectStore {
  private readonly cache = new PrefixTrie<GitObject>()
  private readonly packIndex = new PrefixTrie<PackLocation>()
  private readonly packs: PackReader[] = []

  private constructor(
    readonly objectsDir: string,
    private readonly logger: Logger
  ) {}

  /**
   * Opens the store and loads every pack that has both a `.pack` and an
   * `.idx` file, in file-name order.
   */
  static async open(options: ObjectStoreOptions): Promise<ObjectStore> {
    const logger = (options.logger ?? noopLogger).child({ component: 'object-store' })
    const store = new ObjectStore(options.objectsDir, logger)
    try {
      await store.loadPacks()
    } catch (error) {
      await store.close()
      throw error
    }
    return store
  }

  /** Number of decoded objects held in memory */
  get cacheSize(): number {
    return this.cache.size
  }

  /** Number of loaded pack archives */
  get packCount(): number {
    return this.packs.length
  }

  /**
   * Looks up an object by full id or abbreviation.
   *
   * @returns The decoded object, or null when nothing matches. Keys shorter
   * than five characters or not hexadecimal always yield null.
   * @throws {AmbiguousObjectError} When the loose or pack tier has several candidates
   * @throws {CorruptObjectError} When the single candidate cannot be decoded
   */
  async get(key: string): Promise<GitObject | null> {
    if (key.length < MIN_ABBREV_LENGTH || !isHex(key)) {
      return null
    }

    const cached = this.cache.find(key)
    if (cached.length === 1) {
      return cached[0][1]
    }

    const loose = await this.getLoose(key)
    if (loose) return loose

    return this.getPacked(key)
  }

  /**
   * Like {@link get}, but a missing object is an error.
   *
   * @throws {ObjectNotFoundError} When nothing matches
   */
  async read(key: string): Promise<GitObject> {
    const object = await this.get(key)
    if (!object) {
      throw new ObjectNotFoundError(key)
    }
    return object
  }

  async getBlob(key: string): Promise<BlobObject | null> {
    const object = await this.get(key)
    if (!object) return null
    if (object.type !== 'blob') throw new TypeMismatchError(object.id, 'blob', object.type)
    return object
  }

  async getTree(key: string): Promise<TreeObject | null> {
    const object = await this.get(key)
    if (!object) return null
    if (object.type !== 'tree') throw new TypeMismatchError(object.id, 'tree', object.type)
    return object
  }

  async getCommit(key: string): Promise<CommitObject | null> {
    const object = await this.get(key)
    if (!object) return null
    if (object.type !== 'commit') throw new TypeMismatchError(object.id, 'commit', object.type)
    return object
  }

  async getTag(key: string): Promise<TagObject | null> {
    const object = await this.get(key)
    if (!object) return null
    if (object.type !== 'tag') throw new TypeMismatchError(object.id, 'tag', object.type)
    return object
  }

  /**
   * True when `key` resolves to exactly one object.
   *
   * Full ids are checked without decoding anything.
   */
  async has(key: string): Promise<boolean> {
    if (isFullDigest(key)) {
      return this.cache.has(key) || this.packIndex.has(key) || (await pathExists(this.loosePath(key)))
    }
    return (await this.get(key)) !== null
  }

  /**
   * Stores an object and returns its id.
   *
   * The loose file is only written when it does not exist yet; the cache
   * entry, holding a copy of `payload`, is refreshed either way.
   */
  async put(type: ObjectType, payload: Uint8Array): Promise<string> {
    const data = payload.slice()
    const id = digestOf(type, data)
    const object = parseObject(type, id, data)
    const file = this.loosePath(id)

    if (!(await pathExists(file))) {
      await writeFileAtomic(file, compressEnvelope(type, data))
      this.logger.debug('Stored object', { id, type, size: data.length })
    }

    this.cache.insert(id, object)
    return id
  }

  clearCache(): void {
    this.cache.clear()
  }

  /**
   * Closes every pack reader.
   */
  async close(): Promise<void> {
    const packs = this.packs.splice(0)
    this.packIndex.clear()
    await Promise.all(packs.map(pack => pack.close()))
  }

  private loosePath(id: string): string {
    return path.join(this.objectsDir, id.slice(0, FANOUT_PREFIX_LENGTH), id.slice(FANOUT_PREFIX_LENGTH))
  }

  private async loadPacks(): Promise<void> {
    for (const packPath of await listPackFiles(path.join(this.objectsDir, 'pack'))) {
      const reader = await PackReader.open(packPath, { logger: this.logger })
      this.packs.push(reader)
      for (const { id, offset } of reader.entries()) {
        this.packIndex.insert(id, { reader, offset })
      }
    }
    this.logger.debug('Loaded packs', { packs: this.packs.length, objects: this.packIndex.size })
  }

  private async getLoose(key: string): Promise<GitObject | null> {
    let id: string
    if (isFullDigest(key)) {
      id = key
    } else {
      const dir = key.slice(0, FANOUT_PREFIX_LENGTH)
      const rest = key.slice(FANOUT_PREFIX_LENGTH)
      const matches = (await readDirIfExists(path.join(this.objectsDir, dir)))
        .filter(name => name.startsWith(rest) && isFullDigest(dir + name))
      if (matches.length === 0) return null
      if (matches.length > 1) {
        throw new AmbiguousObjectError(key, matches.map(name => dir + name).sort())
      }
      id = dir + matches[0]
    }

    const file = this.loosePath(id)
    const stored = await readFileIfExists(file)
    if (!stored) return null

    const { type, data } = decodeFrame(stored, { id, path: file })
    const object = parseObject(type, id, data)
    this.cache.insert(id, object)
    this.logger.debug('Loaded loose object', { id, type })
    return object
  }

  private async getPacked(key: string): Promise<GitObject | null> {
    const matches = this.packIndex.find(key)
    if (matches.length === 0) return null
    if (matches.length > 1) {
      throw new AmbiguousObjectError(key, matches.map(([id]) => id))
    }

    const [id, { reader, offset }] = matches[0]
    const { type, data } = await reader.getObject(offset)
    const object = parseObject(type, id, data)
    this.cache.insert(id, object)
    this.logger.debug('Loaded packed object', { id, type, pack: path.basename(reader.packPath) })
    return object
  }
}
