/**
 * @fileoverview Read-only access to a pack archive
 *
 * A {@link PackReader} pairs a `.pack` file with its version 2 `.idx`. The
 * index is parsed eagerly; entry bytes are read on demand from an open file
 * handle, one entry at a time.
 *
 * Every entry is inflated from exactly `[dataStart, nextEntryOffset)`, where
 * the next entry offset comes from the sorted index offsets and the last
 * entry ends before the 20-byte pack trailer. Delta entries resolve their
 * base inside the same archive.
 *
 * @module pack/reader
 *
 * @example
 * ```typescript
 * const reader = await PackReader.open('/repo/.git/objects/pack/pack-1a2b.pack')
 * for (const { id, offset } of reader.entries()) {
 *   const { type, data } = await reader.getObject(offset)
 * }
 * await reader.close()
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { MAX_DELTA_CHAIN_DEPTH, PACK_TRAILER_LENGTH } from '../constants'
import { CorruptObjectError } from '../errors'
import { inflate, type Frame } from '../objects/envelope'
import { readDirIfExists } from '../utils/fs'
import { bytesEqual, bytesToHex } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'
import { applyDelta } from './delta'
import {
  decodeOffsetDelta,
  decodeTypeAndSize,
  PACK_HEADER_LENGTH,
  packObjectTypeToString,
  PackObjectType,
  parsePackHeader,
} from './format'
import { lookupObject, parsePackIndex, type PackIndex } from './index'

export interface PackReaderOptions {
  logger?: Logger
}

/**
 * One object listed in the pack index.
 */
export interface PackEntry {
  id: string
  offset: number
}

export class PackReader {
  /** Entry offset -> offset where the entry's bytes end */
  private readonly entryEnds = new Map<number, number>()
  /** Entry offset -> object id, for error context */
  private readonly offsetIds = new Map<number, string>()
  private closed = false

  private constructor(
    /** Absolute path of the `.pack` file */
    readonly packPath: string,
    private readonly index: PackIndex,
    private readonly handle: fs.FileHandle,
    private readonly logger: Logger
  ) {}

  /**
   * Opens a pack and its sibling `.idx`.
   *
   * The pack header must be valid, its object count must equal the index
   * count, and its trailer must match the pack checksum recorded in the index.
   *
   * @throws {CorruptObjectError} `BAD_PACK` when the pair is inconsistent
   */
  static async open(packPath: string, options: PackReaderOptions = {}): Promise<PackReader> {
    const logger = options.logger ?? noopLogger
    const idxPath = packPath.replace(/\.pack$/, '.idx')
    const index = parsePackIndex(new Uint8Array(await fs.readFile(idxPath)), idxPath)

    const handle = await fs.open(packPath, 'r')
    try {
      const { size } = await handle.stat()
      if (size < PACK_HEADER_LENGTH + PACK_TRAILER_LENGTH) {
        throw new CorruptObjectError(`Pack file too short: ${size} bytes`, 'BAD_PACK', { path: packPath })
      }

      const header = parsePackHeader(await readAt(handle, 0, PACK_HEADER_LENGTH))
      if (header.objectCount !== index.objectCount) {
        throw new CorruptObjectError(
          `Pack declares ${header.objectCount} objects but index lists ${index.objectCount}`,
          'BAD_PACK',
          { path: packPath }
        )
      }

      const trailer = await readAt(handle, size - PACK_TRAILER_LENGTH, PACK_TRAILER_LENGTH)
      if (!bytesEqual(trailer, index.packChecksum)) {
        throw new CorruptObjectError('Pack trailer does not match index checksum', 'BAD_PACK', { path: packPath })
      }

      const reader = new PackReader(packPath, index, handle, logger.child({ pack: path.basename(packPath) }))
      reader.computeEntryBounds(size - PACK_TRAILER_LENGTH)
      reader.logger.debug('Loaded pack', { objects: index.objectCount })
      return reader
    } catch (error) {
      await handle.close()
      throw error
    }
  }

  /** Number of objects in the archive */
  get objectCount(): number {
    return this.index.objectCount
  }

  /**
   * Every object listed in the index, in id order.
   */
  *entries(): IterableIterator<PackEntry> {
    for (const entry of this.index.entries) {
      yield { id: entry.objectId, offset: entry.offset }
    }
  }

  /**
   * Decodes the object whose entry starts at `offset`, following delta
   * chains to their base.
   *
   * @throws {CorruptObjectError} When `offset` is not an entry start, the
   * entry cannot be decoded, a delta base cannot be resolved, or the result
   * size differs from the declared size
   */
  async getObject(offset: number): Promise<Frame> {
    if (this.closed) {
      throw new CorruptObjectError('Pack reader is closed', 'BAD_PACK', { path: this.packPath })
    }
    return this.resolve(offset, 0)
  }

  /**
   * Releases the file handle. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.handle.close()
  }

  private computeEntryBounds(dataEnd: number): void {
    const offsets = this.index.entries.map(entry => entry.offset).sort((a, b) => a - b)

    for (let i = 0; i < offsets.length; i++) {
      const offset = offsets[i]
      const end = i + 1 < offsets.length ? offsets[i + 1] : dataEnd
      if (offset < PACK_HEADER_LENGTH || end <= offset || end > dataEnd) {
        throw new CorruptObjectError(`Invalid entry offset ${offset} in index`, 'BAD_PACK', { path: this.packPath })
      }
      this.entryEnds.set(offset, end)
    }

    for (const entry of this.index.entries) {
      this.offsetIds.set(entry.offset, entry.objectId)
    }
  }

  private async resolve(offset: number, depth: number): Promise<Frame> {
    const id = this.offsetIds.get(offset)
    const source = { path: this.packPath, ...(id !== undefined && { id }) }

    if (depth > MAX_DELTA_CHAIN_DEPTH) {
      throw new CorruptObjectError(`Delta chain deeper than ${MAX_DELTA_CHAIN_DEPTH}`, 'BAD_DELTA', source)
    }

    const end = this.entryEnds.get(offset)
    if (end === undefined) {
      throw new CorruptObjectError(`No pack entry starts at offset ${offset}`, 'BAD_PACK', source)
    }

    const entry = await readAt(this.handle, offset, end - offset)
    const { type, size, bytesRead } = decodeTypeAndSize(entry, 0)

    if (type === PackObjectType.OBJ_OFS_DELTA) {
      const { distance, bytesRead: offsetBytes } = decodeOffsetDelta(entry, bytesRead)
      const baseOffset = offset - distance
      if (distance === 0 || baseOffset < PACK_HEADER_LENGTH) {
        throw new CorruptObjectError(`Invalid delta base distance ${distance}`, 'BAD_DELTA', source)
      }
      const delta = this.inflateSized(entry.subarray(bytesRead + offsetBytes), size, source)
      const base = await this.resolve(baseOffset, depth + 1)
      return { type: base.type, data: this.applySized(base.data, delta, source) }
    }

    if (type === PackObjectType.OBJ_REF_DELTA) {
      const baseStart = bytesRead
      if (baseStart + 20 > entry.length) {
        throw new CorruptObjectError('Truncated delta base id', 'BAD_PACK', source)
      }
      const baseId = bytesToHex(entry.subarray(baseStart, baseStart + 20))
      const baseEntry = lookupObject(this.index, baseId)
      if (!baseEntry) {
        throw new CorruptObjectError(`Delta base ${baseId} is not in this pack`, 'BAD_DELTA', source)
      }
      const delta = this.inflateSized(entry.subarray(baseStart + 20), size, source)
      const base = await this.resolve(baseEntry.offset, depth + 1)
      return { type: base.type, data: this.applySized(base.data, delta, source) }
    }

    const objectType = packObjectTypeToString(type)
    if (objectType === undefined) {
      throw new CorruptObjectError(`Unexpected pack entry type ${type}`, 'BAD_PACK', source)
    }
    return { type: objectType, data: this.inflateSized(entry.subarray(bytesRead), size, source) }
  }

  private inflateSized(compressed: Uint8Array, size: number, source: { id?: string; path: string }): Uint8Array {
    const data = inflate(compressed, source)
    if (data.length !== size) {
      throw new CorruptObjectError(
        `Entry declares ${size} bytes but inflates to ${data.length}`,
        'BAD_OBJECT',
        source
      )
    }
    return data
  }

  private applySized(base: Uint8Array, delta: Uint8Array, source: { id?: string; path: string }): Uint8Array {
    try {
      return applyDelta(base, delta)
    } catch (error) {
      if (error instanceof CorruptObjectError) {
        throw new CorruptObjectError(error.message, 'BAD_DELTA', { ...source, cause: error })
      }
      throw error
    }
  }
}

async function readAt(handle: fs.FileHandle, position: number, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(length)
  let read = 0
  while (read < length) {
    const { bytesRead } = await handle.read(buffer, read, length - read, position + read)
    if (bytesRead === 0) {
      throw new CorruptObjectError(`Unexpected end of pack at byte ${position + read}`, 'BAD_PACK')
    }
    read += bytesRead
  }
  return buffer
}

/**
 * Lists `<name>.pack` files in `packDir` that have a sibling `<name>.idx`,
 * sorted by file name. A missing directory yields an empty list.
 */
export async function listPackFiles(packDir: string): Promise<string[]> {
  const files = await readDirIfExists(packDir)
  const names = new Set(files)
  return files
    .filter(file => file.endsWith('.pack') && names.has(`${file.slice(0, -5)}.idx`))
    .sort()
    .map(file => path.join(packDir, file))
}
