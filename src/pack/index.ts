/**
 * @fileoverview Git Pack Index (.idx) File Format
 *
 * Parses version 2 pack index files, which map object ids to byte offsets
 * inside the sibling packfile.
 *
 * ## Pack Index Version 2 Structure
 *
 * | Section                | Size                    | Description                                |
 * |------------------------|-------------------------|--------------------------------------------|
 * | Magic number           | 4 bytes                 | 0xff744f63 ("\377tOc")                     |
 * | Version                | 4 bytes                 | Version number (2)                         |
 * | Fanout table           | 256 * 4 bytes           | Cumulative object counts by first SHA byte |
 * | Object IDs             | N * 20 bytes            | Sorted SHA-1 hashes                        |
 * | CRC32 checksums        | N * 4 bytes             | CRC32 of each packed object                |
 * | 4-byte offsets         | N * 4 bytes             | Pack file offsets (or large offset index)  |
 * | 8-byte large offsets   | M * 8 bytes             | For objects beyond 2GB                     |
 * | Packfile checksum      | 20 bytes                | SHA-1 of the corresponding packfile        |
 * | Index checksum         | 20 bytes                | SHA-1 of this index file                   |
 *
 * `fanout[i]` holds the number of objects whose first id byte is <= i, so
 * `fanout[255]` is the object count and `[fanout[b-1], fanout[b])` is the
 * range of ids starting with byte `b`.
 *
 * Offsets with the MSB set are indices into the 8-byte large offset table.
 *
 * @module pack/index
 * @see {@link https://git-scm.com/docs/pack-format} Git Pack Format Documentation
 *
 * @example
 * const index = parsePackIndex(await readFile('objects/pack/pack-abc123.idx'))
 * const entry = lookupObject(index, 'a94a8fe5ccb19ba61c4c0873d391e987982fbbd3')
 * if (entry) {
 *   console.log(`Object at offset ${entry.offset}`)
 * }
 */

import { CorruptObjectError } from '../errors'
import { bytesEqual, bytesToHex, sha1 } from '../utils/hash'

/**
 * The magic number as a 32-bit integer.
 */
export const PACK_INDEX_MAGIC = 0xff744f63

export const PACK_INDEX_VERSION = 2

const FANOUT_OFFSET = 8
const FANOUT_LENGTH = 256 * 4
const CHECKSUM_LENGTH = 20

export interface PackIndexEntry {
  /** 40-character hexadecimal object id */
  objectId: string
  /** CRC32 of the packed (compressed) entry */
  crc32: number
  /** Byte offset of the entry in the packfile */
  offset: number
}

export interface PackIndex {
  version: number
  objectCount: number
  /** Cumulative counts by first id byte */
  fanout: Uint32Array
  /** Entries in id order */
  entries: PackIndexEntry[]
  /** SHA-1 trailer of the packfile this index describes */
  packChecksum: Uint8Array
  /** SHA-1 of the index itself */
  indexChecksum: Uint8Array
}

function corrupt(message: string, path?: string): CorruptObjectError {
  return new CorruptObjectError(message, 'BAD_PACK', path !== undefined ? { path } : undefined)
}

/**
 * Parses a version 2 pack index.
 *
 * The trailing checksum is verified before anything else is read, then the
 * fanout table must be non-decreasing and the ids strictly ascending.
 *
 * @param data - Raw bytes of the .idx file
 * @param path - File name reported in errors
 * @throws {CorruptObjectError} `BAD_PACK` for any structural or checksum failure
 */
export function parsePackIndex(data: Uint8Array, path?: string): PackIndex {
  const minSize = FANOUT_OFFSET + FANOUT_LENGTH + 2 * CHECKSUM_LENGTH
  if (data.length < minSize) {
    throw corrupt('Pack index too short', path)
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  const magic = view.getUint32(0, false)
  if (magic !== PACK_INDEX_MAGIC) {
    throw corrupt('Invalid pack index signature', path)
  }

  const version = view.getUint32(4, false)
  if (version !== PACK_INDEX_VERSION) {
    throw corrupt(`Unsupported pack index version: ${version}`, path)
  }

  const storedChecksum = data.subarray(data.length - CHECKSUM_LENGTH)
  if (!bytesEqual(sha1(data.subarray(0, data.length - CHECKSUM_LENGTH)), storedChecksum)) {
    throw corrupt('Pack index checksum mismatch', path)
  }

  const fanout = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    fanout[i] = view.getUint32(FANOUT_OFFSET + i * 4, false)
    if (i > 0 && fanout[i] < fanout[i - 1]) {
      throw corrupt('Invalid fanout table: values must be monotonically non-decreasing', path)
    }
  }

  const objectCount = fanout[255]
  const shaListOffset = FANOUT_OFFSET + FANOUT_LENGTH
  const crcOffset = shaListOffset + objectCount * 20
  const offsetsOffset = crcOffset + objectCount * 4
  const largeOffsetsOffset = offsetsOffset + objectCount * 4

  if (data.length < largeOffsetsOffset + 2 * CHECKSUM_LENGTH) {
    throw corrupt('Pack index too short for declared object count', path)
  }

  const largeOffsetsEnd = data.length - 2 * CHECKSUM_LENGTH
  const largeOffsets = data.subarray(largeOffsetsOffset, largeOffsetsEnd)

  const entries: PackIndexEntry[] = []
  let previous: string | undefined
  for (let i = 0; i < objectCount; i++) {
    const objectId = bytesToHex(data.subarray(shaListOffset + i * 20, shaListOffset + (i + 1) * 20))
    if (previous !== undefined && objectId <= previous) {
      throw corrupt(`Pack index ids out of order at entry ${i}`, path)
    }
    previous = objectId

    const firstByte = parseInt(objectId.slice(0, 2), 16)
    if (i >= fanout[firstByte] || (firstByte > 0 && i < fanout[firstByte - 1])) {
      throw corrupt(`Pack index fanout does not match id ${objectId}`, path)
    }

    const crc32 = view.getUint32(crcOffset + i * 4, false)
    const offset = readPackOffset(view.getUint32(offsetsOffset + i * 4, false), largeOffsets, path)
    entries.push({ objectId, crc32, offset })
  }

  return {
    version,
    objectCount,
    fanout,
    entries,
    packChecksum: new Uint8Array(data.subarray(largeOffsetsEnd, largeOffsetsEnd + CHECKSUM_LENGTH)),
    indexChecksum: new Uint8Array(storedChecksum),
  }
}

/**
 * Resolves a 4-byte offset slot, following it into the large offset table
 * when the MSB is set.
 */
export function readPackOffset(value: number, largeOffsets: Uint8Array, path?: string): number {
  if ((value & 0x80000000) === 0) {
    return value
  }

  const index = value & 0x7fffffff
  const byteIndex = index * 8
  if (byteIndex + 8 > largeOffsets.length) {
    throw corrupt(`Large offset index ${index} out of bounds`, path)
  }

  const view = new DataView(largeOffsets.buffer, largeOffsets.byteOffset, largeOffsets.byteLength)
  const highBits = view.getUint32(byteIndex, false)
  const lowBits = view.getUint32(byteIndex + 4, false)
  return highBits * 0x100000000 + lowBits
}

/**
 * Range of entry positions whose id starts with `firstByte`.
 */
export function getFanoutRange(fanout: Uint32Array, firstByte: number): { start: number; end: number } {
  const start = firstByte === 0 ? 0 : fanout[firstByte - 1]
  return { start, end: fanout[firstByte] }
}

/**
 * Finds the entry for a full object id, narrowing the search with the fanout
 * table before a binary search.
 */
export function lookupObject(index: PackIndex, objectId: string): PackIndexEntry | null {
  const firstByte = parseInt(objectId.slice(0, 2), 16)
  if (Number.isNaN(firstByte)) return null

  let { start: low, end: high } = getFanoutRange(index.fanout, firstByte)
  while (low < high) {
    const mid = (low + high) >>> 1
    const entry = index.entries[mid]
    if (entry.objectId === objectId) return entry
    if (entry.objectId < objectId) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return null
}
