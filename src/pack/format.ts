/**
 * Git Packfile Format
 *
 * The packfile format is used by git for compact storage of objects.
 * Format:
 * - 4 bytes: "PACK" signature
 * - 4 bytes: version number (network byte order, big-endian)
 * - 4 bytes: number of objects (network byte order)
 * - N objects: each object has header + compressed data
 * - 20 bytes: SHA-1 checksum of all preceding content
 *
 * Object header encoding:
 * - First byte: (MSB) continuation bit | 3-bit type | 4-bit size LSB
 * - Subsequent bytes: (MSB) continuation bit | 7-bit size
 *
 * Object types:
 * - 1: commit
 * - 2: tree
 * - 3: blob
 * - 4: tag
 * - 6: ofs_delta (offset delta)
 * - 7: ref_delta (reference delta)
 */

import { CorruptObjectError } from '../errors'
import type { ObjectType } from '../types/objects'

// Constants
export const PACK_SIGNATURE = 'PACK'
export const PACK_VERSION = 2
export const PACK_HEADER_LENGTH = 12

// Pack object types
export enum PackObjectType {
  OBJ_COMMIT = 1,
  OBJ_TREE = 2,
  OBJ_BLOB = 3,
  OBJ_TAG = 4,
  OBJ_OFS_DELTA = 6,
  OBJ_REF_DELTA = 7
}

function toPackObjectType(code: number): PackObjectType | undefined {
  switch (code) {
    case 1:
      return PackObjectType.OBJ_COMMIT
    case 2:
      return PackObjectType.OBJ_TREE
    case 3:
      return PackObjectType.OBJ_BLOB
    case 4:
      return PackObjectType.OBJ_TAG
    case 6:
      return PackObjectType.OBJ_OFS_DELTA
    case 7:
      return PackObjectType.OBJ_REF_DELTA
    default:
      return undefined
  }
}

/**
 * Object type of a whole (non-delta) entry, or undefined for delta entries.
 */
export function packObjectTypeToString(type: PackObjectType): ObjectType | undefined {
  switch (type) {
    case PackObjectType.OBJ_COMMIT:
      return 'commit'
    case PackObjectType.OBJ_TREE:
      return 'tree'
    case PackObjectType.OBJ_BLOB:
      return 'blob'
    case PackObjectType.OBJ_TAG:
      return 'tag'
    default:
      return undefined
  }
}

// Maximum bytes for type+size header (first byte + continuation bytes)
const MAX_HEADER_BYTES = 10

/**
 * Decode the type and inflated size of the entry starting at `offset`.
 */
export function decodeTypeAndSize(data: Uint8Array, offset: number): {
  type: PackObjectType
  size: number
  bytesRead: number
} {
  if (offset >= data.length) {
    throw new CorruptObjectError(`Entry offset ${offset} is beyond pack length ${data.length}`, 'BAD_PACK')
  }

  let bytesRead = 0
  const firstByte = data[offset + bytesRead]
  bytesRead++

  const typeCode = (firstByte >> 4) & 0x07
  const type = toPackObjectType(typeCode)
  if (type === undefined) {
    throw new CorruptObjectError(`Invalid pack object type ${typeCode} at offset ${offset}`, 'BAD_PACK')
  }

  // Multiplication keeps sizes past 2^31 exact
  let size = firstByte & 0x0f
  let multiplier = 16

  if (firstByte & 0x80) {
    while (true) {
      if (offset + bytesRead >= data.length) {
        throw new CorruptObjectError(`Unexpected end of pack in entry header at offset ${offset}`, 'BAD_PACK')
      }
      if (bytesRead >= MAX_HEADER_BYTES) {
        throw new CorruptObjectError(`Entry header at offset ${offset} exceeds ${MAX_HEADER_BYTES} bytes`, 'BAD_PACK')
      }

      const byte = data[offset + bytesRead]
      bytesRead++
      size += (byte & 0x7f) * multiplier
      multiplier *= 128
      if ((byte & 0x80) === 0) {
        break
      }
    }
  }

  return { type, size, bytesRead }
}

/**
 * Decode the base distance of an OFS_DELTA entry.
 *
 * Each continuation adds one before shifting, so there is exactly one
 * encoding per distance.
 */
export function decodeOffsetDelta(data: Uint8Array, offset: number): { distance: number; bytesRead: number } {
  let bytesRead = 0
  if (offset >= data.length) {
    throw new CorruptObjectError(`Unexpected end of pack in delta offset at ${offset}`, 'BAD_PACK')
  }
  let byte = data[offset + bytesRead++]
  let distance = byte & 0x7f

  while (byte & 0x80) {
    if (offset + bytesRead >= data.length || bytesRead >= MAX_HEADER_BYTES) {
      throw new CorruptObjectError(`Invalid delta offset encoding at ${offset}`, 'BAD_PACK')
    }
    byte = data[offset + bytesRead++]
    distance = (distance + 1) * 128 + (byte & 0x7f)
  }

  return { distance, bytesRead }
}

// Pack header structure
export interface PackHeader {
  signature: string
  version: number
  objectCount: number
}

function readUint32(data: Uint8Array, offset: number): number {
  return ((data[offset] << 24) | (data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3]) >>> 0
}

/**
 * Parse pack file header
 * @param data - The packfile data
 * @returns Parsed header information
 */
export function parsePackHeader(data: Uint8Array): PackHeader {
  if (data.length < PACK_HEADER_LENGTH) {
    throw new CorruptObjectError('Packfile header too short: expected at least 12 bytes', 'BAD_PACK')
  }

  const signature = String.fromCharCode(data[0], data[1], data[2], data[3])
  if (signature !== PACK_SIGNATURE) {
    throw new CorruptObjectError(`Invalid pack signature: expected "${PACK_SIGNATURE}", got "${signature}"`, 'BAD_PACK')
  }

  const version = readUint32(data, 4)
  if (version !== PACK_VERSION) {
    throw new CorruptObjectError(`Unsupported pack version: ${version} (only version 2 is supported)`, 'BAD_PACK')
  }

  const objectCount = readUint32(data, 8)

  return { signature, version, objectCount }
}
