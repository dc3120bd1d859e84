/**
 * @fileoverview Git Packfile Delta Decoding
 *
 * Reconstructs deltified pack entries from their base object.
 *
 * ## Delta Format Overview
 *
 * A delta consists of:
 * 1. **Source size** - Variable-length integer specifying the base object size
 * 2. **Target size** - Variable-length integer specifying the result size
 * 3. **Instructions** - Sequence of copy or insert commands
 *
 * ## Instruction Types
 *
 * ### Copy Instruction (MSB = 1)
 * Copies a range of bytes from the source (base) object.
 *
 * | Bit    | Meaning                                   |
 * |--------|-------------------------------------------|
 * | 7      | Always 1 (copy marker)                    |
 * | 6-4    | Which size bytes follow (bit mask)        |
 * | 3-0    | Which offset bytes follow (bit mask)      |
 *
 * Following bytes encode offset (up to 4 bytes) and size (up to 3 bytes).
 * If size is 0 after decoding, it means 0x10000 (65536).
 *
 * ### Insert Instruction (MSB = 0)
 * Inserts literal bytes directly into the output.
 *
 * | Bit    | Meaning                                   |
 * |--------|-------------------------------------------|
 * | 7      | Always 0 (insert marker)                  |
 * | 6-0    | Number of bytes to insert (1-127)         |
 *
 * The instruction byte is followed by that many literal bytes.
 *
 * @module pack/delta
 * @see {@link https://git-scm.com/docs/pack-format} Git Pack Format Documentation
 *
 * @example
 * import { applyDelta } from './delta'
 *
 * const targetObject = applyDelta(baseObject, deltaData)
 */

import { CorruptObjectError } from '../errors'

/**
 * Marker bit for copy instructions.
 */
export const COPY_INSTRUCTION = 0x80

const MAX_VARINT_BYTES = 10

export interface DeltaHeaderResult {
  /** Decoded size */
  size: number
  /** Number of bytes the varint occupied */
  bytesRead: number
}

function badDelta(message: string): CorruptObjectError {
  return new CorruptObjectError(message, 'BAD_DELTA')
}

/**
 * Parses one of the two size varints at the start of a delta
 * (little-endian groups of 7 bits, MSB as continuation).
 */
export function parseDeltaHeader(data: Uint8Array, offset: number): DeltaHeaderResult {
  let size = 0
  let multiplier = 1
  let bytesRead = 0

  while (true) {
    if (offset + bytesRead >= data.length) {
      throw badDelta(`Delta header truncated at offset ${offset + bytesRead}`)
    }
    if (bytesRead >= MAX_VARINT_BYTES) {
      throw badDelta(`Delta header exceeds ${MAX_VARINT_BYTES} bytes`)
    }

    const byte = data[offset + bytesRead]
    bytesRead++
    size += (byte & 0x7f) * multiplier
    multiplier *= 128

    if ((byte & 0x80) === 0) {
      break
    }
  }

  return { size, bytesRead }
}

/**
 * Applies a delta to its base object.
 *
 * The base length must equal the delta's source size and the instructions
 * must produce exactly the target size.
 *
 * @throws {CorruptObjectError} `BAD_DELTA` on a size mismatch, an
 * out-of-range copy, an overflowing or truncated insert, or the reserved
 * instruction byte 0x00
 */
export function applyDelta(base: Uint8Array, delta: Uint8Array): Uint8Array {
  let offset = 0

  const sourceHeader = parseDeltaHeader(delta, offset)
  offset += sourceHeader.bytesRead

  if (sourceHeader.size !== base.length) {
    throw badDelta(`Delta source size mismatch: expected ${sourceHeader.size}, got ${base.length}`)
  }

  const targetHeader = parseDeltaHeader(delta, offset)
  offset += targetHeader.bytesRead

  const result = new Uint8Array(targetHeader.size)
  let resultOffset = 0

  const next = (): number => {
    if (offset >= delta.length) {
      throw badDelta('Delta truncated inside a copy instruction')
    }
    return delta[offset++]
  }

  while (offset < delta.length) {
    const cmd = delta[offset++]

    if (cmd & COPY_INSTRUCTION) {
      let copyOffset = 0
      let copySize = 0

      // Offset bytes (bits 0-3), little-endian
      if (cmd & 0x01) copyOffset += next()
      if (cmd & 0x02) copyOffset += next() * 0x100
      if (cmd & 0x04) copyOffset += next() * 0x10000
      if (cmd & 0x08) copyOffset += next() * 0x1000000

      // Size bytes (bits 4-6)
      if (cmd & 0x10) copySize += next()
      if (cmd & 0x20) copySize += next() * 0x100
      if (cmd & 0x40) copySize += next() * 0x10000

      if (copySize === 0) {
        copySize = 0x10000
      }

      if (copyOffset + copySize > base.length) {
        throw badDelta(`Copy instruction out of bounds: offset=${copyOffset}, size=${copySize}, base length=${base.length}`)
      }
      if (resultOffset + copySize > result.length) {
        throw badDelta(`Copy would overflow result: resultOffset=${resultOffset}, size=${copySize}, result length=${result.length}`)
      }

      result.set(base.subarray(copyOffset, copyOffset + copySize), resultOffset)
      resultOffset += copySize
    } else if (cmd !== 0) {
      const insertSize = cmd
      if (offset + insertSize > delta.length) {
        throw badDelta('Delta truncated inside an insert instruction')
      }
      if (resultOffset + insertSize > result.length) {
        throw badDelta(`Insert would overflow result: resultOffset=${resultOffset}, size=${insertSize}, result length=${result.length}`)
      }
      result.set(delta.subarray(offset, offset + insertSize), resultOffset)
      offset += insertSize
      resultOffset += insertSize
    } else {
      throw badDelta('Invalid delta instruction: 0x00')
    }
  }

  if (resultOffset !== targetHeader.size) {
    throw badDelta(`Delta result size mismatch: expected ${targetHeader.size}, got ${resultOffset}`)
  }

  return result
}
