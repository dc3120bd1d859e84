/**
 * @fileoverview Object envelope framing
 *
 * A git object is stored as the envelope `"<type> <size>\0" + payload`,
 * deflated with zlib. The object's id is the SHA-1 of the *uncompressed*
 * envelope, so identical content always lands at the same id.
 *
 * Decoding is strict: a stream that fails the zlib header check, does not
 * inflate cleanly, carries an unknown type or a size that differs from the
 * payload length raises {@link CorruptObjectError}.
 *
 * @module objects/envelope
 *
 * @example
 * ```typescript
 * import { compressEnvelope, decodeFrame, digestOf } from './objects/envelope'
 *
 * const data = new TextEncoder().encode('hello')
 * const id = digestOf('blob', data)           // 'b6fc4c620b67d95f953a5c1c1230aaab5db5a1b0'
 * const stored = compressEnvelope('blob', data)
 * const { type, data: payload } = decodeFrame(stored)
 * ```
 */

import pako from 'pako'
import { CorruptObjectError } from '../errors'
import { isValidObjectType, type ObjectType } from '../types/objects'
import { sha1Hex } from '../utils/hash'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/** Longest header we scan for the NUL terminator: `"commit " + 20 digits` */
const MAX_HEADER_LENGTH = 32

/**
 * Decoded envelope: the type tag and the payload bytes.
 */
export interface Frame {
  type: ObjectType
  data: Uint8Array
}

/**
 * Context attached to corruption errors raised while decoding.
 */
export interface FrameSource {
  id?: string
  path?: string
}

// ============================================================================
// Encoding
// ============================================================================

function envelopeHeader(type: ObjectType, length: number): Uint8Array {
  return encoder.encode(`${type} ${length}\0`)
}

/**
 * Builds the uncompressed envelope `"<type> <size>\0" + data`.
 */
export function encodeEnvelope(type: ObjectType, data: Uint8Array): Uint8Array {
  const header = envelopeHeader(type, data.length)
  const envelope = new Uint8Array(header.length + data.length)
  envelope.set(header, 0)
  envelope.set(data, header.length)
  return envelope
}

/**
 * Id of an object: SHA-1 of its uncompressed envelope, lowercase hex.
 */
export function digestOf(type: ObjectType, data: Uint8Array): string {
  return sha1Hex(envelopeHeader(type, data.length), data)
}

/**
 * Deflated envelope, ready to be written as a loose object.
 */
export function compressEnvelope(type: ObjectType, data: Uint8Array): Uint8Array {
  return pako.deflate(encodeEnvelope(type, data))
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * True when `bytes` start with a zlib header using the deflate method with a
 * valid FCHECK (`CMF * 256 + FLG` divisible by 31).
 */
export function isLegacyFrame(bytes: Uint8Array): boolean {
  if (bytes.length < 2) return false
  return bytes[0] === 0x78 && ((bytes[0] << 8) + bytes[1]) % 31 === 0
}

/**
 * Inflates a zlib stream.
 *
 * Zero bytes after the end of the stream are skipped; pako reads any other
 * trailing bytes as the start of another stream. A damaged or truncated
 * stream, trailing bytes included, raises `DECOMPRESSION_FAILED`.
 */
export function inflate(compressed: Uint8Array, source: FrameSource = {}): Uint8Array {
  const inflator = new pako.Inflate()
  inflator.push(compressed, true)

  if (inflator.err) {
    throw new CorruptObjectError(
      `Decompression failed: ${inflator.msg || `zlib error ${inflator.err}`}`,
      'DECOMPRESSION_FAILED',
      source
    )
  }

  const result: unknown = inflator.result
  if (!(result instanceof Uint8Array)) {
    throw new CorruptObjectError('Decompression failed: truncated stream', 'DECOMPRESSION_FAILED', source)
  }
  return result
}

/**
 * Splits an uncompressed envelope into its type and payload.
 */
export function parseEnvelope(envelope: Uint8Array, source: FrameSource = {}): Frame {
  const nul = envelope.subarray(0, MAX_HEADER_LENGTH).indexOf(0)
  if (nul === -1) {
    throw new CorruptObjectError('Invalid object header: missing NUL terminator', 'BAD_HEADER', source)
  }

  const header = decoder.decode(envelope.subarray(0, nul))
  const match = header.match(/^([a-z]+) (0|[1-9]\d*)$/)
  if (!match) {
    throw new CorruptObjectError(`Invalid object header: ${header}`, 'BAD_HEADER', source)
  }

  const type = match[1]
  if (!isValidObjectType(type)) {
    throw new CorruptObjectError(`Unknown object type: ${type}`, 'UNKNOWN_TYPE', source)
  }

  const size = parseInt(match[2], 10)
  const data = envelope.subarray(nul + 1)
  if (data.length !== size) {
    throw new CorruptObjectError(
      `Bad object: header declares ${size} bytes, payload has ${data.length}`,
      'BAD_OBJECT',
      source
    )
  }

  return { type, data }
}

/**
 * Decodes a stored loose object: checks the zlib framing, inflates and
 * validates the envelope.
 *
 * @throws {CorruptObjectError} `NOT_A_LOOSE_OBJECT` when the framing check
 * fails; `DECOMPRESSION_FAILED`, `BAD_HEADER`, `UNKNOWN_TYPE` or `BAD_OBJECT`
 * for damaged contents
 */
export function decodeFrame(stored: Uint8Array, source: FrameSource = {}): Frame {
  if (!isLegacyFrame(stored)) {
    throw new CorruptObjectError('Not a loose object: zlib header check failed', 'NOT_A_LOOSE_OBJECT', source)
  }
  return parseEnvelope(inflate(stored, source), source)
}
