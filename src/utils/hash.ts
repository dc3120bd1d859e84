/**
 * @fileoverview SHA-1 hashing and hex helpers for object ids
 *
 * Object ids are the SHA-1 digest of the envelope bytes. Hashing runs
 * synchronously through `node:crypto`; the helpers here are shared by the
 * pack index parser, the tree codec and the envelope framing.
 *
 * @module utils/hash
 */

import { createHash } from 'crypto'
import { DIGEST_LENGTH } from '../constants'

const HEX_PATTERN = /^[0-9a-f]+$/

/**
 * SHA-1 of `data` as a 20-byte array.
 */
export function sha1(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha1').update(data).digest())
}

/**
 * SHA-1 of the concatenation of `parts` as a lowercase hex string.
 *
 * @example
 * ```typescript
 * sha1Hex(new TextEncoder().encode('blob 0\0'))
 * // 'e69de29bb2d1d6434b8b29ae775ad8c2e48c5391'
 * ```
 */
export function sha1Hex(...parts: Uint8Array[]): string {
  const hash = createHash('sha1')
  for (const part of parts) {
    hash.update(part)
  }
  return hash.digest('hex')
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex')
}

/**
 * Decodes an even-length hex string into bytes.
 */
export function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.slice(i, i + 2), 16)
  }
  return bytes
}

/**
 * True for non-empty lowercase hexadecimal strings.
 */
export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value)
}

/**
 * True for a full 40-character lowercase SHA-1 id.
 */
export function isFullDigest(value: string): boolean {
  return value.length === DIGEST_LENGTH && isHex(value)
}

/**
 * Constant-length byte comparison for checksum trailers.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}
