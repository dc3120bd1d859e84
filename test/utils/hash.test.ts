import { describe, it, expect } from 'vitest'
import { bytesEqual, bytesToHex, hexToBytes, isFullDigest, isHex, sha1, sha1Hex } from '../../src/utils/hash'
import { text } from '../helpers/fixtures'

describe('hash', () => {
  it('hashes the concatenation of its parts', () => {
    expect(sha1Hex()).toBe('da39a3ee5e6b4b0d3255bfef95601890afd80709')
    expect(sha1Hex(text('blob 0\0'))).toBe('e69de29bb2d1d6434b8b29ae775ad8c2e48c5391')
    expect(sha1Hex(text('blob '), text('0\0'))).toBe('e69de29bb2d1d6434b8b29ae775ad8c2e48c5391')
    expect(bytesToHex(sha1(new Uint8Array(0)))).toBe('da39a3ee5e6b4b0d3255bfef95601890afd80709')
  })

  it('converts between hex and bytes', () => {
    expect(bytesToHex(new Uint8Array([0, 15, 16, 255]))).toBe('000f10ff')
    expect(hexToBytes('000f10ff')).toEqual(new Uint8Array([0, 15, 16, 255]))
  })

  it('respects subarray offsets', () => {
    const bytes = new Uint8Array([1, 2, 3, 4])
    expect(bytesToHex(bytes.subarray(1, 3))).toBe('0203')
  })

  it('recognizes lowercase hex', () => {
    expect(isHex('0123456789abcdef')).toBe(true)
    expect(isHex('')).toBe(false)
    expect(isHex('ABC')).toBe(false)
    expect(isHex('xyz')).toBe(false)
  })

  it('recognizes full digests', () => {
    expect(isFullDigest('a'.repeat(40))).toBe(true)
    expect(isFullDigest('a'.repeat(39))).toBe(false)
    expect(isFullDigest('g'.repeat(40))).toBe(false)
  })

  it('compares byte arrays', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true)
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false)
    expect(bytesEqual(new Uint8Array([1]), new Uint8Array([1, 2]))).toBe(false)
  })
})
