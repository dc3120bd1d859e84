/**
 * Shared test fixtures: temporary git directories and in-process pack archives.
 */

import { createHash } from 'crypto'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import pako from 'pako'
import type { VersionControlClient } from '../../src/vcs/client'
import { createLogger, LogLevel, type LogEntry, type Logger } from '../../src/utils/logger'

const encoder = new TextEncoder()

export function text(value: string): Uint8Array {
  return encoder.encode(value)
}

export function sha1Hex(data: Uint8Array): string {
  return createHash('sha1').update(data).digest('hex')
}

/** Git id computed independently of the code under test */
export function gitId(type: string, data: Uint8Array): string {
  const header = encoder.encode(`${type} ${data.length}\0`)
  return createHash('sha1').update(header).update(data).digest('hex')
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'treestore-test-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/**
 * Minimal git directory: objects/, objects/pack and refs/heads.
 */
export async function createGitDir(base: string, options: { bare?: boolean } = {}): Promise<string> {
  const gitDir = options.bare ? base : path.join(base, '.git')
  await fs.mkdir(path.join(gitDir, 'objects', 'pack'), { recursive: true })
  await fs.mkdir(path.join(gitDir, 'refs', 'heads'), { recursive: true })
  await fs.writeFile(path.join(gitDir, 'HEAD'), 'ref: refs/heads/master\n')
  return gitDir
}

/**
 * Writes a loose object with an arbitrary (possibly invalid) envelope.
 */
export async function writeLooseObject(objectsDir: string, id: string, stored: Uint8Array): Promise<string> {
  const file = path.join(objectsDir, id.slice(0, 2), id.slice(2))
  await fs.mkdir(path.dirname(file), { recursive: true })
  await fs.writeFile(file, stored)
  return file
}

// ============================================================================
// Delta Builders
// ============================================================================

function varint(value: number): number[] {
  const bytes: number[] = []
  do {
    let byte = value & 0x7f
    value >>>= 7
    if (value > 0) byte |= 0x80
    bytes.push(byte)
  } while (value > 0)
  return bytes
}

export type DeltaOp = { copy: [offset: number, size: number] } | { insert: Uint8Array }

/**
 * Builds delta bytes from copy/insert operations. Copy offsets and sizes
 * must fit in one byte each.
 */
export function buildDelta(sourceSize: number, targetSize: number, ops: DeltaOp[]): Uint8Array {
  const bytes = [...varint(sourceSize), ...varint(targetSize)]
  for (const op of ops) {
    if ('copy' in op) {
      const [offset, size] = op.copy
      bytes.push(0x80 | 0x01 | 0x10, offset, size)
    } else {
      bytes.push(op.insert.length, ...op.insert)
    }
  }
  return new Uint8Array(bytes)
}

// ============================================================================
// Pack Builders
// ============================================================================

const TYPE_CODES: Record<string, number> = { commit: 1, tree: 2, blob: 3, tag: 4 }

export type PackFixtureEntry =
  | { kind: 'object'; type: string; data: Uint8Array }
  /** Delta against the entry at index `base`; `type`/`data` describe the result */
  | { kind: 'ofs-delta'; base: number; delta: Uint8Array; type: string; data: Uint8Array }
  | { kind: 'ref-delta'; baseId: string; delta: Uint8Array; type: string; data: Uint8Array }

export interface BuiltPack {
  pack: Uint8Array
  idx: Uint8Array
  /** Object ids, in entry order */
  ids: string[]
  /** Entry offsets, in entry order */
  offsets: number[]
}

function entryHeader(typeCode: number, size: number): number[] {
  const bytes: number[] = []
  let byte = (typeCode << 4) | (size & 0x0f)
  size = Math.floor(size / 16)
  while (size > 0) {
    bytes.push(byte | 0x80)
    byte = size & 0x7f
    size = Math.floor(size / 128)
  }
  bytes.push(byte)
  return bytes
}

function offsetEncoding(distance: number): number[] {
  const bytes = [distance & 0x7f]
  let n = Math.floor(distance / 128)
  while (n > 0) {
    n--
    bytes.unshift(0x80 | (n & 0x7f))
    n = Math.floor(n / 128)
  }
  return bytes
}

function concat(parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0))
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

function uint32(value: number): Uint8Array {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setUint32(0, value, false)
  return bytes
}

function hexBytes(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(hex, 'hex'))
}

/**
 * Builds a version 2 pack and matching index entirely in memory.
 */
export function buildPack(entries: PackFixtureEntry[]): BuiltPack {
  const parts: Uint8Array[] = [text('PACK'), uint32(2), uint32(entries.length)]
  let position = 12
  const ids: string[] = []
  const offsets: number[] = []

  for (const entry of entries) {
    offsets.push(position)
    ids.push(gitId(entry.type, entry.data))

    let header: number[]
    let payload: Uint8Array
    if (entry.kind === 'object') {
      header = entryHeader(TYPE_CODES[entry.type], entry.data.length)
      payload = entry.data
    } else if (entry.kind === 'ofs-delta') {
      header = [...entryHeader(6, entry.delta.length), ...offsetEncoding(position - offsets[entry.base])]
      payload = entry.delta
    } else {
      header = [...entryHeader(7, entry.delta.length), ...hexBytes(entry.baseId)]
      payload = entry.delta
    }

    const bytes = concat([new Uint8Array(header), pako.deflate(payload)])
    parts.push(bytes)
    position += bytes.length
  }

  const body = concat(parts)
  const packChecksum = hexBytes(sha1Hex(body))
  const pack = concat([body, packChecksum])

  return { pack, idx: buildIndex(ids, offsets, packChecksum), ids, offsets }
}

/**
 * Version 2 index for the given ids and offsets (CRCs are zero).
 */
export function buildIndex(ids: string[], offsets: number[], packChecksum: Uint8Array): Uint8Array {
  const order = ids.map((id, i) => ({ id, offset: offsets[i] })).sort((a, b) => (a.id < b.id ? -1 : 1))

  const fanout = new Array<number>(256).fill(0)
  for (const { id } of order) {
    fanout[parseInt(id.slice(0, 2), 16)]++
  }
  for (let i = 1; i < 256; i++) fanout[i] += fanout[i - 1]

  const parts: Uint8Array[] = [new Uint8Array([0xff, 0x74, 0x4f, 0x63]), uint32(2)]
  for (const count of fanout) parts.push(uint32(count))
  for (const { id } of order) parts.push(hexBytes(id))
  for (let i = 0; i < order.length; i++) parts.push(uint32(0))
  for (const { offset } of order) parts.push(uint32(offset))
  parts.push(packChecksum)

  const body = concat(parts)
  return concat([body, hexBytes(sha1Hex(body))])
}

/**
 * Writes `objects/pack/pack-<name>.{pack,idx}` and returns the pack path.
 */
export async function writePack(objectsDir: string, name: string, built: BuiltPack): Promise<string> {
  const packDir = path.join(objectsDir, 'pack')
  await fs.mkdir(packDir, { recursive: true })
  const packPath = path.join(packDir, `pack-${name}.pack`)
  await fs.writeFile(packPath, built.pack)
  await fs.writeFile(path.join(packDir, `pack-${name}.idx`), built.idx)
  return packPath
}

// ============================================================================
// Assertions
// ============================================================================

/**
 * The rejection reason of `promise`. Fails when it resolves.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('Expected the promise to reject')
}

/**
 * Recomputes the trailing SHA-1 of an index (or pack) after a test edits it.
 */
export function resign(data: Uint8Array): Uint8Array {
  const body = data.subarray(0, data.length - 20)
  const result = new Uint8Array(data.length)
  result.set(body)
  result.set(hexBytes(sha1Hex(body)), body.length)
  return result
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * In-memory {@link VersionControlClient}. Override methods with `vi.spyOn`.
 */
export function fakeClient(
  config: Record<string, string> = { 'user.name': 'Test User', 'user.email': 'test@example.com' }
): VersionControlClient {
  return {
    async log() {
      return []
    },
    async diff(from, to) {
      return { from, to, patch: '', paths: [] }
    },
    async configGet(key) {
      return config[key] ?? null
    },
    async init() {
      // nothing to create
    },
  }
}

/**
 * Logger that keeps every entry, at every level.
 */
export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger({ minLevel: LogLevel.DEBUG, handler: entry => entries.push(entry) })
  return { logger, entries }
}
