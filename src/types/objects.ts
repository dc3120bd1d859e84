/**
 * @fileoverview Git object types and payload codecs
 *
 * Decoded objects form a closed tagged union over the four git type tags.
 * Every variant carries its id and the raw payload bytes it was decoded from;
 * tree, commit and tag variants also expose their parsed fields.
 *
 * The codecs here work on *payloads* (the bytes after the `"<type> <size>\0"`
 * header). Envelope framing lives in `objects/envelope`.
 *
 * @module types/objects
 *
 * @example
 * ```typescript
 * import { parseObject } from './types/objects'
 *
 * const obj = parseObject('tree', id, payload)
 * switch (obj.type) {
 *   case 'tree':
 *     obj.entries.forEach(e => console.log(e.mode, e.name))
 *     break
 *   case 'blob':
 *     console.log(new TextDecoder().decode(obj.data))
 *     break
 * }
 * ```
 */

import { CorruptObjectError } from '../errors'
import { bytesToHex, hexToBytes, isFullDigest } from '../utils/hash'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * The four git object types.
 */
export type ObjectType = 'blob' | 'tree' | 'commit' | 'tag'

export const OBJECT_TYPES: readonly ObjectType[] = ['blob', 'tree', 'commit', 'tag']

export function isValidObjectType(type: string): type is ObjectType {
  return OBJECT_TYPES.some(known => known === type)
}

// ============================================================================
// Identity
// ============================================================================

/**
 * Author or committer stamp of a commit (tagger of a tag).
 */
export interface Identity {
  name: string
  email: string
  /** Unix timestamp in seconds */
  timestamp: number
  /** Offset from UTC in `+HHMM` / `-HHMM` form */
  timezone: string
}

/**
 * Builds an {@link Identity} stamped with `date` in the local timezone.
 */
export function createIdentity(name: string, email: string, date: Date = new Date()): Identity {
  const offset = -date.getTimezoneOffset()
  const sign = offset < 0 ? '-' : '+'
  const hours = String(Math.floor(Math.abs(offset) / 60)).padStart(2, '0')
  const minutes = String(Math.abs(offset) % 60).padStart(2, '0')
  return {
    name,
    email,
    timestamp: Math.floor(date.getTime() / 1000),
    timezone: `${sign}${hours}${minutes}`,
  }
}

function formatIdentity(prefix: string, identity: Identity): string {
  return `${prefix} ${identity.name} <${identity.email}> ${identity.timestamp} ${identity.timezone}`
}

function parseIdentityLine(line: string, id: string): Identity {
  const match = line.match(/^(?:author|committer|tagger) (.*) <(.*)> (\d+) ([+-]\d{4})$/)
  if (!match) {
    throw new CorruptObjectError(`Invalid identity line: ${line}`, 'MALFORMED', { id })
  }
  return {
    name: match[1],
    email: match[2],
    timestamp: parseInt(match[3], 10),
    timezone: match[4],
  }
}

// ============================================================================
// Object Variants
// ============================================================================

/**
 * Tree entry modes.
 */
export const FILE_MODE = '100644'
export const EXECUTABLE_MODE = '100755'
export const TREE_MODE = '40000'

export interface TreeEntry {
  /** Octal mode without leading zeros, as git writes it (`100644`, `40000`) */
  mode: string
  /** Entry name, no path separators */
  name: string
  /** 40-character id of the referenced blob or tree */
  id: string
}

interface ObjectBase {
  /** 40-character lowercase hex id */
  id: string
  /** Raw payload (envelope header excluded) */
  data: Uint8Array
}

export interface BlobObject extends ObjectBase {
  type: 'blob'
}

export interface TreeObject extends ObjectBase {
  type: 'tree'
  entries: TreeEntry[]
}

export interface CommitObject extends ObjectBase {
  type: 'commit'
  /** Id of the root tree */
  tree: string
  /** Parent commit ids, empty for a root commit */
  parents: string[]
  author: Identity
  committer: Identity
  message: string
}

export interface TagObject extends ObjectBase {
  type: 'tag'
  /** Id of the tagged object */
  object: string
  objectType: ObjectType
  name: string
  tagger?: Identity
  message: string
}

export type GitObject = BlobObject | TreeObject | CommitObject | TagObject

// ============================================================================
// Serialization
// ============================================================================

function isTreeMode(mode: string): boolean {
  return mode === TREE_MODE || mode === '040000'
}

function treeSortKey(entry: TreeEntry): Uint8Array {
  return encoder.encode(isTreeMode(entry.mode) ? `${entry.name}/` : entry.name)
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return a.length - b.length
}

/**
 * Serializes tree entries into a tree payload.
 *
 * Entries are ordered the way git orders them: byte-wise by name, with
 * sub-trees compared as if their name ended in `/`.
 * Each entry is `"<mode> <name>\0"` followed by the 20-byte binary id.
 */
export function serializeTree(entries: TreeEntry[]): Uint8Array {
  const sorted = [...entries].sort((a, b) => compareBytes(treeSortKey(a), treeSortKey(b)))

  const parts: Uint8Array[] = []
  let length = 0
  for (const entry of sorted) {
    if (!isFullDigest(entry.id)) {
      throw new CorruptObjectError(`Invalid id in tree entry ${entry.name}: ${entry.id}`, 'MALFORMED')
    }
    const modeName = encoder.encode(`${entry.mode} ${entry.name}\0`)
    parts.push(modeName, hexToBytes(entry.id))
    length += modeName.length + 20
  }

  const payload = new Uint8Array(length)
  let offset = 0
  for (const part of parts) {
    payload.set(part, offset)
    offset += part.length
  }
  return payload
}

/**
 * Serializes a commit payload. The message is terminated with a newline.
 */
export function serializeCommit(commit: Omit<CommitObject, 'type' | 'data' | 'id'>): Uint8Array {
  const lines: string[] = [`tree ${commit.tree}`]
  for (const parent of commit.parents) {
    lines.push(`parent ${parent}`)
  }
  lines.push(formatIdentity('author', commit.author))
  lines.push(formatIdentity('committer', commit.committer))
  lines.push('')
  lines.push(commit.message.endsWith('\n') ? commit.message : `${commit.message}\n`)
  return encoder.encode(lines.join('\n'))
}

export function serializeTag(tag: Omit<TagObject, 'type' | 'data' | 'id'>): Uint8Array {
  const lines: string[] = [
    `object ${tag.object}`,
    `type ${tag.objectType}`,
    `tag ${tag.name}`,
  ]
  if (tag.tagger) {
    lines.push(formatIdentity('tagger', tag.tagger))
  }
  lines.push('')
  lines.push(tag.message.endsWith('\n') ? tag.message : `${tag.message}\n`)
  return encoder.encode(lines.join('\n'))
}

// ============================================================================
// Parsing
// ============================================================================

function parseTreeEntries(id: string, data: Uint8Array): TreeEntry[] {
  const entries: TreeEntry[] = []
  let offset = 0

  while (offset < data.length) {
    const nul = data.indexOf(0, offset)
    if (nul === -1 || nul + 21 > data.length) {
      throw new CorruptObjectError(`Truncated tree entry at byte ${offset}`, 'MALFORMED', { id })
    }
    const modeName = decoder.decode(data.subarray(offset, nul))
    const space = modeName.indexOf(' ')
    if (space <= 0) {
      throw new CorruptObjectError(`Invalid tree entry: ${modeName}`, 'MALFORMED', { id })
    }
    entries.push({
      mode: modeName.slice(0, space),
      name: modeName.slice(space + 1),
      id: bytesToHex(data.subarray(nul + 1, nul + 21)),
    })
    offset = nul + 21
  }

  return entries
}

/**
 * Splits a commit or tag payload into header lines and message.
 */
function splitHeaders(data: Uint8Array): { headers: string[]; message: string } {
  const text = decoder.decode(data)
  const separator = text.indexOf('\n\n')
  const head = separator === -1 ? text : text.slice(0, separator)
  const body = separator === -1 ? '' : text.slice(separator + 2)
  return {
    headers: head.split('\n').filter(line => line.length > 0),
    message: body.endsWith('\n') ? body.slice(0, -1) : body,
  }
}

function parseCommitFields(id: string, data: Uint8Array): Omit<CommitObject, 'type' | 'data' | 'id'> {
  const { headers, message } = splitHeaders(data)
  let tree: string | null = null
  const parents: string[] = []
  let author: Identity | null = null
  let committer: Identity | null = null

  for (const line of headers) {
    if (line.startsWith('tree ')) {
      tree = line.slice(5)
    } else if (line.startsWith('parent ')) {
      parents.push(line.slice(7))
    } else if (line.startsWith('author ')) {
      author = parseIdentityLine(line, id)
    } else if (line.startsWith('committer ')) {
      committer = parseIdentityLine(line, id)
    }
  }

  if (!tree || !author || !committer) {
    throw new CorruptObjectError('Invalid commit: missing tree, author or committer', 'MALFORMED', { id })
  }
  return { tree, parents, author, committer, message }
}

function parseTagFields(id: string, data: Uint8Array): Omit<TagObject, 'type' | 'data' | 'id'> {
  const { headers, message } = splitHeaders(data)
  let object: string | null = null
  let objectType: ObjectType | null = null
  let name: string | null = null
  let tagger: Identity | undefined

  for (const line of headers) {
    if (line.startsWith('object ')) {
      object = line.slice(7)
    } else if (line.startsWith('type ')) {
      const type = line.slice(5)
      if (!isValidObjectType(type)) {
        throw new CorruptObjectError(`Invalid tag target type: ${type}`, 'MALFORMED', { id })
      }
      objectType = type
    } else if (line.startsWith('tag ')) {
      name = line.slice(4)
    } else if (line.startsWith('tagger ')) {
      tagger = parseIdentityLine(line, id)
    }
  }

  if (!object || !objectType || name === null) {
    throw new CorruptObjectError('Invalid tag: missing object, type or name', 'MALFORMED', { id })
  }
  return { object, objectType, name, ...(tagger && { tagger }), message }
}

/**
 * Decodes a payload into its typed variant.
 *
 * @throws {CorruptObjectError} When the type tag is unknown or the payload
 * cannot be parsed as that type
 */
export function parseObject(type: string, id: string, data: Uint8Array): GitObject {
  switch (type) {
    case 'blob':
      return { type, id, data }
    case 'tree':
      return { type, id, data, entries: parseTreeEntries(id, data) }
    case 'commit':
      return { type, id, data, ...parseCommitFields(id, data) }
    case 'tag':
      return { type, id, data, ...parseTagFields(id, data) }
    default:
      throw new CorruptObjectError(`Unknown object type: ${type}`, 'UNKNOWN_TYPE', { id })
  }
}

export function isTreeEntryDirectory(entry: TreeEntry): boolean {
  return isTreeMode(entry.mode)
}
