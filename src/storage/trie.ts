/**
 * @fileoverview Hex prefix trie for abbreviated object lookups
 *
 * A 16-ary radix tree keyed by lowercase hex strings. Lookups walk one node
 * per key character and then collect the matched subtree, so the cost of
 * `find` does not depend on how many entries the trie holds.
 *
 * @module storage/trie
 *
 * @example
 * ```typescript
 * const trie = new PrefixTrie<number>()
 * trie.insert('a94a8fe5ccb19ba61c4c0873d391e987982fbbd3', 1)
 * trie.insert('a94b0000000000000000000000000000000000aa', 2)
 *
 * trie.find('a94a8')  // [['a94a8fe5...', 1]]
 * trie.find('a94')    // both entries
 * ```
 */

import { InvalidArgumentError } from '../errors'
import { isHex } from '../utils/hash'

interface TrieNode<V> {
  children: Array<TrieNode<V> | undefined>
  /** Present when a key ends at this node */
  entry?: { key: string; value: V }
}

function createNode<V>(): TrieNode<V> {
  return { children: new Array<TrieNode<V> | undefined>(16) }
}

function nibble(char: string): number {
  return parseInt(char, 16)
}

export class PrefixTrie<V> {
  private root: TrieNode<V> = createNode()
  private count = 0

  /** Number of keys stored */
  get size(): number {
    return this.count
  }

  /**
   * Inserts or replaces the value under `key`.
   *
   * @throws {InvalidArgumentError} When `key` is empty or not lowercase hex
   */
  insert(key: string, value: V): void {
    if (!isHex(key)) {
      throw new InvalidArgumentError(`Trie keys must be lowercase hex: '${key}'`)
    }

    let node = this.root
    for (const char of key) {
      const index = nibble(char)
      let child = node.children[index]
      if (!child) {
        child = createNode()
        node.children[index] = child
      }
      node = child
    }

    if (!node.entry) {
      this.count++
    }
    node.entry = { key, value }
  }

  /**
   * All entries whose key starts with `prefix`, in key order.
   *
   * A full key matches itself (and any longer keys sharing it as a prefix).
   * Keys that are not lowercase hex match nothing.
   */
  find(prefix: string): Array<[string, V]> {
    const node = this.walk(prefix)
    if (!node) return []

    const results: Array<[string, V]> = []
    collect(node, results)
    return results
  }

  /** Value stored under exactly `key` */
  get(key: string): V | undefined {
    return this.walk(key)?.entry?.value
  }

  has(key: string): boolean {
    return this.walk(key)?.entry !== undefined
  }

  /**
   * Removes `key`, pruning nodes left without entries or children.
   *
   * @returns true when the key was present
   */
  delete(key: string): boolean {
    if (!isHex(key)) return false

    const path: TrieNode<V>[] = [this.root]
    let node = this.root
    for (const char of key) {
      const child = node.children[nibble(char)]
      if (!child) return false
      path.push(child)
      node = child
    }
    if (!node.entry) return false

    node.entry = undefined
    this.count--

    for (let depth = key.length; depth > 0; depth--) {
      const current = path[depth]
      if (current.entry || current.children.some(child => child !== undefined)) break
      path[depth - 1].children[nibble(key[depth - 1])] = undefined
    }
    return true
  }

  clear(): void {
    this.root = createNode()
    this.count = 0
  }

  /** Every stored key, in key order */
  keys(): string[] {
    return this.find('').map(([key]) => key)
  }

  private walk(prefix: string): TrieNode<V> | undefined {
    if (prefix.length > 0 && !isHex(prefix)) return undefined

    let node: TrieNode<V> | undefined = this.root
    for (const char of prefix) {
      node = node.children[nibble(char)]
      if (!node) return undefined
    }
    return node
  }
}

function collect<V>(node: TrieNode<V>, results: Array<[string, V]>): void {
  if (node.entry) {
    results.push([node.entry.key, node.entry.value])
  }
  for (const child of node.children) {
    if (child) collect(child, results)
  }
}
