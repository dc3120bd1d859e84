/**
 * @fileoverview Mutable in-memory snapshot of a tree
 *
 * A {@link WorkingTree} starts from a tree id and loads directories and file
 * contents on first access. Edits are kept in memory and marked modified up
 * to the root; {@link WorkingTree.save} writes the changed blobs and trees
 * bottom-up and returns the new root tree id.
 *
 * @module worktree/working-tree
 *
 * @example
 * ```typescript
 * const tree = WorkingTree.load(store, commit.tree)
 * await tree.set('docs/readme.txt', 'hello')
 * await tree.delete('old.txt')
 * const treeId = await tree.save()
 * ```
 */

import { InvalidArgumentError, ObjectNotFoundError } from '../errors'
import type { ObjectStore } from '../storage/object-store'
import { FILE_MODE, isTreeEntryDirectory, serializeTree, TREE_MODE, type TreeEntry } from '../types/objects'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

interface FileNode {
  kind: 'file'
  mode: string
  /** Blob id, absent until a new file is saved */
  id?: string
  /** Loaded or assigned content */
  content?: Uint8Array
}

interface DirNode {
  kind: 'dir'
  /** Tree id, absent for a directory created in memory */
  id?: string
  /** Loaded children, absent until first access */
  children?: Map<string, Node>
  modified: boolean
}

type Node = FileNode | DirNode

/**
 * One entry returned by {@link WorkingTree.list}.
 */
export interface WorkingTreeEntry {
  name: string
  type: 'file' | 'dir'
  mode: string
}

function splitPath(filePath: string): string[] {
  const parts = filePath.split('/').filter(part => part.length > 0)
  for (const part of parts) {
    if (part === '.' || part === '..' || part.includes('\0')) {
      throw new InvalidArgumentError(`Invalid path component '${part}' in ${filePath}`)
    }
  }
  return parts
}

export class WorkingTree {
  private root: DirNode

  private constructor(
    private readonly store: ObjectStore,
    rootId?: string
  ) {
    this.root = { kind: 'dir', ...(rootId !== undefined && { id: rootId }), modified: false }
  }

  /**
   * An empty tree with nothing loaded from disk.
   */
  static empty(store: ObjectStore): WorkingTree {
    const tree = new WorkingTree(store)
    tree.root.children = new Map()
    return tree
  }

  /**
   * A tree backed by the stored tree `treeId`. Nothing is read until first access.
   */
  static load(store: ObjectStore, treeId: string): WorkingTree {
    return new WorkingTree(store, treeId)
  }

  /** Id of the root tree as last loaded or saved, undefined for an unsaved tree */
  get id(): string | undefined {
    return this.root.id
  }

  /** True when something changed since the tree was loaded or saved */
  get modified(): boolean {
    return this.root.modified
  }

  /**
   * Content of the file at `filePath`, or null when there is no file there.
   */
  async get(filePath: string): Promise<Uint8Array | null> {
    const node = await this.lookup(splitPath(filePath))
    if (!node || node.kind !== 'file') return null
    return this.readFile(node)
  }

  async getText(filePath: string): Promise<string | null> {
    const content = await this.get(filePath)
    return content === null ? null : decoder.decode(content)
  }

  /**
   * True when a file or directory exists at `filePath`.
   */
  async has(filePath: string): Promise<boolean> {
    return (await this.lookup(splitPath(filePath))) !== null
  }

  /**
   * Entries of the directory at `dirPath` (the root by default), sorted by name.
   *
   * @returns null when `dirPath` is not a directory
   */
  async list(dirPath = ''): Promise<WorkingTreeEntry[] | null> {
    const node = await this.lookup(splitPath(dirPath))
    if (!node || node.kind !== 'dir') return null

    const children = await this.children(node)
    return [...children.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, child]) => ({
        name,
        type: child.kind,
        mode: child.kind === 'dir' ? TREE_MODE : child.mode,
      }))
  }

  /**
   * Writes a file, creating parent directories. A file in the way of a parent
   * directory is replaced.
   */
  async set(filePath: string, content: Uint8Array | string, mode: string = FILE_MODE): Promise<void> {
    const parts = splitPath(filePath)
    if (parts.length === 0) {
      throw new InvalidArgumentError('Cannot write to the root of the tree')
    }

    const name = parts[parts.length - 1]
    const parent = await this.ensureDir(parts.slice(0, -1))
    const children = await this.children(parent)
    children.set(name, {
      kind: 'file',
      mode,
      content: typeof content === 'string' ? encoder.encode(content) : content.slice(),
    })
  }

  /**
   * Removes the file or directory at `filePath`.
   *
   * @returns false when nothing was there
   */
  async delete(filePath: string): Promise<boolean> {
    const parts = splitPath(filePath)
    if (parts.length === 0) {
      throw new InvalidArgumentError('Cannot delete the root of the tree')
    }

    const trail = await this.trail(parts.slice(0, -1))
    if (!trail) return false

    const parent = trail[trail.length - 1]
    const children = await this.children(parent)
    if (!children.delete(parts[parts.length - 1])) return false

    for (const dir of trail) {
      markModified(dir)
    }
    return true
  }

  /**
   * Stores every modified blob and tree, deepest first, and returns the root
   * tree id. Directories left empty are dropped; the root is stored even when
   * empty. Modified flags are cleared.
   */
  async save(): Promise<string> {
    const id = await this.saveDir(this.root)
    return id ?? this.store.put('tree', serializeTree([]))
  }

  /**
   * @returns the tree id, or null for a directory with nothing in it
   */
  private async saveDir(dir: DirNode): Promise<string | null> {
    if (!dir.modified && dir.id !== undefined) {
      return dir.id
    }

    const children = await this.children(dir)
    const entries: TreeEntry[] = []

    for (const [name, child] of [...children.entries()]) {
      if (child.kind === 'file') {
        if (child.id === undefined) {
          child.id = await this.store.put('blob', child.content ?? new Uint8Array(0))
        }
        entries.push({ mode: child.mode, name, id: child.id })
        continue
      }

      const id = await this.saveDir(child)
      if (id === null) {
        children.delete(name)
      } else {
        entries.push({ mode: TREE_MODE, name, id })
      }
    }

    dir.modified = false
    if (entries.length === 0 && dir !== this.root) {
      dir.id = undefined
      return null
    }

    dir.id = await this.store.put('tree', serializeTree(entries))
    return dir.id
  }

  private async readFile(node: FileNode): Promise<Uint8Array> {
    if (node.content === undefined) {
      if (node.id === undefined) return new Uint8Array(0)
      const blob = await this.store.getBlob(node.id)
      if (!blob) throw new ObjectNotFoundError(node.id)
      node.content = blob.data
    }
    return node.content
  }

  private async children(dir: DirNode): Promise<Map<string, Node>> {
    if (dir.children) return dir.children

    const children = new Map<string, Node>()
    if (dir.id !== undefined) {
      const tree = await this.store.getTree(dir.id)
      if (!tree) throw new ObjectNotFoundError(dir.id)
      for (const entry of tree.entries) {
        children.set(
          entry.name,
          isTreeEntryDirectory(entry)
            ? { kind: 'dir', id: entry.id, modified: false }
            : { kind: 'file', mode: entry.mode, id: entry.id }
        )
      }
    }
    dir.children = children
    return children
  }

  private async lookup(parts: string[]): Promise<Node | null> {
    let node: Node = this.root
    for (const part of parts) {
      if (node.kind !== 'dir') return null
      const child: Node | undefined = (await this.children(node)).get(part)
      if (!child) return null
      node = child
    }
    return node
  }

  /**
   * Directories from the root down to `parts`, or null when one is missing.
   */
  private async trail(parts: string[]): Promise<DirNode[] | null> {
    const dirs: DirNode[] = [this.root]
    let dir = this.root
    for (const part of parts) {
      const child = (await this.children(dir)).get(part)
      if (!child || child.kind !== 'dir') return null
      dirs.push(child)
      dir = child
    }
    return dirs
  }

  /**
   * Walks to `parts`, creating directories (or replacing files) on the way,
   * and marks every directory on the path modified.
   */
  private async ensureDir(parts: string[]): Promise<DirNode> {
    let dir = this.root
    markModified(dir)
    for (const part of parts) {
      const children = await this.children(dir)
      let child = children.get(part)
      if (!child || child.kind !== 'dir') {
        child = { kind: 'dir', children: new Map(), modified: true }
        children.set(part, child)
      }
      markModified(child)
      dir = child
    }
    return dir
  }
}

function markModified(dir: DirNode): void {
  dir.modified = true
}
