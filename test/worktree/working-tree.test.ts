import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { WorkingTree } from '../../src/worktree/working-tree'
import { ObjectStore } from '../../src/storage/object-store'
import { InvalidArgumentError } from '../../src/errors'
import { createTempDir, gitId, removeTempDir, text } from '../helpers/fixtures'

const EMPTY_TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904'

function treeEntry(mode: string, name: string, id: string): Uint8Array {
  return Uint8Array.from([...text(`${mode} ${name}\0`), ...Buffer.from(id, 'hex')])
}

describe('WorkingTree', () => {
  let objectsDir: string
  let store: ObjectStore

  beforeEach(async () => {
    objectsDir = await createTempDir()
    store = await ObjectStore.open({ objectsDir })
  })

  afterEach(async () => {
    await store.close()
    await removeTempDir(objectsDir)
  })

  describe('save', () => {
    it('stores the empty tree for an empty root', async () => {
      const tree = WorkingTree.empty(store)
      expect(await tree.save()).toBe(EMPTY_TREE)
      expect(tree.id).toBe(EMPTY_TREE)
    })

    it('stores files as blobs under a tree', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('a', 'b')
      const blobId = gitId('blob', text('b'))

      expect(await tree.save()).toBe(gitId('tree', treeEntry('100644', 'a', blobId)))
      expect((await store.getBlob(blobId))?.data).toEqual(text('b'))
    })

    it('stores nested directories', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('docs/readme.txt', 'hi')
      const blobId = gitId('blob', text('hi'))
      const docsId = gitId('tree', treeEntry('100644', 'readme.txt', blobId))

      expect(await tree.save()).toBe(gitId('tree', treeEntry('40000', 'docs', docsId)))
    })

    it('drops directories left empty', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('d/x', '1')
      await tree.save()

      expect(await tree.delete('d/x')).toBe(true)
      expect(await tree.save()).toBe(EMPTY_TREE)
      expect(await tree.list()).toEqual([])
    })

    it('keeps the stored id when nothing changed', async () => {
      const first = WorkingTree.empty(store)
      await first.set('a', 'b')
      const id = await first.save()

      const loaded = WorkingTree.load(store, id)
      expect(await loaded.save()).toBe(id)
    })

    it('clears the modified flag', async () => {
      const tree = WorkingTree.empty(store)
      expect(tree.modified).toBe(false)
      await tree.set('a', 'b')
      expect(tree.modified).toBe(true)
      await tree.save()
      expect(tree.modified).toBe(false)
    })
  })

  describe('reading', () => {
    let treeId: string

    beforeEach(async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('docs/readme.txt', 'hello')
      await tree.set('run.sh', '#!/bin/sh', '100755')
      treeId = await tree.save()
    })

    it('loads contents lazily from a stored tree', async () => {
      const tree = WorkingTree.load(store, treeId)
      expect(await tree.getText('docs/readme.txt')).toBe('hello')
      expect(await tree.get('docs/readme.txt')).toEqual(text('hello'))
    })

    it('lists directories in name order', async () => {
      const tree = WorkingTree.load(store, treeId)
      expect(await tree.list()).toEqual([
        { name: 'docs', type: 'dir', mode: '40000' },
        { name: 'run.sh', type: 'file', mode: '100755' },
      ])
      expect(await tree.list('docs')).toEqual([{ name: 'readme.txt', type: 'file', mode: '100644' }])
    })

    it('returns null for paths that are not there', async () => {
      const tree = WorkingTree.load(store, treeId)
      expect(await tree.get('missing')).toBeNull()
      expect(await tree.get('docs')).toBeNull()
      expect(await tree.list('run.sh')).toBeNull()
      expect(await tree.get('run.sh/x')).toBeNull()
    })

    it('reports existence of files and directories', async () => {
      const tree = WorkingTree.load(store, treeId)
      expect(await tree.has('docs')).toBe(true)
      expect(await tree.has('docs/readme.txt')).toBe(true)
      expect(await tree.has('docs/other')).toBe(false)
    })

    it('ignores leading and doubled slashes', async () => {
      const tree = WorkingTree.load(store, treeId)
      expect(await tree.getText('/docs//readme.txt')).toBe('hello')
    })
  })

  describe('editing', () => {
    it('overwrites files', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('a', '1')
      await tree.set('a', '2')
      expect(await tree.getText('a')).toBe('2')
    })

    it('replaces a file standing where a directory is needed', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('a', '1')
      await tree.set('a/b', '2')
      expect(await tree.get('a')).toBeNull()
      expect(await tree.getText('a/b')).toBe('2')
    })

    it('accepts binary content', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('bin', new Uint8Array([0, 255]))
      expect(await tree.get('bin')).toEqual(new Uint8Array([0, 255]))
    })

    it('keeps its own copy of binary content', async () => {
      const tree = WorkingTree.empty(store)
      const content = text('hello')
      await tree.set('greeting', content)
      content[0] = 0x4a

      expect(await tree.getText('greeting')).toBe('hello')
      await tree.save()
      expect((await store.getBlob(gitId('blob', text('hello'))))?.data).toEqual(text('hello'))
    })

    it('deletes directories with their contents', async () => {
      const tree = WorkingTree.empty(store)
      await tree.set('d/x', '1')
      await tree.set('y', '2')
      expect(await tree.delete('d')).toBe(true)
      expect(await tree.has('d/x')).toBe(false)
      expect(await tree.list()).toEqual([{ name: 'y', type: 'file', mode: '100644' }])
    })

    it('reports deletes of missing paths', async () => {
      const tree = WorkingTree.empty(store)
      expect(await tree.delete('nothing')).toBe(false)
      expect(await tree.delete('no/such/file')).toBe(false)
      expect(tree.modified).toBe(false)
    })

    it('rejects the root and relative components', async () => {
      const tree = WorkingTree.empty(store)
      await expect(tree.set('', 'x')).rejects.toThrow(InvalidArgumentError)
      await expect(tree.set('a/../b', 'x')).rejects.toThrow(InvalidArgumentError)
      await expect(tree.delete('/')).rejects.toThrow(InvalidArgumentError)
    })

    it('marks a loaded tree modified after a delete', async () => {
      const first = WorkingTree.empty(store)
      await first.set('a', '1')
      await first.set('b', '2')
      const id = await first.save()

      const tree = WorkingTree.load(store, id)
      await tree.delete('a')
      expect(tree.modified).toBe(true)
      expect(await tree.save()).toBe(gitId('tree', treeEntry('100644', 'b', gitId('blob', text('2')))))
    })
  })
})
