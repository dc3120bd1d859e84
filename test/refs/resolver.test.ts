import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { RefResolver, isValidRefName, parsePackedRefs } from '../../src/refs/resolver'
import { RefError } from '../../src/errors'
import { createGitDir, createTempDir, rejectionOf, removeTempDir } from '../helpers/fixtures'

const commitA = 'a'.repeat(40)
const commitB = 'b'.repeat(40)
const commitC = 'c'.repeat(40)

function codeOf(error: unknown): string | undefined {
  return error instanceof RefError ? error.code : undefined
}

describe('refs', () => {
  describe('isValidRefName', () => {
    it('accepts ordinary branch names', () => {
      expect(isValidRefName('master')).toBe(true)
      expect(isValidRefName('feature/login-form')).toBe(true)
      expect(isValidRefName('v1.2')).toBe(true)
    })

    it('rejects names git refuses', () => {
      for (const name of ['', '@', 'a..b', 'a b', 'a~1', 'a^', 'a:b', 'a?', 'a*', 'a[', 'a\\b', 'x.lock', 'x/', '/x', 'a//b', '.hidden', 'a/.b', 'a.', 'a@{1}']) {
        expect(isValidRefName(name), name).toBe(false)
      }
    })
  })

  describe('parsePackedRefs', () => {
    it('skips comments and peeled lines', () => {
      const refs = parsePackedRefs(
        '# pack-refs with: peeled fully-peeled sorted\n' +
          `${commitA} refs/heads/master\n` +
          `${commitB} refs/tags/v1\n` +
          `^${commitC}\n`
      )
      expect([...refs.entries()]).toEqual([
        ['refs/heads/master', commitA],
        ['refs/tags/v1', commitB],
      ])
    })
  })

  describe('RefResolver', () => {
    let base: string
    let gitDir: string
    let refs: RefResolver

    beforeEach(async () => {
      base = await createTempDir()
      gitDir = await createGitDir(base, { bare: true })
      refs = new RefResolver({ gitDir })
    })

    afterEach(async () => {
      await removeTempDir(base)
    })

    it('maps branches to files under refs/heads', () => {
      expect(refs.headPath('feature/x')).toBe(path.join(gitDir, 'refs', 'heads', 'feature', 'x'))
      expect(refs.lockPath('master')).toBe(path.join(gitDir, 'refs', 'heads', 'master.lock'))
    })

    it('rejects invalid branch names', () => {
      try {
        refs.headPath('bad..name')
        expect.unreachable()
      } catch (error) {
        expect(codeOf(error)).toBe('INVALID_NAME')
        expect(error instanceof RefError && error.refName).toBe('bad..name')
      }
    })

    it('reads null for a branch that does not exist', async () => {
      expect(await refs.readHead('master')).toBeNull()
    })

    it('writes and reads back the pointer', async () => {
      await refs.writeHead('master', commitA)
      expect(await refs.readHead('master')).toBe(commitA)
      expect(await fs.readFile(refs.headPath('master'), 'utf8')).toBe(commitA)
    })

    it('trims whitespace written by other tools', async () => {
      await fs.writeFile(refs.headPath('master'), `${commitA}\n`)
      expect(await refs.readHead('master')).toBe(commitA)
    })

    it('creates directories for nested branch names', async () => {
      await refs.writeHead('feature/x', commitB)
      expect(await refs.readHead('feature/x')).toBe(commitB)
    })

    it('falls back to packed-refs', async () => {
      await fs.writeFile(path.join(gitDir, 'packed-refs'), `${commitC} refs/heads/master\n`)
      expect(await refs.readHead('master')).toBe(commitC)
    })

    it('prefers the loose file over packed-refs', async () => {
      await fs.writeFile(path.join(gitDir, 'packed-refs'), `${commitC} refs/heads/master\n`)
      await refs.writeHead('master', commitA)
      expect(await refs.readHead('master')).toBe(commitA)
    })

    it('rejects ids that are not full digests', async () => {
      expect(codeOf(await rejectionOf(refs.writeHead('master', 'abc')))).toBe('INVALID_SHA')
      expect(codeOf(await rejectionOf(refs.writeHead('master', 'A'.repeat(40))))).toBe('INVALID_SHA')
    })

    it('reports write failures', async () => {
      await fs.writeFile(refs.headPath('feature'), commitA)
      const error = await rejectionOf(refs.writeHead('feature/x', commitB))
      expect(codeOf(error)).toBe('WRITE_FAILED')
      expect(error instanceof RefError && error.cause).toBeInstanceOf(Error)
    })

    it('lists loose and packed branches', async () => {
      await refs.writeHead('master', commitA)
      await refs.writeHead('feature/x', commitB)
      await fs.writeFile(
        path.join(gitDir, 'packed-refs'),
        `${commitC} refs/heads/release\n${commitC} refs/heads/master\n${commitC} refs/tags/v1\n`
      )
      expect(await refs.listBranches()).toEqual(['feature/x', 'master', 'release'])
    })
  })
})
