import { describe, it, expect, vi, type Mock } from 'vitest'
import { GitCliClient, execFileRunner, type CommandResult, type CommandRunner } from '../../src/vcs/git-cli'
import { LOG_FORMAT, parseLogOutput } from '../../src/vcs/client'
import { SubprocessError } from '../../src/errors'
import { rejectionOf } from '../helpers/fixtures'

const commitA = 'a'.repeat(40)
const commitB = 'b'.repeat(40)
const treeT = 'c'.repeat(40)

function ok(stdout: string): CommandResult {
  return { stdout, stderr: '', exitCode: 0 }
}

function clientWith(...results: CommandResult[]): { client: GitCliClient; runner: Mock<CommandRunner> } {
  const runner = vi.fn<CommandRunner>()
  for (const result of results) {
    runner.mockResolvedValueOnce(result)
  }
  const client = new GitCliClient({ gitDir: '/repo/.git', cwd: '/repo', runner, env: { PATH: '/usr/bin' } })
  return { client, runner }
}

const logOutput =
  `${commitB}\n${commitA}\n${treeT}\nAlice\nalice@example.com\n1700000000\nBob\nbob@example.com\n1700000100\n` +
  '\x00second\nbody line\n\x00\n' +
  `${commitA}\n\n${treeT}\nAlice\nalice@example.com\n1600000000\nAlice\nalice@example.com\n1600000000\n` +
  '\x00first\n\x00\n'

describe('GitCliClient', () => {
  describe('run', () => {
    it('runs the binary with GIT_DIR and the working directory', async () => {
      const { client, runner } = clientWith(ok('output\n'))
      expect(await client.run(['status'])).toBe('output')
      expect(runner).toHaveBeenCalledWith('git', ['status'], {
        cwd: '/repo',
        env: { PATH: '/usr/bin', GIT_DIR: '/repo/.git' },
      })
    })

    it('treats exit status 1 without output as an empty result', async () => {
      const { client } = clientWith({ stdout: '', stderr: '', exitCode: 1 })
      expect(await client.run(['config', 'user.name'])).toBe('')
    })

    it('raises SubprocessError for other failures', async () => {
      const { client } = clientWith({ stdout: '', stderr: 'fatal: not a git repository\n', exitCode: 128 })
      const error = await rejectionOf(client.run(['log']))
      expect(error).toBeInstanceOf(SubprocessError)
      if (error instanceof SubprocessError) {
        expect(error.exitCode).toBe(128)
        expect(error.command).toBe('git log')
        expect(error.output).toBe('fatal: not a git repository\n')
        expect(error.message).toBe('git log: fatal: not a git repository')
      }
    })

    it('raises SubprocessError for status 1 with output', async () => {
      const { client } = clientWith({ stdout: '', stderr: 'error: key does not contain a section\n', exitCode: 1 })
      await expect(client.run(['config', 'bad'])).rejects.toThrow(SubprocessError)
    })

    it('raises SubprocessError when the binary cannot start', async () => {
      const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn git ENOENT'))
      const client = new GitCliClient({ gitDir: '/repo/.git', runner })
      const error = await rejectionOf(client.run(['status']))
      expect(error instanceof SubprocessError && [error.exitCode, error.output]).toEqual([null, 'spawn git ENOENT'])
    })

    it('uses the configured binary', async () => {
      const runner = vi.fn<CommandRunner>().mockResolvedValue(ok(''))
      const client = new GitCliClient({ gitDir: '/g', binary: '/opt/git/bin/git', runner })
      await client.init({ bare: true })
      expect(runner).toHaveBeenCalledWith('/opt/git/bin/git', ['init', '--bare'], expect.anything())
    })
  })

  describe('log', () => {
    it('passes limit, start and path', async () => {
      const { client, runner } = clientWith(ok(''))
      await client.log({ limit: 5, start: commitB, path: 'docs/a.md' })
      expect(runner.mock.calls[0][1]).toEqual(['log', LOG_FORMAT, '-5', commitB, '--', 'docs/a.md'])
    })

    it('parses records', async () => {
      const { client } = clientWith(ok(logOutput))
      const records = await client.log({ limit: 10 })

      expect(records).toHaveLength(2)
      expect(records[0]).toEqual({
        id: commitB,
        parents: [commitA],
        tree: treeT,
        author: { name: 'Alice', email: 'alice@example.com', date: new Date(1700000000 * 1000) },
        committer: { name: 'Bob', email: 'bob@example.com', date: new Date(1700000100 * 1000) },
        message: 'second\nbody line',
      })
      expect(records[1].parents).toEqual([])
      expect(records[1].message).toBe('first')
    })

    it('returns no records for an unborn HEAD', async () => {
      const { client } = clientWith({ stdout: '', stderr: "fatal: bad default revision 'HEAD'\n", exitCode: 128 })
      expect(await client.log({ limit: 10 })).toEqual([])
    })

    it('propagates other failures', async () => {
      const { client } = clientWith({ stdout: '', stderr: "fatal: ambiguous argument 'nope'\n", exitCode: 128 })
      await expect(client.log({ limit: 10, start: 'nope' })).rejects.toThrow(SubprocessError)
    })
  })

  describe('diff', () => {
    it('returns the patch and the changed paths', async () => {
      const { client, runner } = clientWith(ok('diff --git a/a b/a\n'), ok('a.txt\0dir/b.txt\0'))
      const result = await client.diff(commitA, commitB, 'dir')

      expect(result).toEqual({ from: commitA, to: commitB, patch: 'diff --git a/a b/a', paths: ['a.txt', 'dir/b.txt'] })
      expect(runner.mock.calls[0][1]).toEqual(['diff', '--full-index', commitA, commitB, '--', 'dir'])
      expect(runner.mock.calls[1][1]).toEqual(['diff', '--name-only', '-z', commitA, commitB, '--', 'dir'])
    })

    it('returns no paths for identical revisions', async () => {
      const { client } = clientWith(ok(''), ok(''))
      expect((await client.diff(commitA, commitA)).paths).toEqual([])
    })
  })

  describe('configGet', () => {
    it('returns the trimmed value', async () => {
      const { client, runner } = clientWith(ok('Test User\n'))
      expect(await client.configGet('user.name')).toBe('Test User')
      expect(runner.mock.calls[0][1]).toEqual(['config', 'user.name'])
    })

    it('returns null for unset keys', async () => {
      const { client } = clientWith({ stdout: '', stderr: '', exitCode: 1 })
      expect(await client.configGet('user.email')).toBeNull()
    })
  })
})

describe('parseLogOutput', () => {
  it('returns nothing for empty output', () => {
    expect(parseLogOutput('')).toEqual([])
  })
})

describe('execFileRunner', () => {
  it('rejects when the program does not exist', async () => {
    const error = await rejectionOf(execFileRunner('treestore-test-missing-binary', [], { env: {} }))
    expect(error instanceof Error && Reflect.get(error, 'code')).toBe('ENOENT')
  })
})
