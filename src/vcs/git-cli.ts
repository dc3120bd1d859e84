/**
 * @fileoverview {@link VersionControlClient} backed by the `git` executable
 *
 * Every command runs with `GIT_DIR` pointing at the repository and its
 * arguments passed as an argv array, never through a shell.
 *
 * Exit status 1 with no output is how git reports "nothing found" for
 * commands such as `git config <unset key>`; it yields an empty string.
 * Any other non-zero exit raises {@link SubprocessError}.
 *
 * @module vcs/git-cli
 *
 * @example
 * ```typescript
 * const client = new GitCliClient({ gitDir: '/repo/.git' })
 * const history = await client.log({ limit: 5 })
 * ```
 */

import { execFile as execFileCallback } from 'child_process'
import { promisify } from 'util'
import { DEFAULT_GIT_BINARY } from '../constants'
import { SubprocessError } from '../errors'
import { noopLogger, type Logger } from '../utils/logger'
import {
  LOG_FORMAT,
  parseLogOutput,
  type DiffResult,
  type HistoryRecord,
  type LogOptions,
  type VersionControlClient,
} from './client'

const execFile = promisify(execFileCallback)

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface CommandResult {
  stdout: string
  stderr: string
  /** Exit status, or null when the process was killed by a signal */
  exitCode: number | null
}

export interface CommandOptions {
  cwd?: string
  env: NodeJS.ProcessEnv
}

/**
 * Runs a program to completion. Resolves for any exit status; rejects only
 * when the program cannot be started.
 */
export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<CommandResult>

function stringProperty(error: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(error, key)
  if (typeof value === 'string') return value
  if (value instanceof Uint8Array) return new TextDecoder().decode(value)
  return ''
}

/**
 * {@link CommandRunner} built on `child_process.execFile`.
 */
export const execFileRunner: CommandRunner = async (file, args, options) => {
  try {
    const { stdout, stderr } = await execFile(file, args, {
      cwd: options.cwd,
      env: options.env,
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BYTES,
    })
    return { stdout, stderr, exitCode: 0 }
  } catch (error) {
    if (typeof error !== 'object' || error === null) throw error
    const code: unknown = Reflect.get(error, 'code')
    // A string code (ENOENT, EACCES) means the process never ran
    if (typeof code !== 'number' && code !== null && code !== undefined) throw error
    return {
      stdout: stringProperty(error, 'stdout'),
      stderr: stringProperty(error, 'stderr'),
      exitCode: typeof code === 'number' ? code : null,
    }
  }
}

export interface GitCliClientOptions {
  /** The git directory, exported as `GIT_DIR` */
  gitDir: string
  /** Working directory for commands (the work tree of a non-bare repository) */
  cwd?: string
  /** Executable to run (default: `git`) */
  binary?: string
  runner?: CommandRunner
  /** Base environment (default: `process.env`) */
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

export class GitCliClient implements VersionControlClient {
  private readonly binary: string
  private readonly runner: CommandRunner
  private readonly logger: Logger

  constructor(private readonly options: GitCliClientOptions) {
    this.binary = options.binary ?? DEFAULT_GIT_BINARY
    this.runner = options.runner ?? execFileRunner
    this.logger = (options.logger ?? noopLogger).child({ component: 'git' })
  }

  /**
   * Runs `git <args>` and returns its output with the trailing newline removed.
   *
   * @throws {SubprocessError} On a non-zero exit other than status 1 with no output
   */
  async run(args: string[]): Promise<string> {
    const command = [this.binary, ...args].join(' ')
    this.logger.debug('Running command', { command })

    let result: CommandResult
    try {
      result = await this.runner(this.binary, args, {
        ...(this.options.cwd !== undefined && { cwd: this.options.cwd }),
        env: { ...(this.options.env ?? process.env), GIT_DIR: this.options.gitDir },
      })
    } catch (cause) {
      throw new SubprocessError(command, null, cause instanceof Error ? cause.message : String(cause), { cause })
    }

    const output = result.stdout.replace(/\n$/, '')
    if (result.exitCode === 0) {
      return output
    }

    const combined = `${result.stdout}${result.stderr}`
    if (result.exitCode === 1 && combined === '') {
      return ''
    }
    throw new SubprocessError(command, result.exitCode, combined)
  }

  async log(options: LogOptions): Promise<HistoryRecord[]> {
    const args = ['log', LOG_FORMAT, `-${options.limit}`]
    if (options.start !== undefined) args.push(options.start)
    if (options.path !== undefined) args.push('--', options.path)

    try {
      return parseLogOutput(await this.run(args))
    } catch (error) {
      if (error instanceof SubprocessError && /bad default revision 'HEAD'/.test(error.output)) {
        return []
      }
      throw error
    }
  }

  async diff(from: string, to: string, path?: string): Promise<DiffResult> {
    const pathArgs = path !== undefined ? ['--', path] : []
    const patch = await this.run(['diff', '--full-index', from, to, ...pathArgs])
    const names = await this.run(['diff', '--name-only', '-z', from, to, ...pathArgs])
    return {
      from,
      to,
      patch,
      paths: names.split('\0').filter(name => name.length > 0),
    }
  }

  async configGet(key: string): Promise<string | null> {
    const value = (await this.run(['config', key])).trim()
    return value === '' ? null : value
  }

  async init(options: { bare: boolean }): Promise<void> {
    await this.run(options.bare ? ['init', '--bare'] : ['init'])
  }
}
