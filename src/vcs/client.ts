/**
 * @fileoverview Version-control client interface
 *
 * History traversal and diffs are not computed by the storage engine; they
 * are delegated to an external tool through this narrow interface. The
 * default implementation is {@link GitCliClient}; tests substitute a fake.
 *
 * @module vcs/client
 */

/**
 * Author or committer as reported by history queries.
 */
export interface HistoryIdentity {
  name: string
  email: string
  date: Date
}

/**
 * One commit in a history listing.
 */
export interface HistoryRecord {
  id: string
  /** Parent ids, empty for a root commit */
  parents: string[]
  tree: string
  author: HistoryIdentity
  committer: HistoryIdentity
  /** Subject and body, surrounding whitespace trimmed */
  message: string
}

export interface LogOptions {
  /** Maximum number of records */
  limit: number
  /** Revision to start from (default: HEAD) */
  start?: string
  /** Only commits touching this path */
  path?: string
}

/**
 * A patch between two revisions.
 */
export interface DiffResult {
  from: string
  to: string
  /** Unified diff with full object ids */
  patch: string
  /** Paths that differ */
  paths: string[]
}

export interface VersionControlClient {
  /**
   * History starting at `start`, newest first. An unborn HEAD yields `[]`.
   */
  log(options: LogOptions): Promise<HistoryRecord[]>
  diff(from: string, to: string, path?: string): Promise<DiffResult>
  /**
   * A configuration value, or null when it is unset.
   */
  configGet(key: string): Promise<string | null>
  /**
   * Creates the repository on disk.
   */
  init(options: { bare: boolean }): Promise<void>
}

/**
 * `--format` used by {@link GitCliClient.log}: nine header lines, then the
 * message between NUL bytes.
 */
export const LOG_FORMAT = '--format=tformat:%H%n%P%n%T%n%an%n%ae%n%at%n%cn%n%ce%n%ct%n%x00%s%n%b%x00'

/**
 * Parses output produced with {@link LOG_FORMAT}.
 */
export function parseLogOutput(output: string): HistoryRecord[] {
  const chunks = output.split(/\n*\x00\n*/)
  const records: HistoryRecord[] = []

  for (let i = 0; i + 1 < chunks.length; i += 2) {
    const header = chunks[i].split('\n')
    if (header.length < 9 || header[0] === '') continue

    records.push({
      id: header[0],
      parents: header[1] === '' ? [] : header[1].split(' '),
      tree: header[2],
      author: {
        name: header[3],
        email: header[4],
        date: new Date(parseInt(header[5], 10) * 1000),
      },
      committer: {
        name: header[6],
        email: header[7],
        date: new Date(parseInt(header[8], 10) * 1000),
      },
      message: chunks[i + 1].trim(),
    })
  }

  return records
}
