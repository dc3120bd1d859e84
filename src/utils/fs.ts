/**
 * Filesystem helpers shared by the object store and the ref resolver.
 */

import { randomBytes } from 'crypto'
import * as fs from 'fs/promises'
import * as path from 'path'
import { systemErrorCode } from '../errors'

/**
 * Writes `data` to a temporary file beside `target`, then renames it into
 * place. Readers see either the old contents or the new, never a partial
 * file. Parent directories are created as needed.
 */
export async function writeFileAtomic(target: string, data: Uint8Array | string): Promise<void> {
  const dir = path.dirname(target)
  await fs.mkdir(dir, { recursive: true })

  const temp = path.join(dir, `.tmp-${path.basename(target)}-${randomBytes(6).toString('hex')}`)
  try {
    await fs.writeFile(temp, data, { flag: 'wx' })
    await fs.rename(temp, target)
  } catch (error) {
    await fs.rm(temp, { force: true })
    throw error
  }
}

/**
 * True when `file` exists (any type).
 */
export async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.stat(file)
    return true
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return false
    throw error
  }
}

/**
 * Reads `file`, returning null when it does not exist.
 */
export async function readFileIfExists(file: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await fs.readFile(file))
  } catch (error) {
    const code = systemErrorCode(error)
    if (code === 'ENOENT' || code === 'ENOTDIR') return null
    throw error
  }
}

/**
 * Directory entries of `dir`, or an empty list when it does not exist.
 */
export async function readDirIfExists(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir)
  } catch (error) {
    const code = systemErrorCode(error)
    if (code === 'ENOENT' || code === 'ENOTDIR') return []
    throw error
  }
}
