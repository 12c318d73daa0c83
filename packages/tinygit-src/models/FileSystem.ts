import { compareStrings } from '../utils/compareStrings.ts'
import { debug } from '../utils/debug.ts'
import { dirname } from '../utils/join.ts'

/**
 * Normalized subset of filesystem `stat` data.
 */
export type Stat = {
  isFile(): boolean
  isDirectory(): boolean
  isSymbolicLink(): boolean
  mode: number
  size: number
  mtimeMs: number
}

/**
 * The promise-style client the library drives. Node's `fs` module
 * satisfies it as-is.
 */
export type PromiseFsClient = {
  promises: {
    readFile(path: string): Promise<Uint8Array>
    writeFile(path: string, data: Uint8Array | string): Promise<void>
    unlink(path: string): Promise<void>
    readdir(path: string): Promise<string[]>
    mkdir(path: string, options: { recursive: true }): Promise<unknown>
    rmdir(path: string): Promise<void>
    stat(path: string): Promise<Stat>
    lstat(path: string): Promise<Stat>
    rename(oldPath: string, newPath: string): Promise<void>
    chmod(path: string, mode: number): Promise<void>
  }
}

export const errorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

const isMissing = (err: unknown): boolean => {
  const code = errorCode(err)
  return code === 'ENOENT' || code === 'ENOTDIR'
}

let tmpCounter = 0

/**
 * Thin convenience layer over a {@link PromiseFsClient}: missing files read
 * as `null`, writes create parent directories, and replacements can be made
 * atomic.
 */
export class FileSystem {
  private readonly _fs: PromiseFsClient['promises']

  constructor(fs: PromiseFsClient | FileSystem) {
    this._fs = fs instanceof FileSystem ? fs._fs : fs.promises
  }

  /**
   * Return true if a file exists, false if it doesn't exist.
   * Rethrows errors that aren't related to file existence.
   */
  async exists(filepath: string): Promise<boolean> {
    try {
      await this._fs.stat(filepath)
      return true
    } catch (err) {
      if (isMissing(err)) return false
      throw err
    }
  }

  /**
   * Return the contents of a file if it exists, otherwise returns null.
   */
  async read(filepath: string): Promise<Buffer | null>
  async read(filepath: string, encoding: 'utf8'): Promise<string | null>
  async read(filepath: string, encoding?: 'utf8'): Promise<Buffer | string | null> {
    let data: Uint8Array
    try {
      data = await this._fs.readFile(filepath)
    } catch (err) {
      if (isMissing(err) || errorCode(err) === 'EISDIR') return null
      throw err
    }
    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    return encoding ? buffer.toString(encoding) : buffer
  }

  /**
   * Write a file, creating missing directories if need be.
   */
  async write(filepath: string, contents: Uint8Array | string): Promise<void> {
    try {
      await this._fs.writeFile(filepath, contents)
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err
      await this.mkdir(dirname(filepath))
      await this._fs.writeFile(filepath, contents)
    }
  }

  /**
   * Replace a file so readers see either the old or the new contents, never
   * a partial write: the data goes to a sibling temp file that is then
   * renamed over the target.
   */
  async writeAtomic(filepath: string, contents: Uint8Array | string): Promise<void> {
    const tmp = `${filepath}.${process.pid}.${++tmpCounter}.tmp`
    await this.write(tmp, contents)
    try {
      await this._fs.rename(tmp, filepath)
    } catch (err) {
      await this.rm(tmp)
      throw err
    }
    debug('fs', 'replaced', filepath)
  }

  async mkdir(filepath: string): Promise<void> {
    await this._fs.mkdir(filepath, { recursive: true })
  }

  /**
   * Delete a file without throwing an error if it is already deleted.
   */
  async rm(filepath: string): Promise<void> {
    try {
      await this._fs.unlink(filepath)
    } catch (err) {
      if (!isMissing(err)) throw err
    }
  }

  /**
   * Remove a directory if it is empty. Returns whether it was removed.
   */
  async rmdirIfEmpty(filepath: string): Promise<boolean> {
    try {
      await this._fs.rmdir(filepath)
      return true
    } catch (err) {
      const code = errorCode(err)
      if (code === 'ENOTEMPTY' || code === 'EEXIST' || isMissing(err)) return false
      throw err
    }
  }

  /**
   * Read a directory without throwing an error if it does not exist.
   * Names come back sorted.
   */
  async readdir(filepath: string): Promise<string[]> {
    try {
      const names = await this._fs.readdir(filepath)
      return names.sort(compareStrings)
    } catch (err) {
      if (isMissing(err)) return []
      throw err
    }
  }

  async lstat(filepath: string): Promise<Stat | null> {
    try {
      return await this._fs.lstat(filepath)
    } catch (err) {
      if (isMissing(err)) return null
      throw err
    }
  }

  async rename(oldFilepath: string, newFilepath: string): Promise<void> {
    await this._fs.rename(oldFilepath, newFilepath)
  }

  async chmod(filepath: string, mode: number): Promise<void> {
    await this._fs.chmod(filepath, mode)
  }
}
