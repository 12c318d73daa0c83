import type { FileSystem, PromiseFsClient } from '../models/FileSystem.ts'

/**
 * Either a raw promise-style client such as Node's `fs`, or an already
 * wrapped {@link FileSystem}.
 */
export type FsClient = PromiseFsClient | FileSystem

/**
 * Options every repository command takes.
 */
export interface BaseCommandOptions {
  /**
   * File system client
   */
  fs: FsClient

  /**
   * Working tree directory path
   */
  dir?: string

  /**
   * Metadata directory path, `join(dir, '.tinygit')` by default
   */
  gitdir?: string
}

export interface CommandWithRefOptions extends BaseCommandOptions {
  /**
   * Branch, tag or commit digest
   */
  ref: string
}

export interface CommandWithFilepathOptions extends BaseCommandOptions {
  /**
   * Path relative to the working tree, `.` for all of it
   */
  filepath: string | string[]
}
