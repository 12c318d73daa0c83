import { NotARepositoryError } from '../errors/NotARepositoryError.ts'
import { FileSystem } from '../models/FileSystem.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { tagCaller } from '../utils/commandHelpers.ts'
import { dirname, join, normalizePath } from '../utils/join.ts'
import type { FsClient } from '../types/commandOptions.ts'

/**
 * Find the root of the working tree
 *
 * Starting at `filepath`, walks upward until it finds a directory that
 * contains a `.tinygit` directory.
 *
 * @param args.fs - a file system client
 * @param args.filepath - The directory to start searching in
 *
 * @returns the working tree root
 * @throws {NotARepositoryError}
 *
 * @example
 * let root = await tinygit.findRoot({ fs, filepath: '/tutorial/src/utils' })
 * console.log(root)
 */
export async function findRoot({
  fs: _fs,
  filepath,
}: {
  fs: FsClient
  filepath: string
}): Promise<string> {
  try {
    assertParameter('fs', _fs)
    assertParameter('filepath', filepath)
    const fs = new FileSystem(_fs)
    let current = normalizePath(filepath)
    while (true) {
      if (await fs.exists(join(current, GITDIR_NAME, 'HEAD'))) {
        return current
      }
      const parent = dirname(current)
      // `.` is checked before giving up on a relative start
      if (parent === current || current === '.') {
        throw new NotARepositoryError(filepath)
      }
      current = parent
    }
  } catch (err) {
    tagCaller(err, 'tinygit.findRoot')
    throw err
  }
}
