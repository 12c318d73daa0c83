import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { writeIndex } from '../git/index/writeIndex.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { toRepoPath } from './add.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithFilepathOptions } from '../types/commandOptions.ts'

/**
 * Remove paths from the index, leaving the working tree alone
 *
 * A directory (or `.`) unstages every entry below it. Paths with no index
 * entry are ignored.
 *
 * @returns the paths that were removed from the index
 *
 * @example
 * await tinygit.unstage({ fs, dir: '/tutorial', filepath: 'README.md' })
 */
export async function unstage({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  filepath,
}: CommandWithFilepathOptions): Promise<string[]> {
  try {
    assertParameter('dir', dir)
    assertParameter('filepath', filepath)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const workdir = dir
    const filepaths = Array.isArray(filepath) ? filepath : [filepath]
    return await withRepoLock(effectiveGitdir, () =>
      _unstage({ fs, dir: workdir, gitdir: effectiveGitdir, filepaths })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.unstage')
    throw err
  }
}

export async function _unstage({
  fs,
  dir,
  gitdir,
  filepaths,
}: {
  fs: FileSystem
  dir: string
  gitdir: string
  filepaths: string[]
}): Promise<string[]> {
  const index = await readIndex({ fs, gitdir })
  const removed: string[] = []
  for (const filepath of filepaths) {
    const relative = toRepoPath(dir, filepath)
    for (const entry of index.entries()) {
      if (relative === '.' || entry.path === relative || entry.path.startsWith(relative + '/')) {
        index.unstage(entry.path)
        removed.push(entry.path)
      }
    }
  }
  if (removed.length > 0) await writeIndex({ fs, gitdir, index })
  return removed
}
