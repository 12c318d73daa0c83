import { GITDIR_NAME, IgnoreManager } from '../core-utils/IgnoreManager.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { toRepoPath } from './add.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Test whether a filepath is excluded by `.tinygitignore` rules
 *
 * @param args.fs - a file system client
 * @param args.dir - The working tree directory path
 * @param [args.gitdir=join(dir, '.tinygit')] - The metadata directory path
 * @param args.filepath - The filepath to test, relative to `dir`
 *
 * @example
 * await tinygit.isIgnored({ fs, dir: '/tutorial', filepath: 'build/out.js' })
 */
export async function isIgnored({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  filepath,
}: BaseCommandOptions & { filepath: string }): Promise<boolean> {
  try {
    assertParameter('dir', dir)
    assertParameter('filepath', filepath)
    const { fs } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const relative = toRepoPath(dir, filepath)
    const stat = await fs.lstat(join(dir, relative))
    return await new IgnoreManager({ fs, dir }).isIgnored(relative, stat?.isDirectory() ?? false)
  } catch (err) {
    tagCaller(err, 'tinygit.isIgnored')
    throw err
  }
}
