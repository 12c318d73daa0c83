import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { readHead } from '../git/refs/readHead.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Get the name of the branch currently pointed to by HEAD
 *
 * @returns the branch name, or `undefined` when HEAD is detached
 *
 * @example
 * let branch = await tinygit.currentBranch({ fs, dir: '/tutorial' })
 * console.log(branch)
 */
export async function currentBranch({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
}: BaseCommandOptions): Promise<string | undefined> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const head = await readHead({ fs, gitdir: effectiveGitdir })
    return head.detached ? undefined : head.branch
  } catch (err) {
    tagCaller(err, 'tinygit.currentBranch')
    throw err
  }
}
