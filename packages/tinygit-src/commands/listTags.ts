import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { listRefs } from '../git/refs/listRefs.ts'
import { TAG_PREFIX } from '../git/refs/readHead.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * List all the tags
 *
 * @example
 * let tags = await tinygit.listTags({ fs, dir: '/tutorial' })
 */
export async function listTags({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
}: BaseCommandOptions): Promise<string[]> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await listRefs({ fs, gitdir: effectiveGitdir, prefix: TAG_PREFIX })
  } catch (err) {
    tagCaller(err, 'tinygit.listTags')
    throw err
  }
}
