import { UnknownRefError } from '../errors/UnknownRefError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { deleteRef } from '../git/refs/deleteRef.ts'
import { TAG_PREFIX } from '../git/refs/readHead.ts'
import { readRef } from '../git/refs/readRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import validRef from '../utils/isValidRef.ts'
import { join } from '../utils/join.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

/**
 * Delete a tag
 *
 * @example
 * await tinygit.deleteTag({ fs, dir: '/tutorial', ref: 'test-tag' })
 */
export async function deleteTag({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
}: CommandWithRefOptions): Promise<void> {
  try {
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const fullref = `${TAG_PREFIX}${ref}`
    await withRepoLock(effectiveGitdir, async () => {
      if (!validRef(ref, true) || (await readRef({ fs, gitdir: effectiveGitdir, ref: fullref })) === null) {
        throw new UnknownRefError(ref)
      }
      await deleteRef({ fs, gitdir: effectiveGitdir, ref: fullref })
    })
  } catch (err) {
    tagCaller(err, 'tinygit.deleteTag')
    throw err
  }
}
