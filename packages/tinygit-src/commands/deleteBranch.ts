import { BranchCheckedOutError } from '../errors/BranchCheckedOutError.ts'
import { UnknownRefError } from '../errors/UnknownRefError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { deleteRef } from '../git/refs/deleteRef.ts'
import { BRANCH_PREFIX, readHead } from '../git/refs/readHead.ts'
import { readRef } from '../git/refs/readRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import validRef from '../utils/isValidRef.ts'
import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

/**
 * Delete a local branch
 *
 * Commits stay in the store.
 *
 * @throws {UnknownRefError} when the branch does not exist
 * @throws {BranchCheckedOutError} when HEAD points at the branch
 *
 * @example
 * await tinygit.deleteBranch({ fs, dir: '/tutorial', ref: 'local-branch' })
 */
export async function deleteBranch({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
}: CommandWithRefOptions): Promise<void> {
  try {
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () =>
      _deleteBranch({ fs, gitdir: effectiveGitdir, ref })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.deleteBranch')
    throw err
  }
}

export async function _deleteBranch({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<void> {
  const fullref = `${BRANCH_PREFIX}${ref}`
  if (!validRef(ref, true) || (await readRef({ fs, gitdir, ref: fullref })) === null) {
    throw new UnknownRefError(ref)
  }
  const head = await readHead({ fs, gitdir })
  if (!head.detached && head.ref === fullref) {
    throw new BranchCheckedOutError(ref)
  }
  await deleteRef({ fs, gitdir, ref: fullref })
}
