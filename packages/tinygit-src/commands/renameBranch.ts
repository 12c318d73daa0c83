import { BranchCheckedOutError } from '../errors/BranchCheckedOutError.ts'
import { BranchExistsError } from '../errors/BranchExistsError.ts'
import { UnknownRefError } from '../errors/UnknownRefError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { deleteRef } from '../git/refs/deleteRef.ts'
import { findBlockingRef } from '../git/refs/listRefs.ts'
import { BRANCH_PREFIX, readHead } from '../git/refs/readHead.ts'
import { readRef, resolveRefValue } from '../git/refs/readRef.ts'
import { writeRef } from '../git/refs/writeRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import validRef from '../utils/isValidRef.ts'
import { join } from '../utils/join.ts'
import { assertBranchName } from './branch.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

/**
 * Rename a branch
 *
 * @param args.ref - What to name the branch
 * @param args.oldref - What the name of the branch was
 *
 * @example
 * await tinygit.renameBranch({ fs, dir: '/tutorial', ref: 'main', oldref: 'master' })
 */
export async function renameBranch({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
  oldref,
}: CommandWithRefOptions & { oldref: string }): Promise<void> {
  try {
    assertParameter('ref', ref)
    assertParameter('oldref', oldref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () =>
      _renameBranch({ fs, gitdir: effectiveGitdir, ref, oldref })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.renameBranch')
    throw err
  }
}

export async function _renameBranch({
  fs,
  gitdir,
  ref,
  oldref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  oldref: string
}): Promise<void> {
  assertBranchName(ref)
  const fulloldref = `${BRANCH_PREFIX}${oldref}`
  const fullnewref = `${BRANCH_PREFIX}${ref}`
  if (!validRef(oldref, true) || (await readRef({ fs, gitdir, ref: fulloldref })) === null) {
    throw new UnknownRefError(oldref)
  }
  if ((await readRef({ fs, gitdir, ref: fullnewref })) !== null) {
    throw new BranchExistsError(ref)
  }
  const blocking = await findBlockingRef({ fs, gitdir, prefix: BRANCH_PREFIX, name: ref, except: oldref })
  if (blocking !== undefined) throw new BranchExistsError(blocking)
  const head = await readHead({ fs, gitdir })
  if (!head.detached && head.ref === fulloldref) {
    throw new BranchCheckedOutError(oldref)
  }
  const value = await resolveRefValue({ fs, gitdir, ref: fulloldref })
  // `foo` -> `foo/bar` and back: the old file is in the new one's way
  const nested = ref.startsWith(`${oldref}/`) || oldref.startsWith(`${ref}/`)
  if (nested) await deleteRef({ fs, gitdir, ref: fulloldref })
  await writeRef({ fs, gitdir, ref: fullnewref, value: value ?? null })
  if (!nested) await deleteRef({ fs, gitdir, ref: fulloldref })
}
