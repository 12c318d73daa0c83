import cleanGitRef from 'clean-git-ref'

import { BranchExistsError } from '../errors/BranchExistsError.ts'
import { InvalidRefNameError } from '../errors/InvalidRefNameError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { BRANCH_PREFIX, readHead } from '../git/refs/readHead.ts'
import { findBlockingRef } from '../git/refs/listRefs.ts'
import { readRef } from '../git/refs/readRef.ts'
import { writeRef, writeSymbolicRef } from '../git/refs/writeRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import validRef from '../utils/isValidRef.ts'
import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

export type BranchOptions = CommandWithRefOptions & {
  checkout?: boolean
}

/**
 * Create a branch
 *
 * The new branch points at the current commit, or is unborn when there is
 * none yet.
 *
 * @param args.ref - What to name the branch
 * @param [args.checkout = false] - Update `HEAD` to point at the newly created branch
 *
 * @throws {InvalidRefNameError}
 * @throws {BranchExistsError}
 *
 * @example
 * await tinygit.branch({ fs, dir: '/tutorial', ref: 'develop' })
 * console.log('done')
 */
export async function branch({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
  checkout = false,
}: BranchOptions): Promise<void> {
  try {
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () =>
      _branch({ fs, gitdir: effectiveGitdir, ref, checkout })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.branch')
    throw err
  }
}

export const assertBranchName = (ref: string): void => {
  if (!validRef(ref, true)) {
    throw new InvalidRefNameError(ref, cleanGitRef.clean(ref))
  }
}

export async function _branch({
  fs,
  gitdir,
  ref,
  checkout = false,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  checkout?: boolean
}): Promise<void> {
  assertBranchName(ref)
  const fullref = `${BRANCH_PREFIX}${ref}`
  if ((await readRef({ fs, gitdir, ref: fullref })) !== null) {
    throw new BranchExistsError(ref)
  }
  const blocking = await findBlockingRef({ fs, gitdir, prefix: BRANCH_PREFIX, name: ref })
  if (blocking !== undefined) throw new BranchExistsError(blocking)
  const head = await readHead({ fs, gitdir })
  await writeRef({ fs, gitdir, ref: fullref, value: head.oid })
  if (checkout) {
    await writeSymbolicRef({ fs, gitdir, ref: 'HEAD', target: fullref })
  }
}
