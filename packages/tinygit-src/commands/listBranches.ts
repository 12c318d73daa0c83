import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { listRefs } from '../git/refs/listRefs.ts'
import { BRANCH_PREFIX, readHead } from '../git/refs/readHead.ts'
import { resolveRefValue } from '../git/refs/readRef.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

export type BranchInfo = {
  name: string
  current: boolean
  /** `null` for an unborn branch */
  oid: string | null
}

/**
 * List branches, sorted by name
 *
 * @example
 * let branches = await tinygit.listBranches({ fs, dir: '/tutorial' })
 * console.log(branches.map(b => b.name))
 */
export async function listBranches({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
}: BaseCommandOptions): Promise<BranchInfo[]> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () => _listBranches({ fs, gitdir: effectiveGitdir }))
  } catch (err) {
    tagCaller(err, 'tinygit.listBranches')
    throw err
  }
}

export async function _listBranches({
  fs,
  gitdir,
}: {
  fs: FileSystem
  gitdir: string
}): Promise<BranchInfo[]> {
  const head = await readHead({ fs, gitdir })
  const names = await listRefs({ fs, gitdir, prefix: BRANCH_PREFIX })
  const branches: BranchInfo[] = []
  for (const name of names) {
    const oid = await resolveRefValue({ fs, gitdir, ref: `${BRANCH_PREFIX}${name}` })
    branches.push({ name, current: !head.detached && head.branch === name, oid: oid ?? null })
  }
  return branches
}
