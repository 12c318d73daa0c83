import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { scanWorkdir } from '../core-utils/WorkdirScanner.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { readHead } from '../git/refs/readHead.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { resolveCommitFiles } from '../utils/resolveCommit.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

export type StatusResult = {
  /** current branch, `null` when HEAD is detached */
  branch: string | null
  detached: boolean
  /** current commit, `null` before the first commit */
  head: string | null
  staged: string[]
  modified: string[]
  untracked: string[]
}

/**
 * Summarize the working tree against the index and the current commit
 *
 * The three path lists are disjoint and sorted. A committed file deleted from
 * disk is reported as modified.
 *
 * @example
 * let { staged, modified, untracked } = await tinygit.status({ fs, dir: '/tutorial' })
 */
export async function status({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
}: BaseCommandOptions): Promise<StatusResult> {
  try {
    assertParameter('dir', dir)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const workdir = dir
    return await withRepoLock(effectiveGitdir, () =>
      _status({ fs, dir: workdir, gitdir: effectiveGitdir })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.status')
    throw err
  }
}

export async function _status({
  fs,
  dir,
  gitdir,
}: {
  fs: FileSystem
  dir: string
  gitdir: string
}): Promise<StatusResult> {
  const head = await readHead({ fs, gitdir })
  const index = await readIndex({ fs, gitdir })
  const headTree = await resolveCommitFiles({ fs, gitdir, oid: head.oid })
  const { staged, modified, untracked } = await scanWorkdir({ fs, dir, index, headTree })
  return {
    branch: head.detached ? null : head.branch,
    detached: head.detached,
    head: head.oid,
    staged,
    modified,
    untracked,
  }
}
