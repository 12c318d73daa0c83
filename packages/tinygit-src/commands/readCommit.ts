import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { resolveCommit } from '../utils/resolveCommit.ts'
import type { ReadCommitResult } from '../models/GitCommit.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Read a commit object directly
 *
 * @example
 * let { commit } = await tinygit.readCommit({ fs, dir: '/tutorial', oid })
 * console.log(commit.message)
 */
export async function readCommit({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  oid,
}: BaseCommandOptions & { oid: string }): Promise<ReadCommitResult> {
  try {
    assertParameter('oid', oid)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return { oid, commit: await resolveCommit({ fs, gitdir: effectiveGitdir, oid }) }
  } catch (err) {
    tagCaller(err, 'tinygit.readCommit')
    throw err
  }
}
