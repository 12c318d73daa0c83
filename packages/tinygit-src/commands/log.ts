import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { resolveCommit } from '../utils/resolveCommit.ts'
import { _resolveRefOrUnborn } from './resolveRef.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { ReadCommitResult } from '../models/GitCommit.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Get commit descriptions from the history, newest first
 *
 * @param [args.ref='HEAD'] - The commit to begin walking backwards through the history from
 * @param [args.depth] - Limit the number of commits returned. No limit by default.
 *
 * @returns the commits; empty when the branch has no commits yet
 * @throws {ObjectNotFoundError} when a parent commit is missing from the store
 *
 * @example
 * let commits = await tinygit.log({ fs, dir: '/tutorial', depth: 5, ref: 'main' })
 * console.log(commits)
 */
export async function log({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref = 'HEAD',
  depth,
}: BaseCommandOptions & { ref?: string; depth?: number }): Promise<ReadCommitResult[]> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () =>
      _log({ fs, gitdir: effectiveGitdir, ref, depth })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.log')
    throw err
  }
}

export async function _log({
  fs,
  gitdir,
  ref,
  depth,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  depth?: number
}): Promise<ReadCommitResult[]> {
  const commits: ReadCommitResult[] = []
  let oid = await _resolveRefOrUnborn({ fs, gitdir, ref })
  while (oid !== null) {
    if (depth !== undefined && commits.length >= depth) break
    const commit = await resolveCommit({ fs, gitdir, oid })
    commits.push({ oid, commit })
    oid = commit.parent
  }
  return commits
}
