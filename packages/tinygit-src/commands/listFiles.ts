import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { compareStrings } from '../utils/compareStrings.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { resolveCommitFiles } from '../utils/resolveCommit.ts'
import { _resolveRef } from './resolveRef.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * List the paths in the index, or in a commit when `ref` is given
 *
 * @example
 * let files = await tinygit.listFiles({ fs, dir: '/tutorial', ref: 'main' })
 */
export async function listFiles({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
}: BaseCommandOptions & { ref?: string }): Promise<string[]> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    if (ref === undefined) {
      const index = await readIndex({ fs, gitdir: effectiveGitdir })
      return index.entries().map(entry => entry.path)
    }
    const oid = await _resolveRef({ fs, gitdir: effectiveGitdir, ref })
    const files = await resolveCommitFiles({ fs, gitdir: effectiveGitdir, oid })
    return [...files.keys()].sort(compareStrings)
  } catch (err) {
    tagCaller(err, 'tinygit.listFiles')
    throw err
  }
}
