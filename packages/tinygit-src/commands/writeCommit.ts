import { ObjectNotFoundError } from '../errors/ObjectNotFoundError.ts'
import { GitCommit, type CommitObject } from '../models/GitCommit.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { hasObject } from '../git/objects/hasObject.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Write a commit object directly
 *
 * No ref moves. The tree and the parent must already be in the store.
 *
 * @example
 * let oid = await tinygit.writeCommit({ fs, dir: '/tutorial', commit })
 */
export async function writeCommit({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  commit,
}: BaseCommandOptions & { commit: CommitObject }): Promise<string> {
  try {
    assertParameter('commit', commit)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    for (const oid of [commit.tree, commit.parent]) {
      if (oid !== null && !(await hasObject({ fs, gitdir: effectiveGitdir, oid }))) {
        throw new ObjectNotFoundError(oid)
      }
    }
    const object = GitCommit.from(commit).toObject()
    return await writeObject({ fs, gitdir: effectiveGitdir, type: 'commit', object })
  } catch (err) {
    tagCaller(err, 'tinygit.writeCommit')
    throw err
  }
}
