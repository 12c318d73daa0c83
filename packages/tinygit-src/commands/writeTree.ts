import { GitTree, type TreeObject } from '../models/GitTree.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Write a tree object directly
 *
 * Entries are sorted into canonical order before hashing.
 *
 * @example
 * let oid = await tinygit.writeTree({ fs, dir: '/tutorial', tree: [] })
 */
export async function writeTree({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  tree,
}: BaseCommandOptions & { tree: TreeObject }): Promise<string> {
  try {
    assertParameter('tree', tree)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const object = GitTree.from(tree).toObject()
    return await writeObject({ fs, gitdir: effectiveGitdir, type: 'tree', object })
  } catch (err) {
    tagCaller(err, 'tinygit.writeTree')
    throw err
  }
}
