import { GitTree, type ReadTreeResult } from '../models/GitTree.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Read a tree object directly
 *
 * @example
 * let { tree } = await tinygit.readTree({ fs, dir: '/tutorial', oid })
 */
export async function readTree({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  oid,
}: BaseCommandOptions & { oid: string }): Promise<ReadTreeResult> {
  try {
    assertParameter('oid', oid)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const object = await readObjectOfType({ fs, gitdir: effectiveGitdir, oid, type: 'tree' })
    return { oid, tree: GitTree.from(object).entries() }
  } catch (err) {
    tagCaller(err, 'tinygit.readTree')
    throw err
  }
}
