import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Read a blob object directly
 *
 * @throws {ObjectNotFoundError}
 *
 * @example
 * let { blob } = await tinygit.readBlob({ fs, dir: '/tutorial', oid })
 * console.log(Buffer.from(blob).toString('utf8'))
 */
export async function readBlob({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  oid,
}: BaseCommandOptions & { oid: string }): Promise<{ oid: string; blob: Uint8Array }> {
  try {
    assertParameter('oid', oid)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const blob = await readObjectOfType({ fs, gitdir: effectiveGitdir, oid, type: 'blob' })
    return { oid, blob }
  } catch (err) {
    tagCaller(err, 'tinygit.readBlob')
    throw err
  }
}
