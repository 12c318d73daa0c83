import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

/**
 * Write a blob object directly
 *
 * @returns the digest of the newly written object
 *
 * @example
 * let oid = await tinygit.writeBlob({ fs, dir: '/tutorial', blob: new Uint8Array([]) })
 */
export async function writeBlob({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  blob,
}: BaseCommandOptions & { blob: Uint8Array }): Promise<string> {
  try {
    assertParameter('blob', blob)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await writeObject({ fs, gitdir: effectiveGitdir, type: 'blob', object: blob })
  } catch (err) {
    tagCaller(err, 'tinygit.writeBlob')
    throw err
  }
}
