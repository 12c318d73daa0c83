import cleanGitRef from 'clean-git-ref'

import { AlreadyExistsError } from '../errors/AlreadyExistsError.ts'
import { InvalidRefNameError } from '../errors/InvalidRefNameError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { TAG_PREFIX } from '../git/refs/readHead.ts'
import { findBlockingRef } from '../git/refs/listRefs.ts'
import { readRef } from '../git/refs/readRef.ts'
import { writeRef } from '../git/refs/writeRef.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import validRef from '../utils/isValidRef.ts'
import { join } from '../utils/join.ts'
import { _resolveRef } from './resolveRef.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

/**
 * Create a lightweight tag
 *
 * @param args.ref - What to name the tag
 * @param [args.object = 'HEAD'] - What commit the tag refers to
 *
 * @throws {AlreadyExistsError} when the tag exists
 *
 * @example
 * await tinygit.tag({ fs, dir: '/tutorial', ref: 'test-tag' })
 */
export async function tag({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
  object = 'HEAD',
}: CommandWithRefOptions & { object?: string }): Promise<string> {
  try {
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, () =>
      _tag({ fs, gitdir: effectiveGitdir, ref, object })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.tag')
    throw err
  }
}

export async function _tag({
  fs,
  gitdir,
  ref,
  object,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  object: string
}): Promise<string> {
  if (!validRef(ref, true)) {
    throw new InvalidRefNameError(ref, cleanGitRef.clean(ref))
  }
  const fullref = `${TAG_PREFIX}${ref}`
  if ((await readRef({ fs, gitdir, ref: fullref })) !== null) {
    throw new AlreadyExistsError('tag', fullref)
  }
  const blocking = await findBlockingRef({ fs, gitdir, prefix: TAG_PREFIX, name: ref })
  if (blocking !== undefined) throw new AlreadyExistsError('tag', `${TAG_PREFIX}${blocking}`)
  const oid = await _resolveRef({ fs, gitdir, ref: object })
  // only commits can be tagged
  await readObjectOfType({ fs, gitdir, oid, type: 'commit' })
  await writeRef({ fs, gitdir, ref: fullref, value: oid })
  return oid
}
