import { UnknownRefError } from '../errors/UnknownRefError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { expandRef } from '../git/refs/expandRef.ts'
import { hasObject } from '../git/objects/hasObject.ts'
import { resolveRefValue } from '../git/refs/readRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

/**
 * Get the commit digest a branch, tag, `HEAD` or digest refers to
 *
 * @throws {UnknownRefError} when nothing matches or the branch has no commits yet
 *
 * @example
 * let oid = await tinygit.resolveRef({ fs, dir: '/tutorial', ref: 'main' })
 */
export async function resolveRef({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
}: CommandWithRefOptions): Promise<string> {
  try {
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await _resolveRef({ fs, gitdir: effectiveGitdir, ref })
  } catch (err) {
    tagCaller(err, 'tinygit.resolveRef')
    throw err
  }
}

/**
 * Like {@link _resolveRefOrUnborn}, but an unborn branch is an error.
 */
export async function _resolveRef({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<string> {
  const oid = await _resolveRefOrUnborn({ fs, gitdir, ref })
  if (oid === null) throw new UnknownRefError(ref)
  return oid
}

/**
 * `null` for an unborn branch (or `HEAD` on one).
 */
export async function _resolveRefOrUnborn({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<string | null> {
  const expanded = await expandRef({ fs, gitdir, ref })
  if (expanded === undefined) throw new UnknownRefError(ref)
  if (expanded.kind === 'oid') {
    if (!(await hasObject({ fs, gitdir, oid: expanded.oid }))) throw new UnknownRefError(ref)
    return expanded.oid
  }
  const oid = await resolveRefValue({
    fs,
    gitdir,
    ref: expanded.kind === 'head' ? 'HEAD' : expanded.ref,
  })
  if (oid === undefined) throw new UnknownRefError(ref)
  return oid
}
