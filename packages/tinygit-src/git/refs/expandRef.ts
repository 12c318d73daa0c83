import { isOid } from '../../core-utils/ShaHasher.ts'
import isValidRef from '../../utils/isValidRef.ts'
import { BRANCH_PREFIX, TAG_PREFIX } from './readHead.ts'
import { readRef } from './readRef.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export type ExpandedRef =
  | { kind: 'head' }
  | { kind: 'branch'; name: string; ref: string }
  | { kind: 'tag'; name: string; ref: string }
  | { kind: 'oid'; oid: string }

/**
 * Work out what a user-supplied name refers to: `HEAD`, a full ref, a
 * branch, a tag, or a full digest, in that order. `undefined` when
 * nothing matches.
 */
export async function expandRef({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<ExpandedRef | undefined> {
  if (ref === 'HEAD') return { kind: 'head' }
  if (!isValidRef(ref, true)) return undefined
  const candidates: Array<{ kind: 'branch' | 'tag'; prefix: string }> = [
    { kind: 'branch', prefix: BRANCH_PREFIX },
    { kind: 'tag', prefix: TAG_PREFIX },
  ]
  for (const { kind, prefix } of candidates) {
    if (ref.startsWith(prefix) && (await readRef({ fs, gitdir, ref })) !== null) {
      return { kind, name: ref.slice(prefix.length), ref }
    }
  }
  for (const { kind, prefix } of candidates) {
    if ((await readRef({ fs, gitdir, ref: prefix + ref })) !== null) {
      return { kind, name: ref, ref: prefix + ref }
    }
  }
  if (isOid(ref)) return { kind: 'oid', oid: ref }
  return undefined
}
