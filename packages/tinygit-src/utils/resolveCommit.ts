import { GitCommit, type CommitObject } from '../models/GitCommit.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { flattenTree, type FlatTree } from '../core-utils/TreeBuilder.ts'
import type { FileSystem } from '../models/FileSystem.ts'

export async function resolveCommit({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<CommitObject> {
  return GitCommit.from(await readObjectOfType({ fs, gitdir, oid, type: 'commit' })).parse()
}

/**
 * Files recorded by a commit; empty for `null` (no commit yet).
 */
export async function resolveCommitFiles({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string | null
}): Promise<FlatTree> {
  if (oid === null) return new Map()
  const { tree } = await resolveCommit({ fs, gitdir, oid })
  return flattenTree({ fs, gitdir, oid: tree })
}
