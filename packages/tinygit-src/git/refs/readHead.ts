import { InternalError } from '../../errors/InternalError.ts'
import { NotARepositoryError } from '../../errors/NotARepositoryError.ts'
import { readRef, resolveRefValue } from './readRef.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export type HeadState =
  | { detached: false; branch: string; ref: string; oid: string | null }
  | { detached: true; oid: string }

export const BRANCH_PREFIX = 'refs/heads/'
export const TAG_PREFIX = 'refs/tags/'

/**
 * Where HEAD points: a branch (possibly unborn, `oid: null`) or a commit.
 */
export async function readHead({
  fs,
  gitdir,
}: {
  fs: FileSystem
  gitdir: string
}): Promise<HeadState> {
  const head = await readRef({ fs, gitdir, ref: 'HEAD' })
  if (head === null) throw new NotARepositoryError(gitdir)
  switch (head.type) {
    case 'direct':
      return { detached: true, oid: head.oid }
    case 'unborn':
      throw new InternalError('HEAD is empty.')
    case 'symbolic': {
      if (!head.target.startsWith(BRANCH_PREFIX)) {
        throw new InternalError(`HEAD points outside refs/heads: ${head.target}`)
      }
      const oid = await resolveRefValue({ fs, gitdir, ref: head.target })
      return {
        detached: false,
        branch: head.target.slice(BRANCH_PREFIX.length),
        ref: head.target,
        oid: oid ?? null,
      }
    }
  }
}
