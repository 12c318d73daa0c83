import { dirname, join } from '../../utils/join.ts'
import { refPath } from './readRef.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

/**
 * Remove a ref file, then prune directories it leaves empty (never `refs/heads`
 * or `refs/tags` themselves).
 */
export async function deleteRef({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<void> {
  await fs.rm(refPath(gitdir, ref))
  const stop = new Set([join(gitdir, 'refs'), join(gitdir, 'refs/heads'), join(gitdir, 'refs/tags')])
  let dir = dirname(refPath(gitdir, ref))
  while (!stop.has(dir) && dir.startsWith(join(gitdir, 'refs'))) {
    if (!(await fs.rmdirIfEmpty(dir))) break
    dir = dirname(dir)
  }
}
