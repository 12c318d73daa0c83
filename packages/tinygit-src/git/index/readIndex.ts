import { join } from '../../utils/join.ts'
import { GitIndex } from './GitIndex.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export const indexPath = (gitdir: string): string => join(gitdir, 'index')

/**
 * A missing index file reads as an empty index.
 */
export async function readIndex({
  fs,
  gitdir,
}: {
  fs: FileSystem
  gitdir: string
}): Promise<GitIndex> {
  return GitIndex.from(await fs.read(indexPath(gitdir)))
}
