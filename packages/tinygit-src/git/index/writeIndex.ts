import { debug } from '../../utils/debug.ts'
import { indexPath } from './readIndex.ts'
import type { FileSystem } from '../../models/FileSystem.ts'
import type { GitIndex } from './GitIndex.ts'

export async function writeIndex({
  fs,
  gitdir,
  index,
}: {
  fs: FileSystem
  gitdir: string
  index: GitIndex
}): Promise<void> {
  await fs.writeAtomic(indexPath(gitdir), index.toObject())
  debug('index', `wrote ${index.size} entries`)
}
