import { hasLoose } from './loose.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export async function hasObject({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<boolean> {
  return hasLoose({ fs, gitdir, oid })
}
