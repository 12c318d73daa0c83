import { join } from '../../utils/join.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

/**
 * `objects/ab/cdef...`: the first two hex chars of the digest name the
 * directory.
 */
export const loosePath = (gitdir: string, oid: string): string => {
  return join(gitdir, 'objects', oid.slice(0, 2), oid.slice(2))
}

export async function readLoose({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<Buffer | null> {
  return fs.read(loosePath(gitdir, oid))
}

export async function hasLoose({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<boolean> {
  return fs.exists(loosePath(gitdir, oid))
}

/**
 * Store already-deflated bytes under `oid`. Objects are immutable, so an
 * existing file is left alone.
 */
export async function writeLoose({
  fs,
  gitdir,
  oid,
  deflated,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
  deflated: Uint8Array
}): Promise<boolean> {
  const filepath = loosePath(gitdir, oid)
  if (await fs.exists(filepath)) return false
  await fs.writeAtomic(filepath, deflated)
  return true
}
