import { deflate } from '../../core-utils/Zlib.ts'
import { debug } from '../../utils/debug.ts'
import { hashObject } from './hashObject.ts'
import { writeLoose } from './loose.ts'
import type { FileSystem } from '../../models/FileSystem.ts'
import type { ObjectType } from '../../models/GitObject.ts'

/**
 * Put an object into the store and return its digest. Writing the same
 * content twice is a no-op the second time.
 *
 * @param object - raw content, without the `"<type> <length>\0"` header
 * @param dryRun - compute the digest without touching the store
 */
export async function writeObject({
  fs,
  gitdir,
  type,
  object,
  dryRun = false,
}: {
  fs: FileSystem
  gitdir: string
  type: ObjectType
  object: Uint8Array
  dryRun?: boolean
}): Promise<string> {
  const { oid, wrapped } = hashObject({ type, object })
  if (!dryRun) {
    const written = await writeLoose({ fs, gitdir, oid, deflated: deflate(wrapped) })
    if (written) debug('objects', `wrote ${type} ${oid}`)
  }
  return oid
}
