import { InternalError } from '../../errors/InternalError.ts'
import { ObjectNotFoundError } from '../../errors/ObjectNotFoundError.ts'
import { GitObject, type ObjectType } from '../../models/GitObject.ts'
import { shasum } from '../../core-utils/ShaHasher.ts'
import { inflate } from '../../core-utils/Zlib.ts'
import { readLoose } from './loose.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export type ReadObjectResult = {
  oid: string
  type: ObjectType
  object: Buffer
}

/**
 * Read an object and check it against its digest.
 */
export async function readObject({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<ReadObjectResult> {
  const deflated = await readLoose({ fs, gitdir, oid })
  if (deflated === null) {
    throw new ObjectNotFoundError(oid)
  }
  const wrapped = inflate(deflated)
  const actual = shasum(wrapped)
  if (actual !== oid) {
    throw new InternalError(`SHA check failed! Expected ${oid}, computed ${actual}`)
  }
  const { type, object } = GitObject.unwrap(wrapped)
  return { oid, type, object }
}

/**
 * Like {@link readObject}, but fails unless the object has the given type.
 */
export async function readObjectOfType({
  fs,
  gitdir,
  oid,
  type,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
  type: ObjectType
}): Promise<Buffer> {
  const result = await readObject({ fs, gitdir, oid })
  if (result.type !== type) {
    throw new InternalError(`Object ${oid} is a ${result.type}, expected a ${type}.`)
  }
  return result.object
}
