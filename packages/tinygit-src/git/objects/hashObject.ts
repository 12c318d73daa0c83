import { GitObject, type ObjectType } from '../../models/GitObject.ts'
import { shasum } from '../../core-utils/ShaHasher.ts'

export function hashObject({
  type,
  object,
}: {
  type: ObjectType
  object: Uint8Array
}): { oid: string; wrapped: Buffer } {
  const wrapped = GitObject.wrap({ type, object })
  return { oid: shasum(wrapped), wrapped }
}
