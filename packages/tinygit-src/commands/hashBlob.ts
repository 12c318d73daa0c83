import { hashObject } from '../git/objects/hashObject.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { tagCaller } from '../utils/commandHelpers.ts'

/**
 * Compute what digest a file's content would get, without a repository
 *
 * @example
 * let { oid } = tinygit.hashBlob({ object: 'Hello world!' })
 */
export function hashBlob({ object }: { object: Uint8Array | string }): {
  oid: string
  type: 'blob'
  object: Uint8Array
} {
  try {
    assertParameter('object', object)
    const bytes = typeof object === 'string' ? Buffer.from(object, 'utf8') : object
    return { oid: hashObject({ type: 'blob', object: bytes }).oid, type: 'blob', object: bytes }
  } catch (err) {
    tagCaller(err, 'tinygit.hashBlob')
    throw err
  }
}
