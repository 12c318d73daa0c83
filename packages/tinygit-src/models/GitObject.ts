import { InternalError } from '../errors/InternalError.ts'

export type ObjectType = 'blob' | 'tree' | 'commit'

const OBJECT_TYPES: readonly ObjectType[] = ['blob', 'tree', 'commit']

export const isObjectType = (value: string): value is ObjectType => {
  return OBJECT_TYPES.some(type => type === value)
}

/**
 * The envelope every stored object is hashed and kept in:
 * `"<type> <byte length>\0<content>"`.
 */
export class GitObject {
  static wrap({ type, object }: { type: ObjectType; object: Uint8Array }): Buffer {
    const header = Buffer.from(`${type} ${object.length}\x00`, 'utf8')
    return Buffer.concat([header, object])
  }

  static unwrap(buffer: Uint8Array): { type: ObjectType; object: Buffer } {
    const buf = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    const s = buf.indexOf(32)
    const i = buf.indexOf(0)
    if (s === -1 || i === -1 || s > i) {
      throw new InternalError('Malformed object header.')
    }
    const type = buf.subarray(0, s).toString('utf8')
    if (!isObjectType(type)) {
      throw new InternalError(`Unexpected object type "${type}".`)
    }
    const length = buf.subarray(s + 1, i).toString('utf8')
    const actualLength = buf.length - (i + 1)
    if (!/^\d+$/.test(length) || Number(length) !== actualLength) {
      throw new InternalError(
        `Length mismatch: expected ${length} bytes but got ${actualLength} instead.`
      )
    }
    return { type, object: Buffer.from(buf.subarray(i + 1)) }
  }
}
