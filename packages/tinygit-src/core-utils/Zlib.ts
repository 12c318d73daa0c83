import pako from 'pako'

import { InternalError } from '../errors/InternalError.ts'

export const deflate = (buffer: Uint8Array): Uint8Array => {
  return pako.deflate(buffer)
}

export const inflate = (buffer: Uint8Array): Buffer => {
  try {
    const result = pako.inflate(buffer)
    return Buffer.from(result.buffer, result.byteOffset, result.byteLength)
  } catch (err) {
    throw new InternalError(`Could not inflate object: ${String(err)}`)
  }
}
