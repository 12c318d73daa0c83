import shajs from 'sha.js'

const toBuffer = (buffer: Uint8Array): Buffer =>
  Buffer.isBuffer(buffer) ? buffer : Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength)

/**
 * SHA-256 of `buffer` as 64 lowercase hex chars.
 */
export const shasum = (buffer: Uint8Array): string => {
  return shajs('sha256').update(toBuffer(buffer)).digest('hex')
}

/**
 * SHA-256 of `buffer` as 32 raw bytes.
 */
export const shasumRaw = (buffer: Uint8Array): Buffer => {
  return shajs('sha256').update(toBuffer(buffer)).digest()
}

export const isOid = (value: string): boolean => /^[0-9a-f]{64}$/.test(value)
