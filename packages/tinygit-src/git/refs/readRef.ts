import { InternalError } from '../../errors/InternalError.ts'
import { isOid } from '../../core-utils/ShaHasher.ts'
import { join } from '../../utils/join.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

/**
 * What a ref file holds: a digest, a pointer to another ref, or nothing yet
 * (an unborn branch).
 */
export type RefValue =
  | { type: 'direct'; oid: string }
  | { type: 'symbolic'; target: string }
  | { type: 'unborn' }

export const refPath = (gitdir: string, ref: string): string => join(gitdir, ref)

export const parseRefValue = (ref: string, text: string): RefValue => {
  const value = text.trim()
  if (value === '') return { type: 'unborn' }
  if (value.startsWith('ref: ')) {
    return { type: 'symbolic', target: value.slice('ref: '.length).trim() }
  }
  if (isOid(value)) return { type: 'direct', oid: value }
  throw new InternalError(`Ref ${ref} holds an unrecognized value "${value}".`)
}

/**
 * Read the raw value of a full ref name (`HEAD`, `refs/heads/main`).
 * Returns `null` when the ref does not exist.
 */
export async function readRef({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<RefValue | null> {
  const text = await fs.read(refPath(gitdir, ref), 'utf8')
  if (text === null) return null
  return parseRefValue(ref, text)
}

/**
 * Follow symbolic refs until a digest, an unborn branch (`null`) or a
 * missing ref (`undefined`).
 */
export async function resolveRefValue({
  fs,
  gitdir,
  ref,
  depth = 5,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  depth?: number
}): Promise<string | null | undefined> {
  const value = await readRef({ fs, gitdir, ref })
  if (value === null) return undefined
  switch (value.type) {
    case 'direct':
      return value.oid
    case 'unborn':
      return null
    case 'symbolic': {
      if (depth <= 0) throw new InternalError(`Too many levels of symbolic refs at ${ref}.`)
      const target = await resolveRefValue({ fs, gitdir, ref: value.target, depth: depth - 1 })
      // HEAD pointing at a branch that has no file yet is unborn, not missing
      return target === undefined ? null : target
    }
  }
}
