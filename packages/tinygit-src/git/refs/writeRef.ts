import { debug } from '../../utils/debug.ts'
import { refPath } from './readRef.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

/**
 * Point `ref` at `value`, or mark it unborn with `null`. The file is
 * replaced atomically.
 */
export async function writeRef({
  fs,
  gitdir,
  ref,
  value,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  value: string | null
}): Promise<void> {
  await fs.writeAtomic(refPath(gitdir, ref), `${value ?? ''}\n`)
  debug('refs', `${ref} -> ${value ?? '(unborn)'}`)
}

export async function writeSymbolicRef({
  fs,
  gitdir,
  ref,
  target,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
  target: string
}): Promise<void> {
  await fs.writeAtomic(refPath(gitdir, ref), `ref: ${target}\n`)
  debug('refs', `${ref} -> ref: ${target}`)
}
