import { compareStrings } from '../../utils/compareStrings.ts'
import { join } from '../../utils/join.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

/**
 * Names under `prefix` (e.g. `refs/heads/`), relative to it and sorted.
 * Nested names such as `feature/x` are included.
 */
export async function listRefs({
  fs,
  gitdir,
  prefix,
}: {
  fs: FileSystem
  gitdir: string
  prefix: string
}): Promise<string[]> {
  const names: string[] = []
  const walk = async (relative: string): Promise<void> => {
    for (const name of await fs.readdir(join(gitdir, prefix, relative))) {
      // skip atomic-write leftovers
      if (name.endsWith('.tmp')) continue
      const child = relative === '' ? name : `${relative}/${name}`
      const stat = await fs.lstat(join(gitdir, prefix, child))
      if (stat === null) continue
      if (stat.isDirectory()) {
        await walk(child)
      } else {
        names.push(child)
      }
    }
  }
  await walk('')
  return names.sort(compareStrings)
}

/**
 * An existing ref under `prefix` that occupies part of the path `name` needs:
 * a ref at one of its parent paths (`foo` for `foo/bar`), or a ref nested
 * under it (`x/y` for `x`). Returns that ref's name, or `undefined`.
 * `except` names a ref that is about to be removed and does not count.
 */
export async function findBlockingRef({
  fs,
  gitdir,
  prefix,
  name,
  except,
}: {
  fs: FileSystem
  gitdir: string
  prefix: string
  name: string
  except?: string
}): Promise<string | undefined> {
  const parts = name.split('/')
  for (let i = 1; i < parts.length; i++) {
    const parent = parts.slice(0, i).join('/')
    const stat = await fs.lstat(join(gitdir, prefix, parent))
    if (stat === null) return undefined
    if (!stat.isDirectory()) return parent === except ? undefined : parent
  }
  const stat = await fs.lstat(join(gitdir, prefix, name))
  if (stat === null || !stat.isDirectory()) return undefined
  const nested = (await listRefs({ fs, gitdir, prefix: `${prefix}${name}/` }))
    .map(child => `${name}/${child}`)
    .filter(child => child !== except)
  return nested[0]
}
