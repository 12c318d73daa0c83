import { hashObject } from '../git/objects/hashObject.ts'
import { compareStrings } from '../utils/compareStrings.ts'
import { join } from '../utils/join.ts'
import { IgnoreManager } from './IgnoreManager.ts'
import type { FileSystem, Stat } from '../models/FileSystem.ts'
import type { FileMode } from '../models/GitTree.ts'
import type { GitIndex } from '../git/index/GitIndex.ts'
import type { FlatEntry, FlatTree } from './TreeBuilder.ts'

export type ScanResult = {
  staged: string[]
  modified: string[]
  untracked: string[]
}

export const modeFromStat = (stat: Stat): FileMode => {
  return stat.mode & 0o111 ? '100755' : '100644'
}

/**
 * Every regular file under `from` (relative to `dir`), skipping the
 * metadata directory and ignored paths. Symlinks are not followed.
 */
export async function walkWorkdir({
  fs,
  dir,
  ignore = new IgnoreManager({ fs, dir }),
  from = '',
}: {
  fs: FileSystem
  dir: string
  ignore?: IgnoreManager
  from?: string
}): Promise<string[]> {
  const files: string[] = []
  const walk = async (relative: string): Promise<void> => {
    for (const name of await fs.readdir(join(dir, relative))) {
      const child = relative === '' ? name : `${relative}/${name}`
      const stat = await fs.lstat(join(dir, child))
      if (stat === null || stat.isSymbolicLink()) continue
      if (await ignore.isIgnored(child, stat.isDirectory())) continue
      if (stat.isDirectory()) {
        await walk(child)
      } else if (stat.isFile()) {
        files.push(child)
      }
    }
  }
  await walk(from)
  return files.sort(compareStrings)
}

/**
 * Digest and mode a file would get if it were added, or `null` when there is
 * no regular file at `filepath`. Nothing is written.
 */
export async function hashWorkdirFile({
  fs,
  dir,
  filepath,
}: {
  fs: FileSystem
  dir: string
  filepath: string
}): Promise<FlatEntry | null> {
  const stat = await fs.lstat(join(dir, filepath))
  if (stat === null || !stat.isFile()) return null
  const content = await fs.read(join(dir, filepath))
  if (content === null) return null
  return { oid: hashObject({ type: 'blob', object: content }).oid, mode: modeFromStat(stat) }
}

export const sameEntry = (a: FlatEntry | null | undefined, b: FlatEntry | null | undefined): boolean => {
  if (!a || !b) return !a && !b
  return a.oid === b.oid && a.mode === b.mode
}

/**
 * Split the working tree into three disjoint sets:
 * - `staged`: index entries that differ from the current commit
 * - `modified`: committed paths, not staged, whose file changed or is gone
 * - `untracked`: files neither committed nor staged, and not ignored
 */
export async function scanWorkdir({
  fs,
  dir,
  index,
  headTree,
}: {
  fs: FileSystem
  dir: string
  index: GitIndex
  headTree: FlatTree
}): Promise<ScanResult> {
  const staged: string[] = []
  for (const entry of index) {
    if (!sameEntry(entry, headTree.get(entry.path))) staged.push(entry.path)
  }

  const modified: string[] = []
  for (const [path, entry] of headTree) {
    if (index.has(path)) continue
    const actual = await hashWorkdirFile({ fs, dir, filepath: path })
    if (!sameEntry(entry, actual)) modified.push(path)
  }

  const untracked: string[] = []
  for (const path of await walkWorkdir({ fs, dir })) {
    if (!index.has(path) && !headTree.has(path)) untracked.push(path)
  }

  return {
    staged: staged.sort(compareStrings),
    modified: modified.sort(compareStrings),
    untracked,
  }
}
