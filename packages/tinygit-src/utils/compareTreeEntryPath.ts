import { compareStrings } from './compareStrings.ts'
import type { TreeEntry } from '../models/GitTree.ts'

export const compareTreeEntryPath = (a: TreeEntry, b: TreeEntry): number => {
  // Directories sort as if their name had a trailing slash.
  return compareStrings(appendSlashIfDir(a), appendSlashIfDir(b))
}

const appendSlashIfDir = (entry: TreeEntry): string => {
  return entry.mode === '040000' ? entry.path + '/' : entry.path
}
