import { dirname } from './join.ts'

/**
 * Make room for a file at `filepath` in a path-keyed map: a file cannot sit
 * where a directory is, nor under a path that is a file. Removes every key
 * at a parent path of `filepath` and every key nested under it.
 */
export function dropClashingPaths<T>(entries: Map<string, T>, filepath: string): void {
  for (let parent = dirname(filepath); parent !== '.'; parent = dirname(parent)) {
    entries.delete(parent)
  }
  const prefix = `${filepath}/`
  for (const key of [...entries.keys()]) {
    if (key.startsWith(prefix)) entries.delete(key)
  }
}
