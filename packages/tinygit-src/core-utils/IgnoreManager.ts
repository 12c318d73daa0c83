import ignore from 'ignore'

import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'

type Ignore = ReturnType<typeof ignore>

export const IGNORE_FILE = '.tinygitignore'
export const GITDIR_NAME = '.tinygit'

/**
 * Answers whether a working-tree path is excluded by `.tinygitignore` files.
 * Each ignore file applies to paths below its own directory. Rules are read
 * once per directory and cached for the life of the filter.
 */
export class IgnoreManager {
  private readonly fs: FileSystem
  private readonly dir: string
  private readonly cache = new Map<string, Ignore | null>()

  constructor({ fs, dir }: { fs: FileSystem; dir: string }) {
    this.fs = fs
    this.dir = dir
  }

  private async rulesFor(folder: string): Promise<Ignore | null> {
    const cached = this.cache.get(folder)
    if (cached !== undefined) return cached
    const text = await this.fs.read(join(this.dir, folder, IGNORE_FILE), 'utf8')
    const rules = text === null || text.trim() === '' ? null : ignore().add(text)
    this.cache.set(folder, rules)
    return rules
  }

  /**
   * `filepath` is relative to the working-tree root, using `/`.
   */
  async isIgnored(filepath: string, isDirectory = false): Promise<boolean> {
    const pieces = filepath.split('/').filter(Boolean)
    if (pieces.includes(GITDIR_NAME)) return true
    if (pieces.length === 0) return false
    for (let i = 0; i < pieces.length; i++) {
      const folder = pieces.slice(0, i).join('/')
      const rules = await this.rulesFor(folder)
      if (rules === null) continue
      const rest = pieces.slice(i).join('/')
      // directory-only patterns ("build/") only match with a trailing slash
      if (rules.ignores(isDirectory ? rest + '/' : rest)) return true
    }
    return false
  }
}
