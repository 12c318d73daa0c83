import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import {
  defaultGlobalConfigPath,
  loadConfig,
  localConfigPath,
  readConfigFile,
  type ConfigScope,
} from '../git/config/loadConfig.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { GitConfig } from '../models/GitConfig.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

export type ConfigOptions = BaseCommandOptions & {
  /** read one file only; both, local winning, when omitted */
  scope?: ConfigScope
  globalConfigPath?: string
}

/**
 * Read an entry from the config files
 *
 * @param args.path - The key of the config entry, e.g. `user.name`
 *
 * @returns the last value set for the key, or `undefined`
 *
 * @example
 * let value = await tinygit.getConfig({ fs, dir: '/tutorial', path: 'user.name' })
 * console.log(value)
 */
export async function getConfig({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  path,
  scope,
  globalConfigPath,
}: ConfigOptions & { path: string }): Promise<string | undefined> {
  try {
    assertParameter('path', path)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const config = await readScopedConfig({ fs, gitdir: effectiveGitdir, scope, globalConfigPath })
    return config.get(path)
  } catch (err) {
    tagCaller(err, 'tinygit.getConfig')
    throw err
  }
}

/**
 * Every entry as `[key, value]`, in file order
 *
 * @example
 * for (const [key, value] of await tinygit.listConfig({ fs, dir: '/tutorial' })) {
 *   console.log(`${key}=${value}`)
 * }
 */
export async function listConfig({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  scope,
  globalConfigPath,
}: ConfigOptions): Promise<Array<[string, string]>> {
  try {
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const config = await readScopedConfig({ fs, gitdir: effectiveGitdir, scope, globalConfigPath })
    return config.entries()
  } catch (err) {
    tagCaller(err, 'tinygit.listConfig')
    throw err
  }
}

export async function readScopedConfig({
  fs,
  gitdir,
  scope,
  globalConfigPath = defaultGlobalConfigPath(),
}: {
  fs: FileSystem
  gitdir: string
  scope?: ConfigScope
  globalConfigPath?: string
}): Promise<GitConfig> {
  switch (scope) {
    case 'local':
      return readConfigFile({ fs, filepath: localConfigPath(gitdir) })
    case 'global':
      return readConfigFile({ fs, filepath: globalConfigPath })
    case undefined:
      return loadConfig({ fs, gitdir, globalPath: globalConfigPath })
  }
}
