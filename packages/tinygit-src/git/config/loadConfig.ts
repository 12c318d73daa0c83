import { homedir } from 'node:os'

import { GitConfig } from '../../models/GitConfig.ts'
import { join } from '../../utils/join.ts'
import type { FileSystem } from '../../models/FileSystem.ts'

export type ConfigScope = 'local' | 'global'

export const localConfigPath = (gitdir: string): string => join(gitdir, 'config')

export const defaultGlobalConfigPath = (): string => join(homedir(), '.tinygitconfig')

export async function readConfigFile({
  fs,
  filepath,
}: {
  fs: FileSystem
  filepath: string
}): Promise<GitConfig> {
  return GitConfig.from(await fs.read(filepath, 'utf8'))
}

export async function writeConfigFile({
  fs,
  filepath,
  config,
}: {
  fs: FileSystem
  filepath: string
  config: GitConfig
}): Promise<void> {
  const text = config.toString()
  await fs.writeAtomic(filepath, text.endsWith('\n') ? text : text + '\n')
}

/**
 * The configuration a command runs with: the global file overlaid by the
 * repository's own. Read once and passed along, never cached between
 * invocations.
 */
export async function loadConfig({
  fs,
  gitdir,
  globalPath = defaultGlobalConfigPath(),
}: {
  fs: FileSystem
  gitdir?: string
  globalPath?: string
}): Promise<GitConfig> {
  const globalConfig = await readConfigFile({ fs, filepath: globalPath })
  if (gitdir === undefined) return globalConfig
  const localConfig = await readConfigFile({ fs, filepath: localConfigPath(gitdir) })
  return GitConfig.merge(globalConfig, localConfig)
}
