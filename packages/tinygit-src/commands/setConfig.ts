import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import {
  defaultGlobalConfigPath,
  localConfigPath,
  readConfigFile,
  writeConfigFile,
} from '../git/config/loadConfig.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { ConfigOptions } from './getConfig.ts'

/**
 * Write an entry to a config file
 *
 * @param args.path - The key of the config entry, e.g. `user.email`
 * @param args.value - The value to store; `undefined` deletes the entry
 * @param [args.scope='local'] - Which file to change
 *
 * @example
 * await tinygit.setConfig({ fs, dir: '/tutorial', path: 'user.name', value: 'Mr. Test' })
 */
export async function setConfig({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  path,
  value,
  scope = 'local',
  globalConfigPath = defaultGlobalConfigPath(),
}: ConfigOptions & { path: string; value: string | undefined }): Promise<void> {
  try {
    assertParameter('path', path)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const filepath = scope === 'global' ? globalConfigPath : localConfigPath(effectiveGitdir)
    await withRepoLock(effectiveGitdir, async () => {
      const config = await readConfigFile({ fs, filepath })
      config.set(path, value)
      await writeConfigFile({ fs, filepath, config })
    })
  } catch (err) {
    tagCaller(err, 'tinygit.setConfig')
    throw err
  }
}
