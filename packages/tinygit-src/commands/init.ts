import { FileSystem } from '../models/FileSystem.ts'
import { GitConfig } from '../models/GitConfig.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { localConfigPath, writeConfigFile } from '../git/config/loadConfig.ts'
import { writeRef, writeSymbolicRef } from '../git/refs/writeRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import type { FsClient } from '../types/commandOptions.ts'

export type InitResult = {
  gitdir: string
  created: boolean
}

/**
 * Initialize a new repository
 *
 * Running it on a directory that already holds a repository changes nothing.
 *
 * @param args.fs - a file system client
 * @param args.dir - The working tree directory path
 * @param [args.gitdir=join(dir, '.tinygit')] - The metadata directory path
 * @param [args.defaultBranch='main'] - The name of the unborn branch HEAD starts on
 *
 * @example
 * await tinygit.init({ fs, dir: '/tutorial' })
 */
export async function init({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  defaultBranch = 'main',
}: {
  fs: FsClient
  dir?: string
  gitdir?: string
  defaultBranch?: string
}): Promise<InitResult> {
  try {
    assertParameter('fs', _fs)
    assertParameter('gitdir', gitdir)
    const fs = new FileSystem(_fs)
    const effectiveGitdir = gitdir
    return await withRepoLock(effectiveGitdir, () =>
      _init({ fs, gitdir: effectiveGitdir, defaultBranch })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.init')
    throw err
  }
}

export async function _init({
  fs,
  gitdir,
  defaultBranch = 'main',
}: {
  fs: FileSystem
  gitdir: string
  defaultBranch?: string
}): Promise<InitResult> {
  if (await fs.exists(join(gitdir, 'HEAD'))) {
    return { gitdir, created: false }
  }
  for (const folder of ['objects', 'refs/heads', 'refs/tags']) {
    await fs.mkdir(join(gitdir, folder))
  }
  const config = GitConfig.from('')
  config.set('core.repositoryformatversion', '0')
  await writeConfigFile({ fs, filepath: localConfigPath(gitdir), config })
  await writeRef({ fs, gitdir, ref: `refs/heads/${defaultBranch}`, value: null })
  // HEAD last: its presence is what marks the directory as a repository
  await writeSymbolicRef({ fs, gitdir, ref: 'HEAD', target: `refs/heads/${defaultBranch}` })
  return { gitdir, created: true }
}
