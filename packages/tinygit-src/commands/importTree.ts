import { FileSystem } from '../models/FileSystem.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { loadConfig } from '../git/config/loadConfig.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { _add } from './add.ts'
import { _commit } from './commit.ts'
import { _init } from './init.ts'
import type { Author } from '../models/GitCommit.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

export type ImportTreeResult = {
  oid: string
  files: string[]
}

/**
 * Turn an already-populated directory into a repository with one commit
 *
 * Initializes the repository if needed, stages every file that is not
 * ignored and commits. This is how front ends that fetch a snapshot from
 * elsewhere (an archive download, say) hand it over.
 *
 * @param [args.message='Initial import'] - The commit message
 *
 * @example
 * let { oid } = await tinygit.importTree({ fs, dir: '/downloads/project', message: 'Imported' })
 */
export async function importTree({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  message = 'Initial import',
  author,
  globalConfigPath,
}: BaseCommandOptions & {
  message?: string
  author?: Partial<Author>
  globalConfigPath?: string
}): Promise<ImportTreeResult> {
  try {
    assertParameter('fs', _fs)
    assertParameter('dir', dir)
    assertParameter('gitdir', gitdir)
    const fs = new FileSystem(_fs)
    const workdir = dir
    const effectiveGitdir = gitdir
    return await withRepoLock(effectiveGitdir, async () => {
      await _init({ fs, gitdir: effectiveGitdir })
      const files = await _add({ fs, dir: workdir, gitdir: effectiveGitdir, filepaths: ['.'] })
      const config = await loadConfig({ fs, gitdir: effectiveGitdir, globalPath: globalConfigPath })
      const oid = await _commit({ fs, gitdir: effectiveGitdir, message, author, config })
      return { oid, files }
    })
  } catch (err) {
    tagCaller(err, 'tinygit.importTree')
    throw err
  }
}
