import { PathNotFoundError } from '../errors/PathNotFoundError.ts'
import { GITDIR_NAME, IgnoreManager } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { modeFromStat, sameEntry, walkWorkdir } from '../core-utils/WorkdirScanner.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { writeIndex } from '../git/index/writeIndex.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import { readHead } from '../git/refs/readHead.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { compareStrings } from '../utils/compareStrings.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join, relativeTo } from '../utils/join.ts'
import { resolveCommitFiles } from '../utils/resolveCommit.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { CommandWithFilepathOptions } from '../types/commandOptions.ts'

/**
 * Add file contents to the index
 *
 * Directories (including `.`) are walked recursively; `.tinygit` and paths
 * matched by `.tinygitignore` are skipped. A file whose content and mode equal
 * the current commit's copy is removed from the index instead of staged.
 *
 * @param args.fs - a file system client
 * @param args.dir - The working tree directory path
 * @param [args.gitdir=join(dir, '.tinygit')] - The metadata directory path
 * @param args.filepath - Files or directories to add, relative to `dir`
 *
 * @returns the paths that are staged as a result
 * @throws {PathNotFoundError} when a path does not exist or lies outside `dir`
 *
 * @example
 * await fs.promises.writeFile('/tutorial/README.md', '# tinygit')
 * await tinygit.add({ fs, dir: '/tutorial', filepath: 'README.md' })
 */
export async function add({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  filepath,
}: CommandWithFilepathOptions): Promise<string[]> {
  try {
    assertParameter('dir', dir)
    assertParameter('filepath', filepath)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const workdir = dir
    const filepaths = Array.isArray(filepath) ? filepath : [filepath]
    return await withRepoLock(effectiveGitdir, () =>
      _add({ fs, dir: workdir, gitdir: effectiveGitdir, filepaths })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.add')
    throw err
  }
}

/**
 * Map a user-supplied path onto a repository path, refusing anything that
 * escapes the working tree or reaches into the metadata directory.
 */
export const toRepoPath = (dir: string, filepath: string): string => {
  const relative = relativeTo(dir, filepath.startsWith('/') ? filepath : join(dir, filepath))
  if (relative === null || relative.split('/').includes(GITDIR_NAME)) {
    throw new PathNotFoundError(filepath)
  }
  return relative
}

export async function _add({
  fs,
  dir,
  gitdir,
  filepaths,
}: {
  fs: FileSystem
  dir: string
  gitdir: string
  filepaths: string[]
}): Promise<string[]> {
  const ignore = new IgnoreManager({ fs, dir })
  const files = new Set<string>()
  for (const filepath of filepaths) {
    const relative = toRepoPath(dir, filepath)
    const stat = await fs.lstat(join(dir, relative))
    if (stat === null) throw new PathNotFoundError(filepath)
    if (stat.isDirectory()) {
      const from = relative === '.' ? '' : relative
      for (const file of await walkWorkdir({ fs, dir, ignore, from })) files.add(file)
    } else if (stat.isFile()) {
      files.add(relative)
    } else {
      throw new PathNotFoundError(filepath)
    }
  }

  const index = await readIndex({ fs, gitdir })
  const head = await readHead({ fs, gitdir })
  const committed = await resolveCommitFiles({ fs, gitdir, oid: head.oid })
  const staged: string[] = []
  for (const file of [...files].sort(compareStrings)) {
    const stat = await fs.lstat(join(dir, file))
    const content = await fs.read(join(dir, file))
    if (stat === null || content === null) throw new PathNotFoundError(file)
    const entry = {
      oid: await writeObject({ fs, gitdir, type: 'blob', object: content }),
      mode: modeFromStat(stat),
    }
    if (sameEntry(entry, committed.get(file))) {
      index.unstage(file)
    } else {
      index.stage(file, entry.oid, entry.mode)
      staged.push(file)
    }
  }
  await writeIndex({ fs, gitdir, index })
  return staged
}
