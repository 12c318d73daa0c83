import { NothingToCommitError } from '../errors/NothingToCommitError.ts'
import { UserCanceledError } from '../errors/UserCanceledError.ts'
import { GitCommit, type Author } from '../models/GitCommit.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { writeTreeFromEntries } from '../core-utils/TreeBuilder.ts'
import { loadConfig } from '../git/config/loadConfig.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { writeIndex } from '../git/index/writeIndex.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import { readHead } from '../git/refs/readHead.ts'
import { writeRef } from '../git/refs/writeRef.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { dropClashingPaths } from '../utils/dropClashingPaths.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { join } from '../utils/join.ts'
import { normalizeAuthorObject } from '../utils/normalizeAuthorObject.ts'
import { resolveCommitFiles } from '../utils/resolveCommit.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { GitConfig } from '../models/GitConfig.ts'
import type { BaseCommandOptions } from '../types/commandOptions.ts'

export type CommitOptions = BaseCommandOptions & {
  message: string
  author?: Partial<Author>
  committer?: Partial<Author>
  /** configuration to take `user.name` / `user.email` from; loaded from disk when omitted */
  config?: GitConfig
  globalConfigPath?: string
  signal?: AbortSignal
}

/**
 * Create a new commit
 *
 * The new tree is the current commit's tree with every index entry laid over
 * it. The commit becomes the tip of the current branch (or the new detached
 * `HEAD`) and the index is emptied. If anything fails before the ref moves,
 * refs and index are left as they were.
 *
 * @param args.message - The commit message to use
 * @param [args.author] - Defaults to `user.name` / `user.email` from config and the current time
 * @param [args.committer] - Defaults to the author
 * @param [args.signal] - Aborting it before the ref update cancels the commit
 *
 * @returns the digest of the newly created commit
 * @throws {NothingToCommitError} when the index is empty
 * @throws {MissingNameError} when no author name or email can be found
 *
 * @example
 * let oid = await tinygit.commit({
 *   fs,
 *   dir: '/tutorial',
 *   author: { name: 'Mr. Test', email: 'mrtest@example.com' },
 *   message: 'Added the a.txt file',
 * })
 */
export async function commit({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  message,
  author,
  committer,
  config,
  globalConfigPath,
  signal,
}: CommitOptions): Promise<string> {
  try {
    assertParameter('message', message)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    return await withRepoLock(effectiveGitdir, async () =>
      _commit({
        fs,
        gitdir: effectiveGitdir,
        message,
        author,
        committer,
        config: config ?? (await loadConfig({ fs, gitdir: effectiveGitdir, globalPath: globalConfigPath })),
        signal,
      })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.commit')
    throw err
  }
}

export async function _commit({
  fs,
  gitdir,
  message,
  author: _author,
  committer: _committer,
  config,
  signal,
}: {
  fs: FileSystem
  gitdir: string
  message: string
  author?: Partial<Author>
  committer?: Partial<Author>
  config: GitConfig
  signal?: AbortSignal
}): Promise<string> {
  const index = await readIndex({ fs, gitdir })
  if (index.size === 0) throw new NothingToCommitError()

  const author = normalizeAuthorObject({ config, author: _author })
  const committer = _committer
    ? normalizeAuthorObject({ config, author: { ...author, ..._committer }, role: 'committer' })
    : author

  const head = await readHead({ fs, gitdir })
  const files = await resolveCommitFiles({ fs, gitdir, oid: head.oid })
  for (const entry of index) {
    dropClashingPaths(files, entry.path)
    files.set(entry.path, { oid: entry.oid, mode: entry.mode })
  }
  const tree = await writeTreeFromEntries({ fs, gitdir, entries: files })
  const oid = await writeObject({
    fs,
    gitdir,
    type: 'commit',
    object: GitCommit.from({ tree, parent: head.oid, author, committer, message }).toObject(),
  })

  if (signal?.aborted) {
    throw new UserCanceledError(signal.reason instanceof Error ? signal.reason : undefined)
  }

  await writeRef({ fs, gitdir, ref: head.detached ? 'HEAD' : head.ref, value: oid })
  index.clear()
  await writeIndex({ fs, gitdir, index })
  return oid
}
