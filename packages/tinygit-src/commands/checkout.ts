import { UncommittedChangesError } from '../errors/UncommittedChangesError.ts'
import { UnknownRefError } from '../errors/UnknownRefError.ts'
import { GITDIR_NAME } from '../core-utils/IgnoreManager.ts'
import { withRepoLock } from '../core-utils/RepoLock.ts'
import { hashWorkdirFile, sameEntry } from '../core-utils/WorkdirScanner.ts'
import { readIndex } from '../git/index/readIndex.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { expandRef } from '../git/refs/expandRef.ts'
import { readHead } from '../git/refs/readHead.ts'
import { resolveRefValue } from '../git/refs/readRef.ts'
import { writeRef, writeSymbolicRef } from '../git/refs/writeRef.ts'
import { ObjectNotFoundError } from '../errors/ObjectNotFoundError.ts'
import { assertParameter } from '../utils/assertParameter.ts'
import { compareStrings } from '../utils/compareStrings.ts'
import { normalizeCommandArgs, tagCaller } from '../utils/commandHelpers.ts'
import { debug } from '../utils/debug.ts'
import { dirname, join } from '../utils/join.ts'
import { resolveCommitFiles } from '../utils/resolveCommit.ts'
import type { FileSystem } from '../models/FileSystem.ts'
import type { FlatTree } from '../core-utils/TreeBuilder.ts'
import type { CommandWithRefOptions } from '../types/commandOptions.ts'

export type CheckoutResult =
  | { detached: false; branch: string; oid: string | null }
  | { detached: true; oid: string }

type Target =
  | { detached: false; branch: string; ref: string; oid: string | null }
  | { detached: true; oid: string }

/**
 * Switch branches, or detach HEAD at a tag or commit
 *
 * `ref` is looked up as a branch, then a tag, then a full commit digest.
 * The working tree is rewritten to match the target commit. Nothing changes
 * if the index holds staged changes, or if an uncommitted change or an
 * untracked file would be overwritten or deleted by the switch.
 *
 * @throws {UnknownRefError}
 * @throws {UncommittedChangesError}
 *
 * @example
 * await tinygit.checkout({ fs, dir: '/tutorial', ref: 'develop' })
 */
export async function checkout({
  fs: _fs,
  dir,
  gitdir = dir ? join(dir, GITDIR_NAME) : undefined,
  ref,
}: CommandWithRefOptions): Promise<CheckoutResult> {
  try {
    assertParameter('dir', dir)
    assertParameter('ref', ref)
    const { fs, gitdir: effectiveGitdir } = await normalizeCommandArgs({ fs: _fs, gitdir })
    const workdir = dir
    return await withRepoLock(effectiveGitdir, () =>
      _checkout({ fs, dir: workdir, gitdir: effectiveGitdir, ref })
    )
  } catch (err) {
    tagCaller(err, 'tinygit.checkout')
    throw err
  }
}

async function resolveTarget({
  fs,
  gitdir,
  ref,
}: {
  fs: FileSystem
  gitdir: string
  ref: string
}): Promise<Target> {
  const expanded = await expandRef({ fs, gitdir, ref })
  if (expanded === undefined) throw new UnknownRefError(ref)
  switch (expanded.kind) {
    case 'head': {
      const head = await readHead({ fs, gitdir })
      return head.detached
        ? { detached: true, oid: head.oid }
        : { detached: false, branch: head.branch, ref: head.ref, oid: head.oid }
    }
    case 'branch': {
      const oid = await resolveRefValue({ fs, gitdir, ref: expanded.ref })
      return { detached: false, branch: expanded.name, ref: expanded.ref, oid: oid ?? null }
    }
    case 'tag':
    case 'oid': {
      const oid =
        expanded.kind === 'oid'
          ? expanded.oid
          : await resolveRefValue({ fs, gitdir, ref: expanded.ref })
      if (!oid) throw new UnknownRefError(ref)
      try {
        await readObjectOfType({ fs, gitdir, oid, type: 'commit' })
      } catch (err) {
        // a digest that names nothing in the store is just an unknown name
        if (expanded.kind === 'oid' && err instanceof ObjectNotFoundError) {
          throw new UnknownRefError(ref)
        }
        throw err
      }
      return { detached: true, oid }
    }
  }
}

/**
 * Paths whose file differs between the two commits.
 */
const changedPaths = (from: FlatTree, to: FlatTree): string[] => {
  const paths = new Set([...from.keys(), ...to.keys()])
  return [...paths].filter(path => !sameEntry(from.get(path), to.get(path))).sort(compareStrings)
}

export async function _checkout({
  fs,
  dir,
  gitdir,
  ref,
}: {
  fs: FileSystem
  dir: string
  gitdir: string
  ref: string
}): Promise<CheckoutResult> {
  const target = await resolveTarget({ fs, gitdir, ref })
  const index = await readIndex({ fs, gitdir })
  if (index.size > 0) {
    throw new UncommittedChangesError(
      index.entries().map(entry => entry.path),
      'staged'
    )
  }

  const head = await readHead({ fs, gitdir })
  // an unborn target keeps whatever is on disk
  if (target.oid !== null && target.oid !== head.oid) {
    const current = await resolveCommitFiles({ fs, gitdir, oid: head.oid })
    const next = await resolveCommitFiles({ fs, gitdir, oid: target.oid })
    const paths = changedPaths(current, next)

    const conflicts = new Set<string>()
    const removals: string[] = []
    const writes: string[] = []
    for (const path of paths) {
      const onDisk = await hashWorkdirFile({ fs, dir, filepath: path })
      const wanted = next.get(path)
      if (sameEntry(onDisk, wanted)) continue
      if (!sameEntry(onDisk, current.get(path))) {
        conflicts.add(path)
      } else if (wanted === undefined) {
        removals.push(path)
      } else {
        writes.push(path)
      }
    }
    const removed = new Set(removals)
    for (const path of writes) {
      for (const blocking of await blockingPaths({ fs, dir, path, removed })) {
        conflicts.add(blocking)
      }
    }
    if (conflicts.size > 0) {
      throw new UncommittedChangesError([...conflicts].sort(compareStrings), 'worktree')
    }

    // deepest first, so emptied directories can go before a file takes their place
    removals.sort((a, b) => depth(b) - depth(a) || compareStrings(a, b))
    for (const path of removals) {
      await fs.rm(join(dir, path))
      await pruneEmptyDirs(fs, dir, dirname(path))
    }
    for (const path of writes) {
      const wanted = next.get(path)
      if (wanted === undefined) continue
      const filepath = join(dir, path)
      const content = await readObjectOfType({ fs, gitdir, oid: wanted.oid, type: 'blob' })
      const stat = await fs.lstat(filepath)
      if (stat !== null && stat.isDirectory()) {
        await removeEmptyTree(fs, filepath)
      } else {
        await fs.rm(filepath)
      }
      await fs.write(filepath, content)
      await fs.chmod(filepath, wanted.mode === '100755' ? 0o755 : 0o644)
    }
    debug('checkout', `removed ${removals.length} and wrote ${writes.length} paths`)
  }

  if (target.detached) {
    await writeRef({ fs, gitdir, ref: 'HEAD', value: target.oid })
    return { detached: true, oid: target.oid }
  }
  await writeSymbolicRef({ fs, gitdir, ref: 'HEAD', target: target.ref })
  return { detached: false, branch: target.branch, oid: target.oid }
}

const depth = (path: string): number => path.split('/').length

/**
 * Files on disk that stand where `path` is to be written and would be lost:
 * a non-directory at one of its parent paths, or anything inside a directory
 * at `path` itself. Paths in `removed` are going away anyway.
 */
async function blockingPaths({
  fs,
  dir,
  path,
  removed,
}: {
  fs: FileSystem
  dir: string
  path: string
  removed: Set<string>
}): Promise<string[]> {
  const parts = path.split('/')
  for (let i = 1; i < parts.length; i++) {
    const parent = parts.slice(0, i).join('/')
    const stat = await fs.lstat(join(dir, parent))
    if (stat === null) return []
    if (!stat.isDirectory()) return removed.has(parent) ? [] : [parent]
  }
  const stat = await fs.lstat(join(dir, path))
  if (stat === null || !stat.isDirectory()) return []
  return (await filesUnder(fs, dir, path)).filter(file => !removed.has(file))
}

const filesUnder = async (fs: FileSystem, dir: string, relative: string): Promise<string[]> => {
  const files: string[] = []
  for (const name of await fs.readdir(join(dir, relative))) {
    const child = `${relative}/${name}`
    const stat = await fs.lstat(join(dir, child))
    if (stat === null) continue
    if (stat.isDirectory()) {
      files.push(...(await filesUnder(fs, dir, child)))
    } else {
      files.push(child)
    }
  }
  return files
}

const removeEmptyTree = async (fs: FileSystem, filepath: string): Promise<void> => {
  for (const name of await fs.readdir(filepath)) {
    const child = join(filepath, name)
    const stat = await fs.lstat(child)
    if (stat !== null && stat.isDirectory()) await removeEmptyTree(fs, child)
  }
  await fs.rmdirIfEmpty(filepath)
}

const pruneEmptyDirs = async (fs: FileSystem, dir: string, relative: string): Promise<void> => {
  let current = relative
  while (current !== '.' && current !== '') {
    if (!(await fs.rmdirIfEmpty(join(dir, current)))) return
    current = dirname(current)
  }
}
