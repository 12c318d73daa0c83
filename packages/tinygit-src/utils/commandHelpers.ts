import { BaseError } from '../errors/BaseError.ts'
import { MissingParameterError } from '../errors/MissingParameterError.ts'
import { NotARepositoryError } from '../errors/NotARepositoryError.ts'
import { FileSystem } from '../models/FileSystem.ts'
import { join } from './join.ts'
import type { FsClient } from '../types/commandOptions.ts'

export type NormalizedCommandArgs = {
  fs: FileSystem
  gitdir: string
}

/**
 * Wrap the client and check that `gitdir` holds a repository.
 */
export async function normalizeCommandArgs({
  fs: _fs,
  gitdir,
}: {
  fs: FsClient | undefined
  gitdir: string | undefined
}): Promise<NormalizedCommandArgs> {
  if (_fs === undefined) throw new MissingParameterError('fs')
  if (gitdir === undefined) throw new MissingParameterError('gitdir')
  const fs = new FileSystem(_fs)
  if (!(await fs.exists(join(gitdir, 'HEAD')))) {
    throw new NotARepositoryError(gitdir)
  }
  return { fs, gitdir }
}

/**
 * Record which public command an error escaped from.
 */
export const tagCaller = (err: unknown, caller: string): void => {
  if (err instanceof BaseError) {
    err.caller = caller
  } else if (err instanceof Error) {
    Object.assign(err, { caller })
  }
}
