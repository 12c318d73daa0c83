import AsyncLock from 'async-lock'

import { debug } from '../utils/debug.ts'
import { normalizePath } from '../utils/join.ts'

let lock: AsyncLock | null = null

/**
 * Run `fn` while holding the lock for `gitdir`. Commands for one repository
 * run one at a time; different repositories do not block each other.
 *
 * The lock is not re-entrant, so only public commands take it.
 */
export async function withRepoLock<T>(gitdir: string, fn: () => Promise<T>): Promise<T> {
  if (lock === null) lock = new AsyncLock({ maxPending: Infinity })
  const key = normalizePath(gitdir)
  if (lock.isBusy(key)) debug('lock', 'waiting for', key)
  return lock.acquire(key, fn)
}
