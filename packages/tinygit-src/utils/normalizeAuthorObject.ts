import { MissingNameError } from '../errors/MissingNameError.ts'
import type { GitConfig } from '../models/GitConfig.ts'
import type { Author } from '../models/GitCommit.ts'

export const DEFAULT_AUTHOR_NAME = 'User'
export const DEFAULT_AUTHOR_EMAIL = 'user@example.com'

/**
 * Fill in an author from, in order: the fields given, `user.name` /
 * `user.email` from `config`, the default identity, and the current time and
 * host timezone. An empty name or email, given or configured, is refused.
 */
export function normalizeAuthorObject({
  config,
  author = {},
  role = 'author',
}: {
  config?: GitConfig
  author?: Partial<Author>
  role?: 'author' | 'committer'
}): Author {
  const name = author.name ?? config?.get('user.name') ?? DEFAULT_AUTHOR_NAME
  if (name.trim() === '') throw new MissingNameError(role, 'name')
  const email = author.email ?? config?.get('user.email') ?? DEFAULT_AUTHOR_EMAIL
  if (email.trim() === '') throw new MissingNameError(role, 'email')
  const timestamp = author.timestamp ?? Math.floor(Date.now() / 1000)
  const timezoneOffset =
    author.timezoneOffset ?? new Date(timestamp * 1000).getTimezoneOffset()
  return { name, email, timestamp, timezoneOffset }
}
