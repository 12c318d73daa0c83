import { InternalError } from '../errors/InternalError.ts'
import { formatAuthor } from '../utils/formatAuthor.ts'
import { parseAuthor } from '../utils/parseAuthor.ts'

export type Author = {
  name: string
  email: string
  timestamp: number // UTC Unix timestamp in seconds
  timezoneOffset: number // minutes, as returned by Date#getTimezoneOffset
}

/**
 * A commit has at most one parent; history is linear.
 */
export type CommitObject = {
  message: string
  tree: string
  parent: string | null
  author: Author
  committer: Author
}

export type ReadCommitResult = {
  oid: string
  commit: CommitObject
}

const normalizeNewlines = (text: string): string => {
  const normalized = text.replace(/\r\n?/g, '\n')
  return normalized.endsWith('\n') ? normalized : normalized + '\n'
}

export class GitCommit {
  private readonly _commit: string

  constructor(commit: string | Buffer | CommitObject) {
    if (typeof commit === 'string') {
      this._commit = commit
    } else if (Buffer.isBuffer(commit)) {
      this._commit = commit.toString('utf8')
    } else {
      this._commit = GitCommit.render(commit)
    }
  }

  static from(commit: string | Buffer | CommitObject): GitCommit {
    return new GitCommit(commit)
  }

  static render(obj: CommitObject): string {
    let headers = `tree ${obj.tree}\n`
    if (obj.parent) headers += `parent ${obj.parent}\n`
    headers += `author ${formatAuthor(obj.author)}\n`
    headers += `committer ${formatAuthor(obj.committer)}\n`
    return headers + '\n' + normalizeNewlines(obj.message)
  }

  toObject(): Buffer {
    return Buffer.from(this._commit, 'utf8')
  }

  message(): string {
    const split = this._commit.indexOf('\n\n')
    if (split === -1) throw new InternalError('Commit has no message separator.')
    return this._commit.slice(split + 2)
  }

  parse(): CommitObject {
    const split = this._commit.indexOf('\n\n')
    if (split === -1) throw new InternalError('Commit has no message separator.')
    let tree: string | undefined
    let parent: string | null = null
    let author: Author | undefined
    let committer: Author | undefined
    for (const line of this._commit.slice(0, split).split('\n')) {
      const space = line.indexOf(' ')
      const key = space === -1 ? line : line.slice(0, space)
      const value = space === -1 ? '' : line.slice(space + 1)
      switch (key) {
        case 'tree':
          tree = value
          break
        case 'parent':
          if (parent !== null) throw new InternalError('Commit has more than one parent.')
          parent = value
          break
        case 'author':
          author = parseAuthor(value)
          break
        case 'committer':
          committer = parseAuthor(value)
          break
        default:
          throw new InternalError(`Unexpected commit header "${key}".`)
      }
    }
    if (tree === undefined || author === undefined || committer === undefined) {
      throw new InternalError('Commit is missing a tree, author or committer header.')
    }
    return { tree, parent, author, committer, message: this.message() }
  }
}
