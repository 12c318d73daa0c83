import { InternalError } from '../errors/InternalError.ts'
import { compareTreeEntryPath } from '../utils/compareTreeEntryPath.ts'

export type FileMode = '100644' | '100755'
export type TreeMode = FileMode | '040000'

export type TreeEntry = {
  mode: TreeMode
  path: string // name within this directory, never containing "/"
  oid: string
  type: 'blob' | 'tree'
}

export type TreeObject = TreeEntry[]

export type ReadTreeResult = {
  oid: string
  tree: TreeObject
}

// SHA-256 digests are 32 bytes raw, 64 hex chars
const OID_BYTES = 32

const parseMode = (mode: string): TreeMode => {
  // prettier-ignore
  switch (mode) {
    case '40000':
    case '040000': return '040000'
    case '100644': return '100644'
    case '100755': return '100755'
  }
  throw new InternalError(`Unexpected tree entry mode: ${mode}`)
}

export const modeToType = (mode: TreeMode): 'blob' | 'tree' => {
  return mode === '040000' ? 'tree' : 'blob'
}

const assertEntryName = (path: string): void => {
  if (path === '' || path === '.' || path === '..' || path.includes('/') || path.includes('\\')) {
    throw new InternalError(`Unsafe tree entry name: "${path}"`)
  }
}

function parseBuffer(buffer: Buffer): TreeEntry[] {
  const entries: TreeEntry[] = []
  let cursor = 0
  while (cursor < buffer.length) {
    const space = buffer.indexOf(32, cursor)
    const nullchar = buffer.indexOf(0, cursor)
    if (space === -1 || nullchar === -1 || nullchar < space) {
      throw new InternalError(`Malformed tree entry at byte ${cursor}.`)
    }
    const mode = parseMode(buffer.subarray(cursor, space).toString('utf8'))
    const path = buffer.subarray(space + 1, nullchar).toString('utf8')
    assertEntryName(path)
    if (nullchar + 1 + OID_BYTES > buffer.length) {
      throw new InternalError(`Truncated tree entry "${path}".`)
    }
    const oid = buffer.subarray(nullchar + 1, nullchar + 1 + OID_BYTES).toString('hex')
    cursor = nullchar + 1 + OID_BYTES
    entries.push({ mode, path, oid, type: modeToType(mode) })
  }
  return entries
}

export class GitTree {
  private readonly _entries: TreeEntry[]

  constructor(entries: Buffer | TreeEntry[]) {
    if (Buffer.isBuffer(entries)) {
      this._entries = parseBuffer(entries)
    } else {
      this._entries = entries.map(entry => {
        assertEntryName(entry.path)
        if (!/^[0-9a-f]{64}$/.test(entry.oid)) {
          throw new InternalError(`Invalid object id for "${entry.path}": ${entry.oid}`)
        }
        return { mode: entry.mode, path: entry.path, oid: entry.oid, type: modeToType(entry.mode) }
      })
    }
    this._entries.sort(compareTreeEntryPath)
    for (let i = 1; i < this._entries.length; i++) {
      if (this._entries[i - 1].path === this._entries[i].path) {
        throw new InternalError(`Duplicate tree entry "${this._entries[i].path}".`)
      }
    }
  }

  static from(tree: Buffer | TreeEntry[]): GitTree {
    return new GitTree(tree)
  }

  toObject(): Buffer {
    return Buffer.concat(
      this._entries.map(entry =>
        Buffer.concat([
          Buffer.from(`${entry.mode.replace(/^0/, '')} ${entry.path}\x00`, 'utf8'),
          Buffer.from(entry.oid, 'hex'),
        ])
      )
    )
  }

  entries(): TreeEntry[] {
    return [...this._entries]
  }

  *[Symbol.iterator](): Generator<TreeEntry, void, unknown> {
    yield* this._entries
  }
}
