import { InternalError } from '../../errors/InternalError.ts'
import { shasumRaw } from '../../core-utils/ShaHasher.ts'
import { BufferCursor } from '../../utils/BufferCursor.ts'
import { comparePath } from '../../utils/comparePath.ts'
import { dropClashingPaths } from '../../utils/dropClashingPaths.ts'
import type { FileMode } from '../../models/GitTree.ts'

export type IndexEntry = {
  path: string
  oid: string
  mode: FileMode
}

const MAGIC = 'TIDX'
const VERSION = 1
const OID_BYTES = 32
const HEADER_BYTES = 12
const TRAILER_BYTES = 32

const parseMode = (mode: number): FileMode => {
  if (mode === 0o100644) return '100644'
  if (mode === 0o100755) return '100755'
  throw new InternalError(`Invalid index entry mode ${mode.toString(8)}`)
}

/**
 * The staging area: a map from repository path to the blob the next commit
 * should record for it.
 *
 * On disk: `TIDX`, u32 version, u32 entry count, then per entry u32 mode,
 * 32 digest bytes, u16 path length and the UTF-8 path. A SHA-256 of all
 * preceding bytes closes the file.
 */
export class GitIndex {
  private readonly _entries: Map<string, IndexEntry>

  constructor(entries: Map<string, IndexEntry> = new Map()) {
    this._entries = entries
  }

  static from(buffer: Buffer | null): GitIndex {
    if (buffer === null || buffer.length === 0) return new GitIndex()
    if (buffer.length < HEADER_BYTES + TRAILER_BYTES) {
      throw new InternalError('Index file is truncated.')
    }
    const body = buffer.subarray(0, buffer.length - TRAILER_BYTES)
    const expected = buffer.subarray(buffer.length - TRAILER_BYTES)
    if (!shasumRaw(body).equals(expected)) {
      throw new InternalError('Invalid checksum in index file.')
    }
    const reader = new BufferCursor(body)
    const magic = reader.toString('utf8', 4)
    if (magic !== MAGIC) {
      throw new InternalError(`Invalid index file magic "${magic}".`)
    }
    const version = reader.readUInt32BE()
    if (version !== VERSION) {
      throw new InternalError(`Unsupported index file version ${version}.`)
    }
    const count = reader.readUInt32BE()
    const entries = new Map<string, IndexEntry>()
    for (let i = 0; i < count; i++) {
      if (reader.remaining() < 4 + OID_BYTES + 2) {
        throw new InternalError('Index entry is truncated.')
      }
      const mode = parseMode(reader.readUInt32BE())
      const oid = reader.slice(OID_BYTES).toString('hex')
      const pathLength = reader.readUInt16BE()
      if (reader.remaining() < pathLength) {
        throw new InternalError('Index entry path is truncated.')
      }
      const path = reader.toString('utf8', pathLength)
      entries.set(path, { path, oid, mode })
    }
    if (!reader.eof()) {
      throw new InternalError('Unexpected trailing data in index file.')
    }
    return new GitIndex(entries)
  }

  get size(): number {
    return this._entries.size
  }

  has(filepath: string): boolean {
    return this._entries.has(filepath)
  }

  get(filepath: string): IndexEntry | undefined {
    return this._entries.get(filepath)
  }

  /**
   * Entries sorted by path.
   */
  entries(): IndexEntry[] {
    return [...this._entries.values()].sort(comparePath)
  }

  *[Symbol.iterator](): Generator<IndexEntry, void, unknown> {
    yield* this.entries()
  }

  /**
   * Entries at a parent path of `filepath` or nested under it are dropped:
   * the path changed between file and directory.
   */
  stage(filepath: string, oid: string, mode: FileMode): void {
    dropClashingPaths(this._entries, filepath)
    this._entries.set(filepath, { path: filepath, oid, mode })
  }

  unstage(filepath: string): boolean {
    return this._entries.delete(filepath)
  }

  clear(): void {
    this._entries.clear()
  }

  toObject(): Buffer {
    const entries = this.entries()
    const paths = entries.map(entry => Buffer.from(entry.path, 'utf8'))
    const length =
      HEADER_BYTES +
      paths.reduce((sum, path) => sum + 4 + OID_BYTES + 2 + path.length, 0)
    const body = Buffer.alloc(length)
    const writer = new BufferCursor(body)
    writer.write(MAGIC, 4, 'utf8')
    writer.writeUInt32BE(VERSION)
    writer.writeUInt32BE(entries.length)
    entries.forEach((entry, i) => {
      const path = paths[i]
      if (path.length > 0xffff) {
        throw new InternalError(`Path too long for index: ${entry.path}`)
      }
      writer.writeUInt32BE(parseInt(entry.mode, 8))
      writer.copy(Buffer.from(entry.oid, 'hex'))
      writer.writeUInt16BE(path.length)
      writer.copy(path)
    })
    return Buffer.concat([body, shasumRaw(body)])
  }
}
