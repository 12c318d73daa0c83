import { GitTree, type FileMode, type TreeEntry } from '../models/GitTree.ts'
import { readObjectOfType } from '../git/objects/readObject.ts'
import { writeObject } from '../git/objects/writeObject.ts'
import type { FileSystem } from '../models/FileSystem.ts'

export type FlatEntry = { oid: string; mode: FileMode }

/**
 * `path → { oid, mode }` for every file reachable from a tree.
 */
export type FlatTree = Map<string, FlatEntry>

export async function flattenTree({
  fs,
  gitdir,
  oid,
}: {
  fs: FileSystem
  gitdir: string
  oid: string
}): Promise<FlatTree> {
  const result: FlatTree = new Map()
  const walk = async (treeOid: string, prefix: string): Promise<void> => {
    const tree = GitTree.from(await readObjectOfType({ fs, gitdir, oid: treeOid, type: 'tree' }))
    for (const entry of tree) {
      const path = prefix === '' ? entry.path : `${prefix}/${entry.path}`
      if (entry.mode === '040000') {
        await walk(entry.oid, path)
      } else {
        result.set(path, { oid: entry.oid, mode: entry.mode })
      }
    }
  }
  await walk(oid, '')
  return result
}

type DirNode = {
  files: Map<string, FlatEntry>
  dirs: Map<string, DirNode>
}

const emptyNode = (): DirNode => ({ files: new Map(), dirs: new Map() })

/**
 * Write one tree object per directory, children before parents, and return
 * the root tree's digest.
 */
export async function writeTreeFromEntries({
  fs,
  gitdir,
  entries,
}: {
  fs: FileSystem
  gitdir: string
  entries: FlatTree
}): Promise<string> {
  const root = emptyNode()
  for (const [path, entry] of entries) {
    const parts = path.split('/')
    const name = parts.pop()
    if (name === undefined) continue
    let node = root
    for (const part of parts) {
      let child = node.dirs.get(part)
      if (child === undefined) {
        child = emptyNode()
        node.dirs.set(part, child)
      }
      node = child
    }
    node.files.set(name, entry)
  }
  const write = async (node: DirNode): Promise<string> => {
    const treeEntries: TreeEntry[] = []
    for (const [name, child] of node.dirs) {
      treeEntries.push({ mode: '040000', path: name, oid: await write(child), type: 'tree' })
    }
    for (const [name, { oid, mode }] of node.files) {
      treeEntries.push({ mode, path: name, oid, type: 'blob' })
    }
    return writeObject({ fs, gitdir, type: 'tree', object: GitTree.from(treeEntries).toObject() })
  }
  return write(root)
}
