import { test } from 'node:test'
import assert from 'node:assert'
import { Errors } from '@tinygit/tinygit-src/index.ts'
import { GitTree, type TreeEntry } from '@tinygit/tinygit-src/models/GitTree.ts'
import { hashObject } from '@tinygit/tinygit-src/git/objects/hashObject.ts'

const HELLO = '2cf8d83d9ee29543b34a87727421fdecb7e3f3a183d337639025de576db9ebb4'
const EMPTY = '473a0f4c3be8a93681a267e3b1e9a7dcda1185436fe141f7749120a303721813'

test('GitTree', async (t) => {
  await t.test('ok:directories-sort-with-trailing-slash', () => {
    const tree = GitTree.from([
      { mode: '100644', path: 'a.txt', oid: HELLO, type: 'blob' },
      { mode: '040000', path: 'a', oid: EMPTY, type: 'tree' },
      { mode: '100644', path: 'a-b', oid: EMPTY, type: 'blob' },
    ])
    assert.deepStrictEqual(
      tree.entries().map(entry => entry.path),
      ['a-b', 'a.txt', 'a']
    )
  })

  await t.test('ok:encode-decode', () => {
    const entries: TreeEntry[] = [
      { mode: '040000', path: 'src', oid: EMPTY, type: 'tree' },
      { mode: '100755', path: 'run.sh', oid: HELLO, type: 'blob' },
    ]
    const buffer = GitTree.from(entries).toObject()
    // subtree modes are written without the leading zero
    assert.strictEqual(buffer.subarray(0, 13).toString('utf8'), '100755 run.sh')
    assert.deepStrictEqual(GitTree.from(buffer).entries(), [
      { mode: '100755', path: 'run.sh', oid: HELLO, type: 'blob' },
      { mode: '040000', path: 'src', oid: EMPTY, type: 'tree' },
    ])
  })

  await t.test('ok:digest-is-deterministic', () => {
    const tree = GitTree.from([{ mode: '100644', path: 'a.txt', oid: HELLO, type: 'blob' }])
    assert.strictEqual(
      hashObject({ type: 'tree', object: tree.toObject() }).oid,
      '371aac45c3ba401d13c2ce98c9537b4e53c6049b950bf8a33cbc400712d9f4fa'
    )
  })

  await t.test('ok:type-follows-mode', () => {
    const [entry] = GitTree.from([
      { mode: '040000', path: 'lib', oid: EMPTY, type: 'blob' },
    ]).entries()
    assert.strictEqual(entry.type, 'tree')
  })

  await t.test('error:unsafe-names', () => {
    for (const path of ['', '.', '..', 'a/b']) {
      assert.throws(
        () => GitTree.from([{ mode: '100644', path, oid: HELLO, type: 'blob' }]),
        Errors.InternalError
      )
    }
  })

  await t.test('error:duplicate-entry', () => {
    assert.throws(
      () =>
        GitTree.from([
          { mode: '100644', path: 'a.txt', oid: HELLO, type: 'blob' },
          { mode: '100755', path: 'a.txt', oid: EMPTY, type: 'blob' },
        ]),
      Errors.InternalError
    )
  })

  await t.test('error:invalid-oid', () => {
    assert.throws(
      () => GitTree.from([{ mode: '100644', path: 'a.txt', oid: 'abc', type: 'blob' }]),
      Errors.InternalError
    )
  })

  await t.test('error:truncated-entry', () => {
    const buffer = Buffer.concat([Buffer.from('100644 a.txt\x00'), Buffer.alloc(10)])
    assert.throws(() => GitTree.from(buffer), Errors.InternalError)
  })
})
