import { test } from 'node:test'
import assert from 'node:assert'
import { readTree } from '@tinygit/tinygit-src/index.ts'
import { flattenTree, writeTreeFromEntries, type FlatTree } from '@tinygit/tinygit-src/core-utils/TreeBuilder.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

const HELLO = '2cf8d83d9ee29543b34a87727421fdecb7e3f3a183d337639025de576db9ebb4'
const EMPTY = '473a0f4c3be8a93681a267e3b1e9a7dcda1185436fe141f7749120a303721813'
const SUBTREE = 'ca2b3e20bcce92c74e2e16617d97cb301864e51f013cde26722796a1edae21b2'
const ROOT = '883d52273969aba4c4c74f16ff6bb9eb55db071d6bc79fcaede718f72d4767b3'

test('TreeBuilder', async (t) => {
  await t.test('ok:one-tree-per-directory', async () => {
    const { fs, dir, gitdir } = await makeFixture('test-empty', { init: true })
    const entries: FlatTree = new Map([
      ['b/c.txt', { oid: EMPTY, mode: '100644' }],
      ['a.txt', { oid: HELLO, mode: '100644' }],
    ])
    const oid = await writeTreeFromEntries({ fs, gitdir, entries })
    assert.strictEqual(oid, ROOT)
    const { tree } = await readTree({ fs, dir, oid })
    assert.deepStrictEqual(tree, [
      { mode: '100644', path: 'a.txt', oid: HELLO, type: 'blob' },
      { mode: '040000', path: 'b', oid: SUBTREE, type: 'tree' },
    ])
  })

  await t.test('ok:flatten-inverts-build', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const entries: FlatTree = new Map([
      ['a.txt', { oid: HELLO, mode: '100644' }],
      ['b/c.txt', { oid: EMPTY, mode: '100644' }],
      ['b/d/run.sh', { oid: HELLO, mode: '100755' }],
    ])
    const oid = await writeTreeFromEntries({ fs, gitdir, entries })
    assert.deepStrictEqual(await flattenTree({ fs, gitdir, oid }), entries)
  })

  await t.test('ok:insertion-order-does-not-matter', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const forward = await writeTreeFromEntries({
      fs,
      gitdir,
      entries: new Map([
        ['a.txt', { oid: HELLO, mode: '100644' }],
        ['b/c.txt', { oid: EMPTY, mode: '100644' }],
      ]),
    })
    const backward = await writeTreeFromEntries({
      fs,
      gitdir,
      entries: new Map([
        ['b/c.txt', { oid: EMPTY, mode: '100644' }],
        ['a.txt', { oid: HELLO, mode: '100644' }],
      ]),
    })
    assert.strictEqual(forward, backward)
  })
})
