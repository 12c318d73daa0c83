import { test } from 'node:test'
import assert from 'node:assert'
import * as path from 'node:path'
import { GitIndex } from '@tinygit/tinygit-src/git/index/GitIndex.ts'
import { hashObject } from '@tinygit/tinygit-src/git/objects/hashObject.ts'
import { scanWorkdir, walkWorkdir } from '@tinygit/tinygit-src/core-utils/WorkdirScanner.ts'
import type { FlatTree } from '@tinygit/tinygit-src/core-utils/TreeBuilder.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

const blob = (text: string): string => hashObject({ type: 'blob', object: Buffer.from(text) }).oid

test('WorkdirScanner', async (t) => {
  await t.test('ok:walk-skips-ignored-and-metadata', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    assert.deepStrictEqual(await walkWorkdir({ fs, dir }), [
      '.tinygitignore',
      'a.txt',
      'docs/.tinygitignore',
      'src/lib/util.txt',
      'src/main.txt',
    ])
  })

  await t.test('ok:walk-from-subdirectory', async () => {
    const { fs, dir } = await makeFixture('test-project')
    assert.deepStrictEqual(await walkWorkdir({ fs, dir, from: 'src' }), [
      'src/lib/util.txt',
      'src/main.txt',
    ])
  })

  await t.test('ok:three-disjoint-sets', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    const headTree: FlatTree = new Map([
      ['a.txt', { oid: blob('hello\n'), mode: '100644' }],
      ['src/main.txt', { oid: blob('old\n'), mode: '100644' }],
      ['gone.txt', { oid: blob('gone\n'), mode: '100644' }],
    ])
    const index = new GitIndex()
    index.stage('src/lib/util.txt', blob('export const answer = 42\n'), '100644')
    // staged with the committed content: not a change
    index.stage('a.txt', blob('hello\n'), '100644')

    const result = await scanWorkdir({ fs, dir, index, headTree })
    assert.deepStrictEqual(result, {
      staged: ['src/lib/util.txt'],
      modified: ['gone.txt', 'src/main.txt'],
      untracked: ['.tinygitignore', 'docs/.tinygitignore'],
    })
  })

  await t.test('ok:mode-change-is-a-modification', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    await fs.chmod(path.join(dir, 'a.txt'), 0o755)
    const headTree: FlatTree = new Map([['a.txt', { oid: blob('hello\n'), mode: '100644' }]])
    const result = await scanWorkdir({ fs, dir, index: new GitIndex(), headTree })
    assert.deepStrictEqual(result.modified, ['a.txt'])
  })
})
