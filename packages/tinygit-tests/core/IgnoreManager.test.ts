import { test } from 'node:test'
import assert from 'node:assert'
import { IgnoreManager } from '@tinygit/tinygit-src/core-utils/IgnoreManager.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

test('IgnoreManager', async (t) => {
  await t.test('ok:root-rules', async () => {
    const { fs, dir } = await makeFixture('test-project')
    const ignore = new IgnoreManager({ fs, dir })
    assert.strictEqual(await ignore.isIgnored('debug.log'), true)
    assert.strictEqual(await ignore.isIgnored('src/trace.log'), true)
    assert.strictEqual(await ignore.isIgnored('build', true), true)
    assert.strictEqual(await ignore.isIgnored('build/out.txt'), true)
    assert.strictEqual(await ignore.isIgnored('a.txt'), false)
  })

  await t.test('ok:nested-rules-apply-below-their-directory', async () => {
    const { fs, dir } = await makeFixture('test-project')
    const ignore = new IgnoreManager({ fs, dir })
    assert.strictEqual(await ignore.isIgnored('docs/notes.md'), true)
    assert.strictEqual(await ignore.isIgnored('README.md'), false)
  })

  await t.test('ok:directory-only-pattern', async () => {
    const { fs, dir } = await makeFixture('test-project')
    const ignore = new IgnoreManager({ fs, dir })
    // "build/" names a directory, not a file called build
    assert.strictEqual(await ignore.isIgnored('build', false), false)
  })

  await t.test('ok:metadata-dir-always-ignored', async () => {
    const { fs, dir } = await makeFixture('test-empty')
    const ignore = new IgnoreManager({ fs, dir })
    assert.strictEqual(await ignore.isIgnored('.tinygit', true), true)
    assert.strictEqual(await ignore.isIgnored('.tinygit/HEAD'), true)
    assert.strictEqual(await ignore.isIgnored('anything.txt'), false)
  })
})
