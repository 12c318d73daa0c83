import { test } from 'node:test'
import assert from 'node:assert'
import * as path from 'node:path'
import { Errors, currentBranch, findRoot, init, listBranches } from '@tinygit/tinygit-src/index.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

test('init', async (t) => {
  await t.test('ok:creates-layout', async () => {
    const { _fs, fs, dir, gitdir } = await makeFixture('test-empty')
    const result = await init({ fs, dir })
    assert.deepStrictEqual(result, { gitdir, created: true })
    assert.strictEqual(_fs.readFileSync(path.join(gitdir, 'HEAD'), 'utf8'), 'ref: refs/heads/main\n')
    assert.strictEqual(_fs.readFileSync(path.join(gitdir, 'refs/heads/main'), 'utf8'), '\n')
    assert.ok(_fs.statSync(path.join(gitdir, 'objects')).isDirectory())
    assert.ok(_fs.statSync(path.join(gitdir, 'refs/tags')).isDirectory())
    assert.strictEqual(
      _fs.readFileSync(path.join(gitdir, 'config'), 'utf8'),
      '[core]\n\trepositoryformatversion = 0\n'
    )
  })

  await t.test('ok:unborn-branch', async () => {
    const { fs, dir } = await makeFixture('test-empty', { init: true })
    assert.strictEqual(await currentBranch({ fs, dir }), 'main')
    assert.deepStrictEqual(await listBranches({ fs, dir }), [
      { name: 'main', current: true, oid: null },
    ])
  })

  await t.test('ok:default-branch', async () => {
    const { fs, dir } = await makeFixture('test-empty')
    await init({ fs, dir, defaultBranch: 'trunk' })
    assert.strictEqual(await currentBranch({ fs, dir }), 'trunk')
  })

  await t.test('ok:idempotent', async () => {
    const { _fs, fs, dir, gitdir } = await makeFixture('test-empty', { init: true })
    _fs.writeFileSync(path.join(gitdir, 'HEAD'), 'ref: refs/heads/other\n')
    const result = await init({ fs, dir })
    assert.deepStrictEqual(result, { gitdir, created: false })
    assert.strictEqual(_fs.readFileSync(path.join(gitdir, 'HEAD'), 'utf8'), 'ref: refs/heads/other\n')
  })

  await t.test('error:missing-dir', async () => {
    const { fs } = await makeFixture('test-empty')
    await assert.rejects(init({ fs }), (err: unknown) => {
      assert.ok(err instanceof Errors.MissingParameterError)
      assert.strictEqual(err.data.parameter, 'gitdir')
      assert.strictEqual(err.caller, 'tinygit.init')
      return true
    })
  })
})

test('findRoot', async (t) => {
  await t.test('ok:from-root', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    assert.strictEqual(await findRoot({ fs, filepath: dir }), dir)
  })

  await t.test('ok:from-nested-directory', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    assert.strictEqual(await findRoot({ fs, filepath: path.join(dir, 'src', 'lib') }), dir)
  })

  await t.test('ok:relative-start-finds-current-directory', async () => {
    const { fs, dir } = await makeFixture('test-project', { init: true })
    const cwd = process.cwd()
    process.chdir(dir)
    try {
      assert.strictEqual(await findRoot({ fs, filepath: 'src' }), '.')
      assert.strictEqual(await findRoot({ fs, filepath: 'src/lib' }), '.')
    } finally {
      process.chdir(cwd)
    }
  })

  await t.test('error:NotARepositoryError', async () => {
    const { fs, dir } = await makeFixture('test-project')
    await assert.rejects(findRoot({ fs, filepath: path.join(dir, 'src') }), (err: unknown) => {
      assert.ok(err instanceof Errors.NotARepositoryError)
      return true
    })
  })
})
