import { test } from 'node:test'
import assert from 'node:assert'
import {
  Errors,
  add,
  branch,
  commit,
  deleteTag,
  listTags,
  resolveRef,
  tag,
} from '@tinygit/tinygit-src/index.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

const author = {
  name: 'Mr. Test',
  email: 'mrtest@example.com',
  timestamp: 1262356920,
  timezoneOffset: 0,
}

const makeCommitted = async () => {
  const fixture = await makeFixture('test-project', { init: true })
  const { fs, dir } = fixture
  await add({ fs, dir, filepath: 'a.txt' })
  const oid = await commit({ fs, dir, message: 'first', author })
  return { ...fixture, oid }
}

test('tag', async (t) => {
  await t.test('ok:at-head', async () => {
    const { fs, dir, oid } = await makeCommitted()
    assert.strictEqual(await tag({ fs, dir, ref: 'v1' }), oid)
    assert.deepStrictEqual(await listTags({ fs, dir }), ['v1'])
    assert.strictEqual(await resolveRef({ fs, dir, ref: 'v1' }), oid)
  })

  await t.test('ok:at-named-commit', async () => {
    const { fs, dir, oid } = await makeCommitted()
    await add({ fs, dir, filepath: 'src' })
    await commit({ fs, dir, message: 'second', author })
    assert.strictEqual(await tag({ fs, dir, ref: 'release/1.0', object: oid }), oid)
    assert.deepStrictEqual(await listTags({ fs, dir }), ['release/1.0'])
  })

  await t.test('ok:branch-wins-over-tag', async () => {
    const { fs, dir, oid } = await makeCommitted()
    await branch({ fs, dir, ref: 'dup' })
    await add({ fs, dir, filepath: 'src' })
    const second = await commit({ fs, dir, message: 'second', author })
    await tag({ fs, dir, ref: 'dup' })
    assert.strictEqual(await resolveRef({ fs, dir, ref: 'dup' }), oid)
    assert.strictEqual(await resolveRef({ fs, dir, ref: 'refs/tags/dup' }), second)
  })

  await t.test('error:AlreadyExistsError', async () => {
    const { fs, dir } = await makeCommitted()
    await tag({ fs, dir, ref: 'v1' })
    await assert.rejects(tag({ fs, dir, ref: 'v1' }), (err: unknown) => {
      assert.ok(err instanceof Errors.AlreadyExistsError)
      assert.deepStrictEqual(err.data, { noun: 'tag', where: 'refs/tags/v1' })
      return true
    })
  })

  await t.test('error:AlreadyExistsError-prefix-names', async () => {
    const { fs, dir } = await makeCommitted()
    await tag({ fs, dir, ref: 'v1' })
    await tag({ fs, dir, ref: 'rc/1' })
    await assert.rejects(tag({ fs, dir, ref: 'v1/fix' }), (err: unknown) => {
      assert.ok(err instanceof Errors.AlreadyExistsError)
      assert.deepStrictEqual(err.data, { noun: 'tag', where: 'refs/tags/v1' })
      return true
    })
    await assert.rejects(tag({ fs, dir, ref: 'rc' }), (err: unknown) => {
      assert.ok(err instanceof Errors.AlreadyExistsError)
      assert.deepStrictEqual(err.data, { noun: 'tag', where: 'refs/tags/rc/1' })
      return true
    })
    assert.deepStrictEqual(await listTags({ fs, dir }), ['rc/1', 'v1'])
  })

  await t.test('error:unborn-head', async () => {
    const { fs, dir } = await makeFixture('test-empty', { init: true })
    await assert.rejects(tag({ fs, dir, ref: 'v1' }), Errors.UnknownRefError)
  })

  await t.test('error:InvalidRefNameError', async () => {
    const { fs, dir } = await makeCommitted()
    await assert.rejects(tag({ fs, dir, ref: 'v1^' }), Errors.InvalidRefNameError)
  })
})

test('deleteTag', async (t) => {
  await t.test('ok:delete', async () => {
    const { fs, dir, oid } = await makeCommitted()
    await tag({ fs, dir, ref: 'v1' })
    await tag({ fs, dir, ref: 'v2' })
    await deleteTag({ fs, dir, ref: 'v1' })
    assert.deepStrictEqual(await listTags({ fs, dir }), ['v2'])
    assert.strictEqual(await resolveRef({ fs, dir, ref: oid }), oid)
  })

  await t.test('error:UnknownRefError', async () => {
    const { fs, dir } = await makeCommitted()
    await assert.rejects(deleteTag({ fs, dir, ref: 'v1' }), (err: unknown) => {
      assert.ok(err instanceof Errors.UnknownRefError)
      assert.strictEqual(err.caller, 'tinygit.deleteTag')
      return true
    })
  })
})
