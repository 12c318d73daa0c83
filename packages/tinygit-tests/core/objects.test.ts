import { test } from 'node:test'
import assert from 'node:assert'
import * as path from 'node:path'
import { Errors, hashBlob, readBlob, writeBlob } from '@tinygit/tinygit-src/index.ts'
import { hasObject } from '@tinygit/tinygit-src/git/objects/hasObject.ts'
import { loosePath } from '@tinygit/tinygit-src/git/objects/loose.ts'
import { readObject, readObjectOfType } from '@tinygit/tinygit-src/git/objects/readObject.ts'
import { writeObject } from '@tinygit/tinygit-src/git/objects/writeObject.ts'
import { hashObject } from '@tinygit/tinygit-src/git/objects/hashObject.ts'
import { deflate, inflate } from '@tinygit/tinygit-src/core-utils/Zlib.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

const HELLO = '2cf8d83d9ee29543b34a87727421fdecb7e3f3a183d337639025de576db9ebb4'
const EMPTY = '473a0f4c3be8a93681a267e3b1e9a7dcda1185436fe141f7749120a303721813'

test('object store', async (t) => {
  await t.test('ok:write-then-read', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const oid = await writeObject({ fs, gitdir, type: 'blob', object: Buffer.from('hello\n') })
    assert.strictEqual(oid, HELLO)
    assert.strictEqual(
      loosePath(gitdir, oid),
      path.join(gitdir, 'objects', '2c', oid.slice(2))
    )
    const { type, object } = await readObject({ fs, gitdir, oid })
    assert.strictEqual(type, 'blob')
    assert.strictEqual(object.toString('utf8'), 'hello\n')
  })

  await t.test('ok:stored-form-is-deflated-envelope', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    await writeObject({ fs, gitdir, type: 'blob', object: Buffer.from('hello\n') })
    const stored = await fs.read(loosePath(gitdir, HELLO))
    assert.ok(stored)
    assert.strictEqual(inflate(stored).toString('utf8'), 'blob 6\x00hello\n')
  })

  await t.test('ok:idempotent', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const first = await writeObject({ fs, gitdir, type: 'blob', object: Buffer.alloc(0) })
    const second = await writeObject({ fs, gitdir, type: 'blob', object: Buffer.alloc(0) })
    assert.strictEqual(first, EMPTY)
    assert.strictEqual(second, EMPTY)
    assert.deepStrictEqual(await fs.readdir(path.join(gitdir, 'objects', '47')), [EMPTY.slice(2)])
  })

  await t.test('ok:dry-run-writes-nothing', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const oid = await writeObject({ fs, gitdir, type: 'blob', object: Buffer.from('hello\n'), dryRun: true })
    assert.strictEqual(oid, HELLO)
    assert.strictEqual(await hasObject({ fs, gitdir, oid }), false)
  })

  await t.test('ok:public-blob-commands', async () => {
    const { fs, dir } = await makeFixture('test-empty', { init: true })
    const blob = Buffer.from('hello\n')
    const oid = await writeBlob({ fs, dir, blob })
    assert.strictEqual(oid, HELLO)
    assert.strictEqual(hashBlob({ object: 'hello\n' }).oid, HELLO)
    const result = await readBlob({ fs, dir, oid })
    assert.strictEqual(Buffer.from(result.blob).toString('utf8'), 'hello\n')
  })

  await t.test('error:missing-object', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    await assert.rejects(readObject({ fs, gitdir, oid: HELLO }), Errors.ObjectNotFoundError)
  })

  await t.test('error:content-does-not-match-digest', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    const { wrapped } = hashObject({ type: 'blob', object: Buffer.from('tampered\n') })
    await fs.write(loosePath(gitdir, HELLO), deflate(wrapped))
    await assert.rejects(readObject({ fs, gitdir, oid: HELLO }), Errors.InternalError)
  })

  await t.test('error:not-deflated', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    await fs.write(loosePath(gitdir, HELLO), 'plain text')
    await assert.rejects(readObject({ fs, gitdir, oid: HELLO }), Errors.InternalError)
  })

  await t.test('error:wrong-type', async () => {
    const { fs, gitdir } = await makeFixture('test-empty', { init: true })
    await writeObject({ fs, gitdir, type: 'blob', object: Buffer.from('hello\n') })
    await assert.rejects(
      readObjectOfType({ fs, gitdir, oid: HELLO, type: 'tree' }),
      Errors.InternalError
    )
  })

  await t.test('error:readBlob-tags-caller', async () => {
    const { fs, dir } = await makeFixture('test-empty', { init: true })
    await assert.rejects(readBlob({ fs, dir, oid: HELLO }), (err: unknown) => {
      assert.ok(err instanceof Errors.ObjectNotFoundError)
      assert.strictEqual(err.caller, 'tinygit.readBlob')
      assert.deepStrictEqual(err.data, { oid: HELLO })
      return true
    })
  })
})
