import { test } from 'node:test'
import assert from 'node:assert'
import { Errors } from '@tinygit/tinygit-src/index.ts'
import { GitCommit, type CommitObject } from '@tinygit/tinygit-src/models/GitCommit.ts'
import { formatAuthor } from '@tinygit/tinygit-src/utils/formatAuthor.ts'
import { parseAuthor } from '@tinygit/tinygit-src/utils/parseAuthor.ts'

const TREE = '371aac45c3ba401d13c2ce98c9537b4e53c6049b950bf8a33cbc400712d9f4fa'
const PARENT = '2cf8d83d9ee29543b34a87727421fdecb7e3f3a183d337639025de576db9ebb4'

const author = {
  name: 'Test User',
  email: 'test@example.com',
  timestamp: 1262356920,
  timezoneOffset: 60,
}

const commit: CommitObject = {
  tree: TREE,
  parent: null,
  author,
  committer: author,
  message: 'first',
}

test('GitCommit', async (t) => {
  await t.test('ok:render', () => {
    assert.strictEqual(
      GitCommit.render(commit),
      `tree ${TREE}\n` +
        'author Test User <test@example.com> 1262356920 -0100\n' +
        'committer Test User <test@example.com> 1262356920 -0100\n' +
        '\n' +
        'first\n'
    )
  })

  await t.test('ok:render-with-parent', () => {
    const text = GitCommit.render({ ...commit, parent: PARENT })
    assert.strictEqual(text.split('\n')[1], `parent ${PARENT}`)
  })

  await t.test('ok:parse', () => {
    const parsed = GitCommit.from(GitCommit.from({ ...commit, parent: PARENT }).toObject()).parse()
    assert.deepStrictEqual(parsed, { ...commit, parent: PARENT, message: 'first\n' })
  })

  await t.test('ok:message-newlines-normalized', () => {
    const parsed = GitCommit.from({ ...commit, message: 'subject\r\n\r\nbody' }).parse()
    assert.strictEqual(parsed.message, 'subject\n\nbody\n')
  })

  await t.test('error:two-parents', () => {
    const text =
      `tree ${TREE}\nparent ${PARENT}\nparent ${PARENT}\n` +
      'author Test User <test@example.com> 1262356920 -0100\n' +
      'committer Test User <test@example.com> 1262356920 -0100\n\nmerge\n'
    assert.throws(() => GitCommit.from(text).parse(), Errors.InternalError)
  })

  await t.test('error:unknown-header', () => {
    const text =
      `tree ${TREE}\n` +
      'author Test User <test@example.com> 1262356920 -0100\n' +
      'committer Test User <test@example.com> 1262356920 -0100\n' +
      'gpgsig xyz\n\nsigned\n'
    assert.throws(() => GitCommit.from(text).parse(), Errors.InternalError)
  })

  await t.test('error:missing-tree', () => {
    const text =
      'author Test User <test@example.com> 1262356920 -0100\n' +
      'committer Test User <test@example.com> 1262356920 -0100\n\nno tree\n'
    assert.throws(() => GitCommit.from(text).parse(), Errors.InternalError)
  })
})

test('formatAuthor / parseAuthor', async (t) => {
  await t.test('ok:east-of-utc', () => {
    const line = formatAuthor({ ...author, timezoneOffset: -120 })
    assert.strictEqual(line, 'Test User <test@example.com> 1262356920 +0200')
    assert.strictEqual(parseAuthor(line).timezoneOffset, -120)
  })

  await t.test('ok:west-of-utc-with-minutes', () => {
    const line = formatAuthor({ ...author, timezoneOffset: 330 })
    assert.strictEqual(line, 'Test User <test@example.com> 1262356920 -0530')
    assert.strictEqual(parseAuthor(line).timezoneOffset, 330)
  })

  await t.test('ok:utc', () => {
    assert.strictEqual(
      formatAuthor({ ...author, timezoneOffset: 0 }),
      'Test User <test@example.com> 1262356920 +0000'
    )
    assert.strictEqual(parseAuthor('A <a@example.com> 0 +0000').timezoneOffset, 0)
  })

  await t.test('ok:negative-zero-survives', () => {
    const line = formatAuthor({ ...author, timezoneOffset: -0 })
    assert.strictEqual(line, 'Test User <test@example.com> 1262356920 -0000')
    assert.ok(Object.is(parseAuthor(line).timezoneOffset, -0))
  })

  await t.test('error:malformed', () => {
    assert.throws(() => parseAuthor('nobody'), Errors.InternalError)
  })
})
