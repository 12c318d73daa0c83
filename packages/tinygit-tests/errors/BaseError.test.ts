import { test } from 'node:test'
import assert from 'node:assert'
import { BaseError } from '@tinygit/tinygit-src/errors/BaseError.ts'

test('BaseError', async (t) => {
  await t.test('constructor - initializes default properties', () => {
    const error = new BaseError('Test error')
    assert.ok(error instanceof Error)
    assert.strictEqual(error.message, 'Test error')
    assert.strictEqual(error.code, '')
    assert.deepStrictEqual(error.data, {})
    assert.strictEqual(error.caller, '')
    assert.strictEqual(error.cause, undefined)
    assert.strictEqual(error.isTinygitError, true)
  })

  await t.test('constructor - accepts cause error', () => {
    const cause = new Error('Original error')
    const error = new BaseError('Wrapped error', cause)
    assert.strictEqual(error.cause, cause)
  })

  await t.test('toJSON - serializes error without cause', () => {
    const error = new BaseError('Test error')
    error.code = 'TEST_ERROR'
    error.data = { file: 'a.txt' }
    error.caller = 'tinygit.test'
    const json = error.toJSON()
    assert.strictEqual(json.code, 'TEST_ERROR')
    assert.deepStrictEqual(json.data, { file: 'a.txt' })
    assert.strictEqual(json.caller, 'tinygit.test')
    assert.strictEqual(json.message, 'Test error')
    assert.ok(json.stack)
    assert.strictEqual(json.cause, undefined)
  })

  await t.test('toJSON - serializes cause', () => {
    const error = new BaseError('Wrapped', new TypeError('inner'))
    const json = error.toJSON()
    assert.strictEqual(json.cause?.message, 'inner')
    assert.strictEqual(json.cause?.name, 'TypeError')
  })

  await t.test('fromJSON - restores fields', () => {
    const original = new BaseError('Test error', new RangeError('inner'))
    original.code = 'TEST_ERROR'
    original.data = { n: 1 }
    original.caller = 'tinygit.test'
    const restored = BaseError.fromJSON(original.toJSON())
    assert.ok(restored instanceof BaseError)
    assert.strictEqual(restored.message, 'Test error')
    assert.strictEqual(restored.code, 'TEST_ERROR')
    assert.deepStrictEqual(restored.data, { n: 1 })
    assert.strictEqual(restored.caller, 'tinygit.test')
    assert.strictEqual(restored.cause?.name, 'RangeError')
    assert.strictEqual(restored.cause?.message, 'inner')
  })
})
