import { test } from 'node:test'
import assert from 'node:assert'
import { GitConfig } from '@tinygit/tinygit-src/index.ts'

const SAMPLE = [
  '# user settings',
  '[user]',
  '\tname = Test User',
  '\temail = test@example.com ; work address',
  '[core]',
  '\tbare',
  '\tquoted = "a # b"',
  '[alias "st"]',
  '\tcommand = status',
  '[remote "origin"]',
  '\turl = one',
  '\turl = two',
  '',
].join('\n')

test('GitConfig', async (t) => {
  await t.test('ok:get', () => {
    const config = GitConfig.from(SAMPLE)
    assert.strictEqual(config.get('user.name'), 'Test User')
    assert.strictEqual(config.get('USER.Name'), 'Test User')
    assert.strictEqual(config.get('user.email'), 'test@example.com')
    assert.strictEqual(config.get('alias.st.command'), 'status')
    assert.strictEqual(config.get('user.signingkey'), undefined)
  })

  await t.test('ok:implicit-true-and-quotes', () => {
    const config = GitConfig.from(SAMPLE)
    assert.strictEqual(config.get('core.bare'), 'true')
    assert.strictEqual(config.get('core.quoted'), 'a # b')
  })

  await t.test('ok:getall', () => {
    const config = GitConfig.from(SAMPLE)
    assert.deepStrictEqual(config.getall('remote.origin.url'), ['one', 'two'])
    assert.strictEqual(config.get('remote.origin.url'), 'two')
  })

  await t.test('ok:getSubsections', () => {
    assert.deepStrictEqual(GitConfig.from(SAMPLE).getSubsections('remote'), ['origin'])
  })

  await t.test('ok:entries', () => {
    assert.deepStrictEqual(GitConfig.from('[user]\n\tname = A\n[core]\n\teditor = vi\n').entries(), [
      ['user.name', 'A'],
      ['core.editor', 'vi'],
    ])
  })

  await t.test('ok:set-new-section', () => {
    const config = GitConfig.from('')
    config.set('user.name', 'Test User')
    assert.strictEqual(config.toString(), '[user]\n\tname = Test User')
  })

  await t.test('ok:set-subsection', () => {
    const config = GitConfig.from('')
    config.set('alias.co.command', 'checkout')
    assert.strictEqual(config.toString(), '[alias "co"]\n\tcommand = checkout')
    assert.strictEqual(config.get('alias.co.command'), 'checkout')
  })

  await t.test('ok:set-existing-keeps-other-lines', () => {
    const config = GitConfig.from('# mine\n[user]\n\tname = A\n')
    config.set('user.name', 'B')
    assert.strictEqual(config.toString(), '# mine\n[user]\n\tname = B\n')
  })

  await t.test('ok:set-into-existing-section', () => {
    const config = GitConfig.from('[user]\n\tname = A\n')
    config.set('user.email', 'a@example.com')
    assert.strictEqual(config.toString(), '[user]\n\temail = a@example.com\n\tname = A\n')
  })

  await t.test('ok:set-new-section-before-final-newline', () => {
    const config = GitConfig.from('[user]\n\tname = A\n')
    config.set('core.editor', 'vi')
    assert.strictEqual(config.toString(), '[user]\n\tname = A\n[core]\n\teditor = vi\n')
  })

  await t.test('ok:set-quotes-comment-chars', () => {
    const config = GitConfig.from('')
    config.set('core.note', 'a#b')
    assert.strictEqual(config.toString(), '[core]\n\tnote = "a#b"')
    assert.strictEqual(GitConfig.from(config.toString()).get('core.note'), 'a#b')
  })

  await t.test('ok:unset', () => {
    const config = GitConfig.from('[user]\n\tname = A\n\temail = a@example.com\n')
    config.set('user.name', undefined)
    assert.strictEqual(config.toString(), '[user]\n\temail = a@example.com\n')
    assert.strictEqual(config.get('user.name'), undefined)
  })

  await t.test('ok:deleteSection', () => {
    const config = GitConfig.from(SAMPLE)
    config.deleteSection('remote', 'origin')
    assert.deepStrictEqual(config.getall('remote.origin.url'), [])
    assert.strictEqual(config.get('user.name'), 'Test User')
  })

  await t.test('ok:merge-later-wins', () => {
    const merged = GitConfig.merge(
      GitConfig.from('[user]\n\tname = Global\n\temail = global@example.com\n'),
      GitConfig.from('[user]\n\tname = Local\n')
    )
    assert.strictEqual(merged.get('user.name'), 'Local')
    assert.strictEqual(merged.get('user.email'), 'global@example.com')
  })

  await t.test('error:invalid-path', () => {
    assert.throws(() => GitConfig.from('').set('nosection', 'x'), TypeError)
    assert.throws(() => GitConfig.from('').set('user.bad name', 'x'), TypeError)
  })
})
