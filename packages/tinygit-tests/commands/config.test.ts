import { test } from 'node:test'
import assert from 'node:assert'
import * as path from 'node:path'
import { Errors, getConfig, listConfig, setConfig } from '@tinygit/tinygit-src/index.ts'
import { makeFixture } from '@tinygit/tinygit-test-helpers/helpers/makeFixture.ts'

test('config', async (t) => {
  await t.test('ok:global-values', async () => {
    const { fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    assert.strictEqual(await getConfig({ fs, dir, path: 'user.name', globalConfigPath }), 'Global User')
    assert.strictEqual(await getConfig({ fs, dir, path: 'alias.st.command', globalConfigPath }), 'status')
    assert.strictEqual(await getConfig({ fs, dir, path: 'user.missing', globalConfigPath }), undefined)
  })

  await t.test('ok:local-overrides-global', async () => {
    const { fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    await setConfig({ fs, dir, path: 'user.name', value: 'Local User' })
    assert.strictEqual(await getConfig({ fs, dir, path: 'user.name', globalConfigPath }), 'Local User')
    assert.strictEqual(
      await getConfig({ fs, dir, path: 'user.name', scope: 'global', globalConfigPath }),
      'Global User'
    )
    assert.strictEqual(
      await getConfig({ fs, dir, path: 'user.email', scope: 'local', globalConfigPath }),
      undefined
    )
  })

  await t.test('ok:keys-are-case-insensitive', async () => {
    const { fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    assert.strictEqual(await getConfig({ fs, dir, path: 'User.Name', globalConfigPath }), 'Global User')
  })

  await t.test('ok:list', async () => {
    const { fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    assert.deepStrictEqual(await listConfig({ fs, dir, globalConfigPath }), [
      ['user.name', 'Global User'],
      ['user.email', 'global@example.com'],
      ['core.editor', 'vi'],
      ['alias.st.command', 'status'],
      ['core.repositoryformatversion', '0'],
    ])
    assert.deepStrictEqual(await listConfig({ fs, dir, scope: 'local', globalConfigPath }), [
      ['core.repositoryformatversion', '0'],
    ])
  })

  await t.test('ok:set-global-keeps-comments', async () => {
    const { _fs, fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    await setConfig({ fs, dir, path: 'user.email', value: 'new@example.com', scope: 'global', globalConfigPath })
    await setConfig({ fs, dir, path: 'init.defaultBranch', value: 'trunk', scope: 'global', globalConfigPath })
    assert.strictEqual(
      _fs.readFileSync(globalConfigPath, 'utf8'),
      [
        '# shared defaults',
        '[user]',
        '\tname = Global User',
        '\temail = new@example.com',
        '[core]',
        '\teditor = vi',
        '[alias "st"]',
        '\tcommand = status',
        '[init]',
        '\tdefaultBranch = trunk',
        '',
      ].join('\n')
    )
  })

  await t.test('ok:unset', async () => {
    const { fs, dir } = await makeFixture('test-config', { init: true })
    const globalConfigPath = path.join(dir, 'global.ini')
    await setConfig({ fs, dir, path: 'user.name', value: 'Local User' })
    await setConfig({ fs, dir, path: 'user.name', value: undefined })
    assert.strictEqual(await getConfig({ fs, dir, path: 'user.name', globalConfigPath }), 'Global User')
  })

  await t.test('error:NotARepositoryError', async () => {
    const { fs, dir } = await makeFixture('test-config')
    await assert.rejects(getConfig({ fs, dir, path: 'user.name' }), Errors.NotARepositoryError)
  })
})
