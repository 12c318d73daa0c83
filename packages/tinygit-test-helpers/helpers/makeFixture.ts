import * as _fs from 'node:fs'
import * as os from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import findUp from 'find-up'
import { onExit } from 'signal-exit'
import { init } from '@tinygit/tinygit-src/commands/init.ts'
import { FileSystem } from '@tinygit/tinygit-src/models/FileSystem.ts'

const TEMP_PATH = join(os.tmpdir(), 'tinygit-test-fixture-')
const TEMP_DIRS_CREATED = new Set<string>()

let cleanupRegistered = false

export function cleanupTempDirs(): void {
  for (const tempDir of TEMP_DIRS_CREATED) {
    _fs.rmSync(tempDir, { recursive: true, force: true })
  }
  TEMP_DIRS_CREATED.clear()
}

const helpersDir = dirname(fileURLToPath(import.meta.url))

async function findFixture(fixture: string): Promise<string | undefined> {
  const fixturesDir = await findUp(join('tinygit-test-fixtures', 'fixtures'), {
    cwd: resolve(helpersDir, '..', '..'),
    type: 'directory',
  })
  if (fixturesDir === undefined) return undefined
  const fixturePath = join(fixturesDir, fixture)
  return _fs.existsSync(fixturePath) ? fixturePath : undefined
}

/**
 * A fresh temp directory holding a copy of `fixtures/<fixture>`, or an empty
 * one when no such fixture exists.
 */
export async function useTempDir(fixture: string): Promise<string> {
  const tempDir = await _fs.promises.mkdtemp(TEMP_PATH)
  TEMP_DIRS_CREATED.add(tempDir)
  const fixturePath = await findFixture(fixture)
  if (fixturePath !== undefined) {
    await _fs.promises.cp(fixturePath, tempDir, { recursive: true })
  }
  return tempDir
}

export interface TestFixture {
  _fs: typeof _fs
  fs: FileSystem
  dir: string
  gitdir: string
}

/**
 * Creates a test fixture for the Node.js test runner
 *
 * With `init: true` the copy is also turned into a repository.
 */
export async function makeFixture(
  fixture: string,
  options: { init?: boolean } = {}
): Promise<TestFixture> {
  if (!cleanupRegistered) {
    onExit(cleanupTempDirs)
    cleanupRegistered = true
  }
  const fs = new FileSystem(_fs)
  const dir = await useTempDir(fixture)
  const gitdir = join(dir, '.tinygit')
  if (options.init === true) {
    await init({ fs, dir })
  }
  return { _fs, fs, dir, gitdir }
}
