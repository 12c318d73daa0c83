export { cleanupTempDirs, makeFixture, useTempDir } from './helpers/makeFixture.ts'
export type { TestFixture } from './helpers/makeFixture.ts'
