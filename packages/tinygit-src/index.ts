import { add } from './commands/add.ts'
import { branch } from './commands/branch.ts'
import { checkout } from './commands/checkout.ts'
import { commit } from './commands/commit.ts'
import { currentBranch } from './commands/currentBranch.ts'
import { deleteBranch } from './commands/deleteBranch.ts'
import { deleteTag } from './commands/deleteTag.ts'
import { findRoot } from './commands/findRoot.ts'
import { getConfig, listConfig } from './commands/getConfig.ts'
import { hashBlob } from './commands/hashBlob.ts'
import { importTree } from './commands/importTree.ts'
import { init } from './commands/init.ts'
import { isIgnored } from './commands/isIgnored.ts'
import { listBranches } from './commands/listBranches.ts'
import { listFiles } from './commands/listFiles.ts'
import { listTags } from './commands/listTags.ts'
import { log } from './commands/log.ts'
import { readBlob } from './commands/readBlob.ts'
import { readCommit } from './commands/readCommit.ts'
import { readTree } from './commands/readTree.ts'
import { renameBranch } from './commands/renameBranch.ts'
import { resolveRef } from './commands/resolveRef.ts'
import { setConfig } from './commands/setConfig.ts'
import { status } from './commands/status.ts'
import { tag } from './commands/tag.ts'
import { unstage } from './commands/unstage.ts'
import { writeBlob } from './commands/writeBlob.ts'
import { writeCommit } from './commands/writeCommit.ts'
import { writeTree } from './commands/writeTree.ts'
import * as Errors from './errors/index.ts'

// named exports
export {
  Errors,
  add,
  branch,
  checkout,
  commit,
  currentBranch,
  deleteBranch,
  deleteTag,
  findRoot,
  getConfig,
  hashBlob,
  importTree,
  init,
  isIgnored,
  listBranches,
  listConfig,
  listFiles,
  listTags,
  log,
  readBlob,
  readCommit,
  readTree,
  renameBranch,
  resolveRef,
  setConfig,
  status,
  tag,
  unstage,
  writeBlob,
  writeCommit,
  writeTree,
}

export { cli, HELP_TEXT } from './cli/index.ts'
export type { CliOptions, CommandResult } from './cli/index.ts'
export { FileSystem } from './models/FileSystem.ts'
export { GitConfig } from './models/GitConfig.ts'
export { loadConfig } from './git/config/loadConfig.ts'

export type { PromiseFsClient, Stat } from './models/FileSystem.ts'
export type { Author, CommitObject, ReadCommitResult } from './models/GitCommit.ts'
export type { FileMode, ReadTreeResult, TreeEntry, TreeMode, TreeObject } from './models/GitTree.ts'
export type { ObjectType } from './models/GitObject.ts'
export type { ConfigScope } from './git/config/loadConfig.ts'
export type { BranchInfo } from './commands/listBranches.ts'
export type { CheckoutResult } from './commands/checkout.ts'
export type { CommitOptions } from './commands/commit.ts'
export type { ImportTreeResult } from './commands/importTree.ts'
export type { InitResult } from './commands/init.ts'
export type { StatusResult } from './commands/status.ts'
export type {
  BaseCommandOptions,
  CommandWithFilepathOptions,
  CommandWithRefOptions,
  FsClient,
} from './types/commandOptions.ts'
