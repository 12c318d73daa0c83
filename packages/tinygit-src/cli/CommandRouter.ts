import { MissingParameterError } from '../errors/MissingParameterError.ts'
import { ParseError } from '../errors/ParseError.ts'
import { UnknownCommandError } from '../errors/UnknownCommandError.ts'
import { add } from '../commands/add.ts'
import { branch } from '../commands/branch.ts'
import { checkout } from '../commands/checkout.ts'
import { commit } from '../commands/commit.ts'
import { deleteBranch } from '../commands/deleteBranch.ts'
import { deleteTag } from '../commands/deleteTag.ts'
import { findRoot } from '../commands/findRoot.ts'
import { getConfig, listConfig } from '../commands/getConfig.ts'
import { importTree } from '../commands/importTree.ts'
import { init } from '../commands/init.ts'
import { listBranches } from '../commands/listBranches.ts'
import { listFiles } from '../commands/listFiles.ts'
import { listTags } from '../commands/listTags.ts'
import { log } from '../commands/log.ts'
import { renameBranch } from '../commands/renameBranch.ts'
import { resolveRef } from '../commands/resolveRef.ts'
import { setConfig } from '../commands/setConfig.ts'
import { status } from '../commands/status.ts'
import { tag } from '../commands/tag.ts'
import { unstage } from '../commands/unstage.ts'
import { join } from '../utils/join.ts'
import { ArgumentParser, type FlagValue } from './ArgumentParser.ts'
import { renderBranches, renderCommitSummary, renderLog, renderStatus, shortOid } from './render.ts'
import type { FileSystem } from '../models/FileSystem.ts'

export type Flags = Record<string, FlagValue>

export type CommandHandler = (flags: Flags, positional: string[]) => Promise<string>

export type RouterContext = {
  fs: FileSystem
  cwd: string
  globalConfigPath?: string
}

export const HELP_TEXT = `usage: tinygit <command> [<args>]

Commands:
  init                      Create an empty repository in the current directory
  status                    Show the working tree status
  add <path>...             Add file contents to the index
  reset <path>...           Remove paths from the index
  commit -m <message>       Record the staged changes
  log [-n <count>]          Show the commit history
  branch [<name>]           List or create branches
  branch -d <name>          Delete a branch
  branch -m <old> <new>     Rename a branch
  checkout <ref>            Switch branches or detach HEAD at a tag or commit
  checkout -b <name>        Create a branch and switch to it
  tag [<name>]              List or create tags
  tag -d <name>             Delete a tag
  config [<key> [<value>]]  List, get or set configuration (--global, --unset)
  import [-m <message>]     Commit the current directory as a new repository
  help                      Show this message`

/**
 * Routes commands to their handlers
 */
export class CommandRouter {
  private readonly context: RouterContext
  private readonly handlers: Record<string, CommandHandler>

  constructor(context: RouterContext) {
    this.context = context
    this.handlers = {
      init: this._handleInit,
      status: this._handleStatus,
      add: this._handleAdd,
      reset: this._handleReset,
      commit: this._handleCommit,
      log: this._handleLog,
      branch: this._handleBranch,
      checkout: this._handleCheckout,
      tag: this._handleTag,
      config: this._handleConfig,
      import: this._handleImport,
      help: async () => HELP_TEXT,
    }
  }

  /**
   * Dispatches a command to its handler
   */
  async dispatch(command: string, flags: Flags, positional: string[]): Promise<string> {
    const handler = Object.hasOwn(this.handlers, command) ? this.handlers[command] : undefined
    if (!handler) {
      throw new UnknownCommandError(command)
    }
    return handler(flags, positional)
  }

  private async _dir(): Promise<string> {
    return findRoot({ fs: this.context.fs, filepath: this.context.cwd })
  }

  private _path(filepath: string): string {
    return filepath.startsWith('/') ? filepath : join(this.context.cwd, filepath)
  }

  private _handleInit = async (flags: Flags): Promise<string> => {
    const { gitdir, created } = await init({
      fs: this.context.fs,
      dir: this.context.cwd,
      defaultBranch: ArgumentParser.stringFlag(flags, 'initialBranch') ?? 'main',
    })
    return created
      ? `Initialized empty tinygit repository in ${gitdir}`
      : `Reinitialized existing tinygit repository in ${gitdir}`
  }

  private _handleStatus = async (): Promise<string> => {
    const { fs } = this.context
    const dir = await this._dir()
    const result = await status({ fs, dir })
    const committed = new Set(
      result.head === null ? [] : await listFiles({ fs, dir, ref: result.head })
    )
    const missing = new Set<string>()
    for (const file of result.modified) {
      if (!(await fs.exists(join(dir, file)))) missing.add(file)
    }
    return renderStatus(result, { committed, missing })
  }

  private _handleAdd = async (_flags: Flags, positional: string[]): Promise<string> => {
    if (positional.length === 0) throw new MissingParameterError('filepath')
    const dir = await this._dir()
    await add({ fs: this.context.fs, dir, filepath: positional.map(p => this._path(p)) })
    return ''
  }

  private _handleReset = async (_flags: Flags, positional: string[]): Promise<string> => {
    const dir = await this._dir()
    const filepath = positional.length > 0 ? positional.map(p => this._path(p)) : ['.']
    await unstage({ fs: this.context.fs, dir, filepath })
    return ''
  }

  private _handleCommit = async (flags: Flags): Promise<string> => {
    const message = ArgumentParser.stringFlag(flags, 'm') ?? ArgumentParser.stringFlag(flags, 'message')
    if (message === undefined) throw new MissingParameterError('message')
    const { fs, globalConfigPath } = this.context
    const dir = await this._dir()
    const filesChanged = (await listFiles({ fs, dir })).length
    const oid = await commit({ fs, dir, message, globalConfigPath })
    const current = await status({ fs, dir })
    return renderCommitSummary({ branch: current.branch, oid, message, filesChanged })
  }

  private _handleLog = async (flags: Flags): Promise<string> => {
    const count = ArgumentParser.stringFlag(flags, 'n')
    if (count !== undefined && !/^\d+$/.test(count)) {
      throw new ParseError('a non-negative integer', count)
    }
    const depth = count === undefined ? undefined : Number.parseInt(count, 10)
    const dir = await this._dir()
    return renderLog(await log({ fs: this.context.fs, dir, depth }))
  }

  private _handleBranch = async (flags: Flags, positional: string[]): Promise<string> => {
    const { fs } = this.context
    const dir = await this._dir()
    if (flags.d !== undefined || flags.delete !== undefined) {
      const ref = ArgumentParser.stringFlag(flags, 'd') ?? positional[0]
      if (ref === undefined) throw new MissingParameterError('ref')
      const branches = await listBranches({ fs, dir })
      const oid = branches.find(b => b.name === ref)?.oid
      await deleteBranch({ fs, dir, ref })
      return oid ? `Deleted branch ${ref} (was ${shortOid(oid)}).` : `Deleted branch ${ref}.`
    }
    if (flags.m !== undefined) {
      const oldref = ArgumentParser.stringFlag(flags, 'm')
      const ref = positional[0]
      if (oldref === undefined) throw new MissingParameterError('oldref')
      if (ref === undefined) throw new MissingParameterError('ref')
      await renameBranch({ fs, dir, oldref, ref })
      return ''
    }
    if (positional.length === 0) {
      return renderBranches(await listBranches({ fs, dir }))
    }
    await branch({ fs, dir, ref: positional[0] })
    return `Branch '${positional[0]}' created`
  }

  private _handleCheckout = async (flags: Flags, positional: string[]): Promise<string> => {
    const { fs } = this.context
    const dir = await this._dir()
    if (flags.b !== undefined) {
      const ref = ArgumentParser.stringFlag(flags, 'b')
      if (ref === undefined) throw new MissingParameterError('ref')
      await branch({ fs, dir, ref, checkout: true })
      return `Switched to a new branch '${ref}'`
    }
    const ref = positional[0]
    if (ref === undefined) throw new MissingParameterError('ref')
    const before = await status({ fs, dir })
    const result = await checkout({ fs, dir, ref })
    if (result.detached) {
      return `HEAD is now at ${shortOid(result.oid)}`
    }
    if (!before.detached && before.branch === result.branch) {
      return `Already on '${result.branch}'`
    }
    return `Switched to branch '${result.branch}'`
  }

  private _handleTag = async (flags: Flags, positional: string[]): Promise<string> => {
    const { fs } = this.context
    const dir = await this._dir()
    if (flags.d !== undefined) {
      const ref = ArgumentParser.stringFlag(flags, 'd') ?? positional[0]
      if (ref === undefined) throw new MissingParameterError('ref')
      const oid = await resolveRef({ fs, dir, ref: `refs/tags/${ref}` })
      await deleteTag({ fs, dir, ref })
      return `Deleted tag '${ref}' (was ${shortOid(oid)})`
    }
    if (positional.length === 0) {
      return (await listTags({ fs, dir })).join('\n')
    }
    await tag({ fs, dir, ref: positional[0], object: positional[1] })
    return ''
  }

  private _handleConfig = async (flags: Flags, positional: string[]): Promise<string> => {
    const { fs, globalConfigPath } = this.context
    const scope = flags.global === true ? 'global' : flags.local === true ? 'local' : undefined
    const dir = await this._dir()
    const [path, value] = positional
    if (flags.unset === true) {
      if (path === undefined) throw new MissingParameterError('path')
      await setConfig({ fs, dir, path, value: undefined, scope, globalConfigPath })
      return ''
    }
    if (path === undefined || flags.list === true || flags.l === true) {
      const entries = await listConfig({ fs, dir, scope, globalConfigPath })
      return entries.map(([key, entry]) => `${key}=${entry}`).join('\n')
    }
    if (value === undefined) {
      return (await getConfig({ fs, dir, path, scope, globalConfigPath })) ?? ''
    }
    await setConfig({ fs, dir, path, value, scope, globalConfigPath })
    return ''
  }

  private _handleImport = async (flags: Flags): Promise<string> => {
    const { fs, cwd, globalConfigPath } = this.context
    const message = ArgumentParser.stringFlag(flags, 'm')
    const { oid, files } = await importTree({ fs, dir: cwd, message, globalConfigPath })
    const current = await status({ fs, dir: cwd })
    return renderCommitSummary({
      branch: current.branch,
      oid,
      message: message ?? 'Initial import',
      filesChanged: files.length,
    })
  }
}
