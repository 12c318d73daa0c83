import { BaseError } from '../errors/BaseError.ts'
import { isCorruption } from '../errors/index.ts'
import { FileSystem } from '../models/FileSystem.ts'
import { debug } from '../utils/debug.ts'
import { ArgumentParser } from './ArgumentParser.ts'
import { CommandRouter, HELP_TEXT } from './CommandRouter.ts'
import type { FsClient } from '../types/commandOptions.ts'

export type CliOptions = {
  fs: FsClient
  cwd: string
  /** Overrides `~/.tinygitconfig` */
  globalConfigPath?: string
}

/**
 * Outcome of one invocation. A failure is `fatal` when the repository
 * itself is damaged; the process wrapper maps that to exit code 128.
 */
export type CommandResult =
  | { ok: true; output: string }
  | { ok: false; code: string; message: string; fatal: boolean }

/**
 * Main CLI entrypoint
 */
export const cli = async (args: string[], { fs, cwd, globalConfigPath }: CliOptions): Promise<CommandResult> => {
  const { command, flags, positional } = ArgumentParser.parse(args)
  if (command === null || command === '--help' || command === '-h') {
    return { ok: true, output: HELP_TEXT }
  }

  const router = new CommandRouter({ fs: new FileSystem(fs), cwd, globalConfigPath })
  try {
    const output = await router.dispatch(command, flags, positional)
    return { ok: true, output }
  } catch (err) {
    if (!(err instanceof BaseError)) throw err
    debug('cli', `${command} failed`, err)
    return { ok: false, code: err.code, message: err.message, fatal: isCorruption(err) }
  }
}

export { ArgumentParser } from './ArgumentParser.ts'
export type { FlagValue, ParsedArguments } from './ArgumentParser.ts'
export { CommandRouter, HELP_TEXT } from './CommandRouter.ts'
export type { CommandHandler, Flags, RouterContext } from './CommandRouter.ts'
