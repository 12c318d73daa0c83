import { BaseError } from './BaseError.ts'

export class UnknownCommandError extends BaseError {
  static readonly code = 'UnknownCommandError' as const
  declare data: { command: string }

  constructor(command: string) {
    super(`'${command}' is not a tinygit command. See 'tinygit help'.`)
    this.code = this.name = UnknownCommandError.code
    this.data = { command }
  }
}
