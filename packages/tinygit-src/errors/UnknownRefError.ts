import { BaseError } from './BaseError.ts'

export class UnknownRefError extends BaseError {
  static readonly code = 'UnknownRefError' as const
  declare data: { ref: string }

  constructor(ref: string) {
    super(`'${ref}' did not match any branch, tag or commit known to tinygit.`)
    this.code = this.name = UnknownRefError.code
    this.data = { ref }
  }
}
