import { BaseError } from './BaseError.ts'

export class InternalError extends BaseError {
  static readonly code = 'InternalError' as const
  declare data: { message: string }

  constructor(message: string) {
    super(`An internal error caused this command to fail: ${message}`)
    this.code = this.name = InternalError.code
    this.data = { message }
  }
}
