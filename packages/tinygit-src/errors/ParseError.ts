import { BaseError } from './BaseError.ts'

export class ParseError extends BaseError {
  static readonly code = 'ParseError' as const
  declare data: { expected: string; actual: string }

  constructor(expected: string, actual: string) {
    super(`Expected "${expected}" but received "${actual}".`)
    this.code = this.name = ParseError.code
    this.data = { expected, actual }
  }
}
