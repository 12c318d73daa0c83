import { BaseError } from './BaseError.ts'

export class PathNotFoundError extends BaseError {
  static readonly code = 'PathNotFoundError' as const
  declare data: { filepath: string }

  constructor(filepath: string) {
    super(`pathspec '${filepath}' did not match any files`)
    this.code = this.name = PathNotFoundError.code
    this.data = { filepath }
  }
}
