import { BaseError } from './BaseError.ts'

export class NotARepositoryError extends BaseError {
  static readonly code = 'NotARepositoryError' as const
  declare data: { filepath: string }

  constructor(filepath: string) {
    super(`not a tinygit repository (or any of the parent directories): ${filepath}`)
    this.code = this.name = NotARepositoryError.code
    this.data = { filepath }
  }
}
