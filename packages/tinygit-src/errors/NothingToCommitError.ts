import { BaseError } from './BaseError.ts'

export class NothingToCommitError extends BaseError {
  static readonly code = 'NothingToCommitError' as const

  constructor() {
    super('nothing to commit (use "add" to stage changes)')
    this.code = this.name = NothingToCommitError.code
    this.data = {}
  }
}
