import { BaseError } from './BaseError.ts'

export class BranchExistsError extends BaseError {
  static readonly code = 'BranchExistsError' as const
  declare data: { branch: string }

  constructor(branch: string) {
    super(`A branch named '${branch}' already exists.`)
    this.code = this.name = BranchExistsError.code
    this.data = { branch }
  }
}
