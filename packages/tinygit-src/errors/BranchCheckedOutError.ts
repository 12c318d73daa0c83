import { BaseError } from './BaseError.ts'

export class BranchCheckedOutError extends BaseError {
  static readonly code = 'BranchCheckedOutError' as const
  declare data: { branch: string }

  constructor(branch: string) {
    super(`Cannot modify branch '${branch}' while it is checked out.`)
    this.code = this.name = BranchCheckedOutError.code
    this.data = { branch }
  }
}
