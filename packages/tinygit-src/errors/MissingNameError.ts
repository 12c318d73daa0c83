import { BaseError } from './BaseError.ts'

export class MissingNameError extends BaseError {
  static readonly code = 'MissingNameError' as const
  declare data: { role: 'author' | 'committer'; field: 'name' | 'email' }

  constructor(role: 'author' | 'committer', field: 'name' | 'email' = 'name') {
    super(`The ${role} ${field} is empty (set "user.${field}").`)
    this.code = this.name = MissingNameError.code
    this.data = { role, field }
  }
}
