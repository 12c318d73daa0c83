import { BaseError } from './BaseError.ts'

export class AlreadyExistsError extends BaseError {
  static readonly code = 'AlreadyExistsError' as const
  declare data: { noun: 'tag' | 'branch'; where: string }

  constructor(noun: 'tag' | 'branch', where: string) {
    super(`Failed to create ${noun} at ${where} because it already exists.`)
    this.code = this.name = AlreadyExistsError.code
    this.data = { noun, where }
  }
}
