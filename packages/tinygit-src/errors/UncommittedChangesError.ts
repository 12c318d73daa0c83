import { BaseError } from './BaseError.ts'

export class UncommittedChangesError extends BaseError {
  static readonly code = 'UncommittedChangesError' as const
  declare data: { filepaths: string[]; reason: 'staged' | 'worktree' }

  constructor(filepaths: string[], reason: 'staged' | 'worktree') {
    const listed = filepaths.map(filepath => `\t${filepath}`).join('\n')
    super(
      reason === 'staged'
        ? `Your staged changes to the following files would be lost by checkout:\n${listed}\nPlease commit your changes before you switch branches.`
        : `Your local changes to the following files would be overwritten by checkout:\n${listed}\nPlease commit your changes or remove them before you switch branches.`
    )
    this.code = this.name = UncommittedChangesError.code
    this.data = { filepaths, reason }
  }
}
