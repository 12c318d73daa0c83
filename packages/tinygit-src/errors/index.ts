import { BaseError } from './BaseError.ts'
import { InternalError } from './InternalError.ts'
import { ObjectNotFoundError } from './ObjectNotFoundError.ts'

export { BaseError } from './BaseError.ts'
export type { SerializedError } from './BaseError.ts'
export { AlreadyExistsError } from './AlreadyExistsError.ts'
export { BranchCheckedOutError } from './BranchCheckedOutError.ts'
export { BranchExistsError } from './BranchExistsError.ts'
export { InternalError } from './InternalError.ts'
export { InvalidRefNameError } from './InvalidRefNameError.ts'
export { MissingNameError } from './MissingNameError.ts'
export { MissingParameterError } from './MissingParameterError.ts'
export { NotARepositoryError } from './NotARepositoryError.ts'
export { NothingToCommitError } from './NothingToCommitError.ts'
export { ObjectNotFoundError } from './ObjectNotFoundError.ts'
export { ParseError } from './ParseError.ts'
export { PathNotFoundError } from './PathNotFoundError.ts'
export { UncommittedChangesError } from './UncommittedChangesError.ts'
export { UnknownCommandError } from './UnknownCommandError.ts'
export { UnknownRefError } from './UnknownRefError.ts'
export { UserCanceledError } from './UserCanceledError.ts'

/**
 * True for errors that mean the store itself is damaged, as opposed to a
 * command being used on a state that does not allow it.
 */
export const isCorruption = (err: unknown): boolean => {
  return err instanceof ObjectNotFoundError || err instanceof InternalError
}

export const isTinygitError = (err: unknown): err is BaseError => {
  return err instanceof BaseError
}
