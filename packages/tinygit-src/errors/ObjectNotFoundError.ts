import { BaseError } from './BaseError.ts'

/**
 * A digest was referenced but the object store does not hold it.
 * Outside of user-supplied digests this means the store is corrupt.
 */
export class ObjectNotFoundError extends BaseError {
  static readonly code = 'ObjectNotFoundError' as const
  declare data: { oid: string }

  constructor(oid: string) {
    super(`Could not find object ${oid}.`)
    this.code = this.name = ObjectNotFoundError.code
    this.data = { oid }
  }
}
