import { MissingParameterError } from '../errors/MissingParameterError.ts'

export function assertParameter<T>(name: string, value: T): asserts value is Exclude<T, undefined> {
  if (value === undefined) {
    throw new MissingParameterError(name)
  }
}
