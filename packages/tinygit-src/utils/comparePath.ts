import { compareStrings } from './compareStrings.ts'

export const comparePath = (a: { path: string }, b: { path: string }): number => {
  return compareStrings(a.path, b.path)
}
