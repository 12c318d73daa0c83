import { InternalError } from '../errors/InternalError.ts'
import type { Author } from '../models/GitCommit.ts'

export const parseAuthor = (author: string): Author => {
  const match = author.match(/^(.*) <(.*)> (\d+) ([+-]\d{4})$/)
  if (!match) {
    throw new InternalError(`Invalid author line: ${author}`)
  }
  const [, name, email, timestamp, offset] = match
  return {
    name,
    email,
    timestamp: Number(timestamp),
    timezoneOffset: parseTimezoneOffset(offset),
  }
}

const parseTimezoneOffset = (offset: string): number => {
  const sign = offset[0] === '+' ? 1 : -1
  const hours = Number(offset.slice(1, 3))
  const minutes = Number(offset.slice(3, 5))
  const total = sign * (hours * 60 + minutes)
  // "-0000" comes back as +0 after negation; keep it -0
  if (total === 0) return sign === -1 ? -0 : 0
  return -total
}
