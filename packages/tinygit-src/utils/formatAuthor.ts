import type { Author } from '../models/GitCommit.ts'

export const formatAuthor = ({ name, email, timestamp, timezoneOffset }: Author): string => {
  return `${name} <${email}> ${timestamp} ${formatTimezoneOffset(timezoneOffset)}`
}

// `timezoneOffset` follows Date#getTimezoneOffset (minutes west of UTC), so
// the rendered sign is flipped. -0 survives a round trip as "-0000".
const formatTimezoneOffset = (minutes: number): string => {
  const sign = simpleSign(negateExceptForZero(minutes))
  const absMinutes = Math.abs(minutes)
  const hours = Math.floor(absMinutes / 60)
  const remainingMinutes = absMinutes - hours * 60
  return (
    (sign === -1 ? '-' : '+') +
    String(hours).padStart(2, '0') +
    String(remainingMinutes).padStart(2, '0')
  )
}

const simpleSign = (n: number): number => {
  return Math.sign(n) || (Object.is(n, -0) ? -1 : 1)
}

const negateExceptForZero = (n: number): number => {
  return n === 0 ? n : -n
}
