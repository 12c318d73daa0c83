// git-check-ref-format(1)
// eslint-disable-next-line no-control-regex
const bad = /(^|[/.])([/.]|$)|^@$|@{|[\x00-\x20\x7f~^:?*[\\]|\.lock(\/|$)/

/**
 * Whether `name` is a valid ref name. Single-level names such as `main`
 * are only accepted with `onelevel`.
 */
export default function isValidRef(name: string, onelevel = false): boolean {
  if (typeof name !== 'string' || name === '') return false
  if (bad.test(name)) return false
  return onelevel || name.includes('/')
}
