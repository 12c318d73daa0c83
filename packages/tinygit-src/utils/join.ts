// Repository paths always use forward slashes, whatever the host.

export const normalizePath = (path: string): string => {
  const absolute = path.startsWith('/')
  const parts: string[] = []
  for (const part of path.split('/')) {
    if (part === '' || part === '.') continue
    if (part === '..') {
      if (parts.length > 0 && parts[parts.length - 1] !== '..') {
        parts.pop()
      } else if (!absolute) {
        parts.push('..')
      }
      continue
    }
    parts.push(part)
  }
  const joined = parts.join('/')
  if (absolute) return '/' + joined
  return joined === '' ? '.' : joined
}

export const join = (...parts: string[]): string => {
  return normalizePath(parts.filter(part => part !== '').join('/'))
}

export const dirname = (path: string): string => {
  const last = path.lastIndexOf('/')
  if (last === -1) return '.'
  if (last === 0) return '/'
  return path.slice(0, last)
}

export const basename = (path: string): string => {
  const last = path.lastIndexOf('/')
  return last > -1 ? path.slice(last + 1) : path
}

/**
 * Path of `filepath` relative to `dir`, or `null` when it lies outside.
 */
export const relativeTo = (dir: string, filepath: string): string | null => {
  const base = normalizePath(dir)
  const target = normalizePath(filepath)
  if (target === base) return '.'
  const prefix = base === '/' ? '/' : base + '/'
  return target.startsWith(prefix) ? target.slice(prefix.length) : null
}
