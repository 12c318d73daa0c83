// git-config(1) syntax: `[section]` or `[section "subsection"]` headers,
// `name = value` variables, `#` and `;` comments.

// section is alphanumeric (ASCII) with - and ., case insensitive
// subsection is optional, double quoted, case sensitive
const SECTION_LINE_REGEX = /^\[([A-Za-z0-9-.]+)(?: "(.*)")?\]$/
const SECTION_REGEX = /^[A-Za-z0-9-.]+$/

// a variable line with no `=` has the implicit value "true"
const VARIABLE_LINE_REGEX = /^([A-Za-z][A-Za-z0-9-]*)(?: *= *(.*))?$/
const VARIABLE_NAME_REGEX = /^[A-Za-z][A-Za-z0-9-]*$/

const VARIABLE_VALUE_COMMENT_REGEX = /^(.*?)( *[#;].*)$/

type ConfigLine = {
  line: string
  isSection: boolean
  section: string | null
  subsection: string | null
  name: string | null
  value: string | null
  path: string
  modified: boolean
}

type ConfigPath = {
  section: string | null
  subsection: string | null
  name: string | null
  path: string
  sectionPath: string
}

const lower = (text: string | null): string | null => {
  return text != null ? text.toLowerCase() : null
}

const getPath = (
  section: string | null,
  subsection: string | null,
  name: string | null
): string => {
  return [lower(section), subsection, lower(name)].filter(a => a != null).join('.')
}

const splitPath = (path: string): ConfigPath => {
  const segments = path.split('.')
  const section = segments.shift() ?? null
  const name = segments.pop() ?? null
  const subsection = segments.length > 0 ? segments.join('.') : null
  return {
    section,
    subsection,
    name,
    path: getPath(section, subsection, name),
    sectionPath: getPath(section, subsection, null),
  }
}

const hasOddNumberOfQuotes = (text: string): boolean => {
  const numberOfQuotes = (text.match(/(?:^|[^\\])"/g) ?? []).length
  return numberOfQuotes % 2 !== 0
}

const removeComments = (rawValue: string): string => {
  const commentMatches = VARIABLE_VALUE_COMMENT_REGEX.exec(rawValue)
  if (commentMatches == null) return rawValue
  const [, valueWithoutComment, comment] = commentMatches
  // an odd number of quotes on both sides means the marker is inside a quoted value
  if (hasOddNumberOfQuotes(valueWithoutComment) && hasOddNumberOfQuotes(comment)) {
    return `${valueWithoutComment}${comment}`
  }
  return valueWithoutComment
}

const removeQuotes = (text: string): string => {
  let result = ''
  for (let i = 0; i < text.length; i++) {
    const c = text[i]
    if (c === '"' && text[i - 1] !== '\\') continue
    if (c === '\\' && text[i + 1] === '"') continue
    result += c
  }
  return result
}

const parseLines = (text: string): ConfigLine[] => {
  if (text === '') return []
  let section: string | null = null
  let subsection: string | null = null
  return text.split('\n').map(line => {
    const trimmed = line.trim()
    const sectionMatch = SECTION_LINE_REGEX.exec(trimmed)
    if (sectionMatch) {
      section = sectionMatch[1]
      subsection = sectionMatch[2] ?? null
      return {
        line,
        isSection: true,
        section,
        subsection,
        name: null,
        value: null,
        path: getPath(section, subsection, null),
        modified: false,
      }
    }
    let name: string | null = null
    let value: string | null = null
    const variableMatch = VARIABLE_LINE_REGEX.exec(trimmed)
    if (variableMatch && section != null) {
      name = variableMatch[1]
      value = removeQuotes(removeComments(variableMatch[2] ?? 'true'))
    }
    return {
      line,
      isSection: false,
      section,
      subsection,
      name,
      value,
      path: getPath(section, subsection, name),
      modified: false,
    }
  })
}

/**
 * An in-memory git-style config file. Reading never fails: lines that are
 * not sections or variables are kept verbatim and ignored.
 */
export class GitConfig {
  private readonly lines: ConfigLine[]

  constructor(lines: ConfigLine[]) {
    this.lines = lines
  }

  static from(text: string | Uint8Array | null | undefined): GitConfig {
    const source =
      text == null ? '' : typeof text === 'string' ? text : Buffer.from(text).toString('utf8')
    return new GitConfig(parseLines(source))
  }

  /**
   * Layers several configs into one read view. Later configs win.
   */
  static merge(...configs: GitConfig[]): GitConfig {
    return new GitConfig(configs.flatMap(config => config.lines.map(line => ({ ...line }))))
  }

  get(path: string): string | undefined {
    return this.getall(path).pop()
  }

  getall(path: string): string[] {
    const normalized = splitPath(path).path
    const values: string[] = []
    for (const line of this.lines) {
      if (line.path === normalized && line.name != null && line.value != null) {
        values.push(line.value)
      }
    }
    return values
  }

  getSubsections(section: string): string[] {
    const wanted = section.toLowerCase()
    const result: string[] = []
    for (const line of this.lines) {
      if (line.isSection && lower(line.section) === wanted && line.subsection != null) {
        if (!result.includes(line.subsection)) result.push(line.subsection)
      }
    }
    return result
  }

  /**
   * Sets the last occurrence of `path`, appending the variable (and its
   * section) when missing. `undefined` removes every occurrence.
   */
  set(path: string, value: string | undefined): void {
    const { section, subsection, name, path: normalized, sectionPath } = splitPath(path)
    if (value === undefined) {
      for (let i = this.lines.length - 1; i >= 0; i--) {
        if (this.lines[i].path === normalized && this.lines[i].name != null) {
          this.lines.splice(i, 1)
        }
      }
      return
    }
    if (section == null || name == null) {
      throw new TypeError(`Invalid config path "${path}": expected section.name`)
    }
    if (!SECTION_REGEX.test(section) || !VARIABLE_NAME_REGEX.test(name)) {
      throw new TypeError(`Invalid config path "${path}"`)
    }
    const existing = this.lines.findLastIndex(
      line => line.path === normalized && line.name != null
    )
    if (existing !== -1) {
      this.lines[existing] = { ...this.lines[existing], value, modified: true }
      return
    }
    const entry: ConfigLine = {
      line: '',
      isSection: false,
      section,
      subsection,
      name,
      value,
      path: normalized,
      modified: true,
    }
    const sectionIndex = this.lines.findLastIndex(
      line => line.isSection && line.path === sectionPath
    )
    if (sectionIndex !== -1) {
      this.lines.splice(sectionIndex + 1, 0, entry)
    } else {
      // keep a trailing newline at the end of the file
      const last = this.lines[this.lines.length - 1]
      const at = last !== undefined && last.line === '' && !last.modified ? this.lines.length - 1 : this.lines.length
      this.lines.splice(
        at,
        0,
        {
          line: '',
          isSection: true,
          section,
          subsection,
          name: null,
          value: null,
          path: sectionPath,
          modified: true,
        },
        entry
      )
    }
  }

  deleteSection(section: string, subsection: string | null = null): void {
    const wanted = section.toLowerCase()
    for (let i = this.lines.length - 1; i >= 0; i--) {
      const line = this.lines[i]
      if (lower(line.section) === wanted && line.subsection === subsection) {
        this.lines.splice(i, 1)
      }
    }
  }

  /**
   * Every variable as `[path, value]`, in file order.
   */
  entries(): Array<[string, string]> {
    const result: Array<[string, string]> = []
    for (const line of this.lines) {
      if (line.name != null && line.value != null) {
        result.push([line.path, line.value])
      }
    }
    return result
  }

  toString(): string {
    return this.lines
      .map(({ line, isSection, section, subsection, name, value, modified }) => {
        if (!modified) return line
        if (isSection) {
          return subsection != null ? `[${section} "${subsection}"]` : `[${section}]`
        }
        if (/[#;]/.test(value ?? '')) {
          return `\t${name} = "${value}"`
        }
        return `\t${name} = ${value}`
      })
      .join('\n')
  }
}
