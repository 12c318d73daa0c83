export type FlagValue = string | boolean

export type ParsedArguments = {
  command: string | null
  flags: Record<string, FlagValue>
  positional: string[]
}

/**
 * Parses command-line arguments into structured format
 *
 * - `--flag` is `true`, `--flag=value` is the string
 * - `-f value` takes the next argument unless it starts with `-`
 * - `-abc` sets three boolean flags
 * - everything after `--` is positional
 */
export class ArgumentParser {
  static parse(args: string[]): ParsedArguments {
    if (args.length === 0) {
      return { command: null, flags: {}, positional: [] }
    }

    const command = args[0]
    const flags: Record<string, FlagValue> = {}
    const positional: string[] = []
    let i = 1

    while (i < args.length) {
      const arg = args[i]
      if (arg === '--') {
        positional.push(...args.slice(i + 1))
        break
      }
      if (arg.startsWith('--')) {
        const flagMatch = arg.match(/^--([^=]+)(?:=(.*))?$/)
        if (flagMatch) {
          const [, flagName, value] = flagMatch
          flags[this._normalizeFlagName(flagName)] = value ?? true
        }
        i++
      } else if (arg.startsWith('-') && arg.length > 1) {
        const shortFlags = arg.slice(1)
        if (shortFlags.length === 1) {
          if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
            flags[shortFlags] = args[i + 1]
            i += 2
          } else {
            flags[shortFlags] = true
            i++
          }
        } else {
          for (const flag of shortFlags) {
            flags[flag] = true
          }
          i++
        }
      } else {
        positional.push(arg)
        i++
      }
    }

    return { command, flags, positional }
  }

  /**
   * kebab-case to camelCase
   */
  private static _normalizeFlagName(name: string): string {
    return name.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase())
  }

  /**
   * The string value of a flag; `undefined` when absent or given bare.
   */
  static stringFlag(flags: Record<string, FlagValue>, name: string): string | undefined {
    const value = flags[name]
    return typeof value === 'string' ? value : undefined
  }
}
