declare module 'minimisted' {
  type ParsedArgs = {
    _: string[]
    [key: string]: unknown
  }

  type Options = {
    string?: string | string[]
    boolean?: boolean | string | string[]
    alias?: Record<string, string | string[]>
    default?: Record<string, unknown>
    stopEarly?: boolean
    '--'?: boolean
  }

  function minimisted<T extends ParsedArgs>(
    main: (argv: T) => void | Promise<void>,
    opts?: Options,
    argv?: string[]
  ): void

  export = minimisted
}
