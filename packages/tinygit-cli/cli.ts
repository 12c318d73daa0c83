#!/usr/bin/env -S node --import tsx
import * as fs from 'node:fs'
import minimisted from 'minimisted'
import { cli } from '@tinygit/tinygit-src'

type CliArgs = {
  _: string[]
  global?: string
  [key: string]: unknown
}

// Only options placed before the command are parsed here; with `stopEarly`
// the command and everything after it reach `cli` untouched.
minimisted(
  async function ({ _: args, global: globalConfigPath }: CliArgs) {
    try {
      const result = await cli(args, { fs, cwd: process.cwd(), globalConfigPath })
      if (result.ok) {
        if (result.output !== '') process.stdout.write(result.output + '\n')
        return
      }
      process.stderr.write(`${result.fatal ? 'fatal' : 'error'}: ${result.message}\n`)
      process.exitCode = result.fatal ? 128 : 1
    } catch (err) {
      // not a tinygit error: an I/O failure or a bug
      process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`)
      if (err instanceof Error && process.env.TINYGIT_DEBUG) console.error(err)
      process.exitCode = 1
    }
  },
  { stopEarly: true, string: ['global'] }
)
