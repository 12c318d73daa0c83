const DEBUG_ENABLED = (): boolean =>
  process.env.TINYGIT_DEBUG === '1' || process.env.TINYGIT_DEBUG === 'true'

/**
 * Diagnostic trace on stderr, enabled with `TINYGIT_DEBUG=1`.
 */
export const debug = (scope: string, message: string, ...extra: unknown[]): void => {
  if (!DEBUG_ENABLED()) return
  console.error(`[tinygit:${scope}] ${message}`, ...extra)
}
