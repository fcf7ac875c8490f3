/**
 * DebugLogger — opt-in diagnostic lines on stderr.
 *
 * User-facing output never goes through here; it is returned to the harness
 * and written there. A disabled logger does not format its arguments.
 */

import util from 'node-inspect-extracted'

export interface DebugLogger {
  readonly enabled: boolean
  readonly scope: string
  /** printf-style: `log("matched %s with %O", path, args)` */
  log(format: string, ...params: unknown[]): void
  child(scope: string): DebugLogger
}

export type LineSink = (line: string) => void

const stderrSink: LineSink = (line) => {
  process.stderr.write(line + '\n')
}

export function createDebugLogger(opts: { scope: string; enabled: boolean; sink?: LineSink }): DebugLogger {
  const sink = opts.sink ?? stderrSink
  return {
    enabled: opts.enabled,
    scope: opts.scope,
    log(format, ...params) {
      if (!opts.enabled) return
      sink(`[${opts.scope}] ` + util.formatWithOptions({ colors: false, breakLength: Infinity }, format, ...params))
    },
    child(scope) {
      return createDebugLogger({ ...opts, scope: `${opts.scope}:${scope}` })
    },
  }
}
