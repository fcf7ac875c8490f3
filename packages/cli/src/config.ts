import { NAME_PATTERN } from './command-path.js'
import { ErrInvalidConfig } from './errors.js'

type Env = Readonly<Record<string, string | undefined>>

function envFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

/** NO_COLOR wins over FORCE_COLOR; otherwise colour only on a terminal. */
function detectColor(env: Env, isTTY: boolean): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false
  if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== '0'
  return isTTY
}

/** `my-tool` → `MY_TOOL_DEBUG` */
export function debugEnvVar(name: string): string {
  return `${name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_DEBUG`
}

export class CliConfig {
  readonly name: string // Program name: usage lines and the completion script
  readonly description: string
  readonly useColor: boolean
  readonly debug: boolean // Dispatch tracing on stderr

  constructor(opts: {
    name?: string
    description?: string
    useColor?: boolean
    debug?: boolean
    env?: Env
    isTTY?: boolean
  } = {}) {
    const env = opts.env ?? process.env

    this.name = opts.name ?? 'cli'
    if (!NAME_PATTERN.test(this.name)) {
      throw ErrInvalidConfig.create({ field: 'program name', value: this.name })
    }

    this.description = opts.description ?? ''

    this.useColor = opts.useColor ?? detectColor(env, opts.isTTY ?? process.stdout.isTTY === true)

    this.debug = opts.debug ?? envFlag(env[debugEnvVar(this.name)])
  }
}
