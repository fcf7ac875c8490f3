/**
 * CLI harness — process-level entry point.
 *
 * Reads the harness flags that may lead argv (--no-color, --debug), hands
 * everything from the first other token to CLI.execute, writes the response
 * and reports the exit code. The CLI class in cli.ts is pure logic.
 */

import { flag, parseSync } from '@optique/core'
import { object } from '@optique/core/constructs'
import { formatMessage } from '@optique/core/message'
import { withDefault } from '@optique/core/modifiers'

import { TreeError } from '@treecli/core'
import type { CLI } from './cli.js'
import { ErrInvalidHarnessFlags } from './errors.js'
import type { CliRequest } from './types.js'

export interface OutputStream {
  write(chunk: string, callback: (err?: Error | null) => void): boolean
}

/** Write data in 64 KB chunks, awaiting flush on each to avoid truncation when piped. */
export async function flushWrite(stream: OutputStream, data: string): Promise<void> {
  const CHUNK = 65536
  let offset = 0
  while (offset < data.length) {
    const chunk = data.slice(offset, offset + CHUNK)
    offset += CHUNK
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (err) => (err ? reject(err) : resolve()))
    })
  }
}

const HARNESS_FLAGS: ReadonlySet<string> = new Set(['--no-color', '--debug'])

const harnessParser = object({
  noColor: withDefault(flag('--no-color'), false),
  debug: withDefault(flag('--debug'), false),
})

/**
 * Split leading harness flags from the command line proper. Only the leading
 * run of harness flags reaches the parser, so a `--` stays a command token.
 */
export function parseHarnessArgs(argv: readonly string[]): CliRequest {
  let split = 0
  while (split < argv.length && HARNESS_FLAGS.has(argv[split])) split++

  const parsed = parseSync(harnessParser, argv.slice(0, split))
  if (!parsed.success) {
    throw ErrInvalidHarnessFlags.create({ reason: formatMessage(parsed.error) })
  }
  return {
    argv: argv.slice(split),
    ...(parsed.value.noColor ? { color: false } : {}),
    ...(parsed.value.debug ? { debug: true } : {}),
  }
}

/** Run one command line against `cli`; resolves to the process exit code. */
export async function runMain(
  cli: CLI,
  io: { argv?: readonly string[]; stdout?: OutputStream; stderr?: OutputStream } = {},
): Promise<number> {
  const stdout = io.stdout ?? process.stdout
  const stderr = io.stderr ?? process.stderr
  let req: CliRequest
  try {
    req = parseHarnessArgs(io.argv ?? process.argv.slice(2))
  } catch (err) {
    if (!ErrInvalidHarnessFlags.is(err)) throw err
    await flushWrite(stderr, `Error: ${err.message}\n`)
    return 1
  }

  try {
    const response = await cli.execute(req)
    const writes: Promise<void>[] = []
    if (response.stdout) writes.push(flushWrite(stdout, response.stdout))
    if (response.stderr) writes.push(flushWrite(stderr, response.stderr))
    await Promise.all(writes)
    return response.exitCode
  } catch (err) {
    const color = req.color ?? cli.cfg.useColor
    await flushWrite(stderr, TreeError.wrap(err).prettyPrint({ color, includeStackTrace: true }) + '\n')
    return 1
  }
}

/** `main(cli)` at the bottom of a program's entry file. */
export async function main(cli: CLI): Promise<void> {
  process.exitCode = await runMain(cli)
}
