/**
 * Dispatcher — argv in, exactly one outcome out.
 *
 * `--completion` as the whole argv yields the completion script. Otherwise
 * the longest matching path is found, the leftover tokens are bound to its
 * parameters and its handler is awaited. Errors from the handler itself are
 * not touched.
 */

import { TreeError, type DebugLogger } from '@treecli/core'
import { resolveArguments } from './argument-resolver.js'
import type { CommandNode, CommandTree } from './command-tree.js'
import { synthesizeBashCompletion } from './completion/bash-completion.js'
import { ErrUnknownCommand, HasCommand } from './errors.js'
import type { ResolvedArguments } from './params.js'
import type { CommandRecord } from './registration-store.js'

export const COMPLETION_FLAG = '--completion'
export const HELP_FLAG = '--help'

export type DispatchOutcome =
  | { readonly kind: 'completion'; readonly script: string }
  | { readonly kind: 'help'; readonly node: CommandNode }
  | { readonly kind: 'invoked'; readonly node: CommandNode; readonly args: ResolvedArguments; readonly result: unknown }

export interface DispatcherOptions {
  programName: string
  logger: DebugLogger
}

/** `--help` alone after a path, unless the command takes a parameter called "help". */
function isHelpRequest(rest: readonly string[], record: CommandRecord | undefined): boolean {
  if (rest.length !== 1 || rest[0] !== HELP_FLAG) return false
  return !record?.params.some((p) => p.name === 'help')
}

export class Dispatcher {
  private readonly log: DebugLogger

  constructor(
    private readonly tree: CommandTree,
    private readonly opts: DispatcherOptions,
  ) {
    this.log = opts.logger.child('dispatch')
  }

  async dispatch(argv: readonly string[]): Promise<DispatchOutcome> {
    if (argv.length === 1 && argv[0] === COMPLETION_FLAG) {
      this.log.log('completion requested')
      return { kind: 'completion', script: synthesizeBashCompletion(this.tree, this.opts.programName) }
    }

    if (argv.length === 0) {
      return { kind: 'help', node: this.tree.root }
    }

    const { node, consumed, rest } = this.tree.resolvePrefix(argv)
    this.log.log('matched %s, leftover %O', node.pathString || '<root>', rest)

    if (isHelpRequest(rest, node.record)) {
      return { kind: 'help', node }
    }

    const record = node.record
    if (!record) {
      const typed = rest.length > 0 ? [...consumed, rest[0]] : consumed
      throw ErrUnknownCommand.create({
        command: typed.join(' '),
        matched: node.pathString,
        available: [...node.childNames()],
      })
    }

    let args: ResolvedArguments
    try {
      args = resolveArguments(record.params, rest)
    } catch (err) {
      if (TreeError.has(err, HasCommand)) {
        TreeError.enrich(err, HasCommand, { command: node.pathString })
      }
      throw err
    }
    this.log.log('invoking %s with %O', node.pathString, args)

    const result: unknown = await record.handler(args)
    return { kind: 'invoked', node, args, result }
  }
}
