/**
 * CLI — registration facade and the execute() boundary.
 *
 * Commands are registered on a CLI or on a CLIGroup; a group is merged into
 * its parent with include(). The command tree is built on first use and the
 * registrations are closed from then on. execute() turns the user's mistakes
 * (unknown command, bad arguments) into a CliResponse with exit code 1; any
 * other error, including whatever a handler throws, propagates.
 *
 * This file is pure logic. Process-level concerns live in main.ts.
 */

import { BadInput, Fmt, Lazy, NotFound, TreeError, createDebugLogger } from '@treecli/core'
import { CommandPath } from './command-path.js'
import { CommandTree, type CommandNode } from './command-tree.js'
import { synthesizeBashCompletion } from './completion/bash-completion.js'
import { CliConfig } from './config.js'
import { Dispatcher } from './dispatcher.js'
import { CliBoundary, ErrRegistrationConflict, ErrUnknownCommand, HasCommand } from './errors.js'
import type { ArgsOf, CompletionHints, ParamDecl, ParamName } from './params.js'
import { RegistrationStore } from './registration-store.js'
import type { CliRequest, CliResponse } from './types.js'
import { renderHelp } from './usage.js'

export interface TypedCommandSpec<Ps extends readonly ParamDecl[]> {
  /** Positional order; each may also be passed as --name=value or --name value. */
  readonly params?: Ps
  readonly help?: string
  readonly completions?: CompletionHints<ParamName<Ps[number]>>
}

export type TypedHandler<Ps extends readonly ParamDecl[]> = (args: ArgsOf<Ps>) => unknown

// ============================================================================
// CLIGroup
// ============================================================================

/** A bundle of commands defined apart from the CLI and merged in with include(). */
export class CLIGroup {
  readonly name: string
  readonly description: string
  readonly store = new RegistrationStore()

  constructor(opts: { name: string; description?: string }) {
    this.name = opts.name
    this.description = opts.description ?? ''
  }

  command<const Ps extends readonly ParamDecl[] = readonly []>(
    path: string,
    spec: TypedCommandSpec<Ps>,
    handler: TypedHandler<Ps>,
  ): this {
    this.store.register(path, spec, handler)
    return this
  }
}

// ============================================================================
// CLI
// ============================================================================

export class CLI {
  private readonly store = new RegistrationStore()

  constructor(public cfg: CliConfig = new CliConfig()) {}

  private readonly built = Lazy.once(() => {
    this.store.seal(`the command tree of ${this.cfg.name}`)
    return CommandTree.build(this.store.records())
  })

  command<const Ps extends readonly ParamDecl[] = readonly []>(
    path: string,
    spec: TypedCommandSpec<Ps>,
    handler: TypedHandler<Ps>,
  ): this {
    this.store.register(path, spec, handler)
    return this
  }

  /** Merge a group's commands, under `prefix` when given. The group is closed afterwards. */
  include(group: CLIGroup, opts: { prefix?: string } = {}): this {
    this.store.merge(group.store, opts.prefix)
    return this
  }

  /** Built on first access; throws cli.registration_conflict if two commands share a path. */
  get tree(): CommandTree {
    return this.built.get
  }

  completionScript(): string {
    return synthesizeBashCompletion(this.tree, this.cfg.name)
  }

  // -- Dispatch --------------------------------------------------------------

  async execute(req: CliRequest): Promise<CliResponse> {
    const fmt = Fmt.from(req.color ?? this.cfg.useColor)
    const logger = createDebugLogger({ scope: this.cfg.name, enabled: req.debug ?? this.cfg.debug })
    // Outside the try: a conflicting tree is fatal, not a user error
    const dispatcher = new Dispatcher(this.tree, { programName: this.cfg.name, logger })

    try {
      const outcome = await dispatcher.dispatch(req.argv)
      switch (outcome.kind) {
        case 'completion':
          return { exitCode: 0, stdout: outcome.script }
        case 'help':
          return { exitCode: 0, stdout: this.help(outcome.node, fmt) + '\n' }
        case 'invoked':
          return typeof outcome.result === 'string'
            ? { exitCode: 0, stdout: withTrailingNewline(outcome.result) }
            : { exitCode: 0 }
      }
    } catch (err) {
      if (isUserError(err)) {
        return { exitCode: 1, stderr: this.describeFailure(err, fmt) }
      }
      throw err
    }
  }

  private help(node: CommandNode, fmt: Fmt): string {
    return renderHelp({ programName: this.cfg.name, description: this.cfg.description, node, fmt })
  }

  private describeFailure(err: TreeError, fmt: Fmt): string {
    const lines = [`${fmt.red('Error:')} ${err.message}`]
    const node = this.nodeFor(err)
    if (node) lines.push('', this.help(node, fmt))
    return lines.join('\n') + '\n'
  }

  /** The node a user error happened at, for showing its help. */
  private nodeFor(err: TreeError): CommandNode | undefined {
    if (ErrUnknownCommand.is(err)) {
      return this.tree.find(splitPath(err.data.matched))
    }
    if (TreeError.has(err, HasCommand) && err.data.command !== undefined) {
      return this.tree.find(splitPath(err.data.command))
    }
    return undefined
  }
}

function isUserError(err: unknown): err is TreeError {
  return CliBoundary.is(err)
    && !ErrRegistrationConflict.is(err)
    && (TreeError.has(err, BadInput) || TreeError.has(err, NotFound))
}

function splitPath(path: string): CommandPath {
  return path.split('/').filter((s) => s.length > 0)
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') || text.length === 0 ? text : text + '\n'
}
