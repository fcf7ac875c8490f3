/**
 * @treecli/cli - declarative command trees with Bash completion.
 *
 * ```typescript
 * const cli = new CLI(new CliConfig({ name: 'tool' }))
 * cli.command('/greet', { params: ['name'], completions: { name: ['alice', 'bob'] } },
 *   ({ name }) => `hello ${name}`)
 * await main(cli)
 * ```
 */

export { CLI, CLIGroup } from './cli.js'
export type { TypedCommandSpec, TypedHandler } from './cli.js'
export { CliConfig, debugEnvVar } from './config.js'
export type { CliRequest, CliResponse } from './types.js'
export { main, runMain, parseHarnessArgs, flushWrite } from './main.js'
export type { OutputStream } from './main.js'

export { CommandPath, NAME_PATTERN } from './command-path.js'
export type { ArgsOf, CompletionHints, ParamDecl, ParamName, ParamOptions, ParamSpec, ResolvedArguments } from './params.js'
export { RegistrationStore } from './registration-store.js'
export type { CommandRecord, CommandSpec } from './registration-store.js'
export { CommandTree, CommandNode } from './command-tree.js'
export type { PrefixMatch } from './command-tree.js'
export { resolveArguments } from './argument-resolver.js'
export { Dispatcher, COMPLETION_FLAG, HELP_FLAG } from './dispatcher.js'
export type { DispatchOutcome, DispatcherOptions } from './dispatcher.js'
export { synthesizeBashCompletion, completionFunctionName, shellQuote } from './completion/bash-completion.js'
export { usageLine, renderHelp } from './usage.js'

export {
  CliBoundary,
  HasArgument,
  HasCommand,
  ErrInvalidConfig,
  ErrInvalidHarnessFlags,
  ErrInvalidPath,
  ErrInvalidParams,
  ErrRegistrationConflict,
  ErrRegistrationClosed,
  ErrUnknownCommand,
  ErrMissingArgument,
  ErrMissingValue,
  ErrUnknownArgument,
  ErrUnexpectedArgument,
  ErrInvalidOption,
} from './errors.js'
