/**
 * Usage and help text for a command node.
 *
 *   Usage: tool greet <name> [<greeting>]
 *
 *   Say hello.
 *
 *   Arguments:
 *     name       who to greet
 *     greeting   (default: hello)
 */

import type { Fmt } from '@treecli/core'
import type { CommandNode } from './command-tree.js'
import type { ParamSpec } from './params.js'

export function usageLine(programName: string, node: CommandNode): string {
  const parts = [programName, ...node.path]
  if (node.record) {
    for (const param of node.record.params) {
      parts.push(param.required ? `<${param.name}>` : `[<${param.name}>]`)
    }
  }
  if (node.children().length > 0) {
    parts.push(node.record ? '[<command>]' : '<command>')
  }
  return parts.join(' ')
}

function describeParam(param: ParamSpec): string {
  const notes = [param.help ?? '']
  if (param.default !== undefined) notes.push(`(default: ${param.default})`)
  else if (!param.required) notes.push('(optional)')
  return notes.join(' ').trim()
}

function describeChild(child: CommandNode): string {
  if (child.record?.help) return child.record.help.split('\n')[0]
  return child.record ? '' : `(${child.children().length} subcommands)`
}

function table(rows: readonly (readonly [string, string])[]): string[] {
  const width = Math.max(...rows.map(([name]) => name.length))
  return rows.map(([name, text]) => `  ${name.padEnd(width)}  ${text}`.trimEnd())
}

export function renderHelp(opts: {
  programName: string
  description?: string
  node: CommandNode
  fmt: Fmt
}): string {
  const { node, fmt } = opts
  const lines = [`${fmt.bold('Usage:')} ${usageLine(opts.programName, node)}`]

  const about = node.isRoot ? opts.description : node.record?.help
  if (about) lines.push('', about)

  const params = node.record?.params ?? []
  if (params.length > 0) {
    lines.push('', fmt.bold('Arguments:'), ...table(params.map((p): [string, string] => [p.name, describeParam(p)])))
    lines.push('', fmt.dim('Arguments may also be given as --name=value or --name value.'))
  }

  const children = node.children()
  if (children.length > 0) {
    lines.push('', fmt.bold('Commands:'), ...table(children.map((c): [string, string] => [c.segment ?? '', describeChild(c)])))
  }

  return lines.join('\n')
}
