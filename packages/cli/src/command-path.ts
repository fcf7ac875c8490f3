/**
 * CommandPath — the parsed form of "/my_command/subcommand".
 *
 * Segments and parameter names share one alphabet so the completion
 * script can embed them unquoted.
 */

import { StaticTypeCompanion } from '@treecli/core'
import { ErrInvalidPath } from './errors.js'

export type CommandPath = readonly string[]

export const NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/

export const CommandPath = StaticTypeCompanion({
  /** Split on "/", dropping empty segments; so "/a//b/" is ["a", "b"]. */
  parse(path: string): CommandPath {
    const segments = path.split('/').filter((s) => s.length > 0)
    if (segments.length === 0) {
      throw ErrInvalidPath.create({ path, reason: 'a command path needs at least one segment' })
    }
    for (const segment of segments) {
      if (!NAME_PATTERN.test(segment)) {
        throw ErrInvalidPath.create({ path, reason: `segment "${segment}" may only use letters, digits, "_", "." and "-"` })
      }
    }
    return Object.freeze(segments)
  },

  /** Prepend a prefix path; an absent or empty prefix returns the path unchanged. */
  rebase(path: CommandPath, prefix: CommandPath | undefined): CommandPath {
    if (!prefix || prefix.length === 0) return path
    return Object.freeze([...prefix, ...path])
  },

  /** "greet/loudly" — the form used in messages and as a lookup key. */
  format(path: CommandPath): string {
    return path.join('/')
  },
})
