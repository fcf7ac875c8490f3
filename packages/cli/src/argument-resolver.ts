/**
 * ArgumentResolver — binds raw tokens to a handler's declared parameters.
 *
 * Three forms, read left to right:
 *   --name=value   binds name (value may be empty or contain "=")
 *   --name value   binds name to the next token, whatever it looks like
 *   value          binds the first parameter not bound yet, by either form
 *
 * A parameter bound twice keeps the later binding. Positional tokens never
 * overwrite: once every parameter is bound, another positional is an error.
 */

import {
  ErrInvalidOption,
  ErrMissingArgument,
  ErrMissingValue,
  ErrUnexpectedArgument,
  ErrUnknownArgument,
} from './errors.js'
import type { ParamSpec, ResolvedArguments } from './params.js'

type OptionToken =
  | { kind: 'inline'; name: string; value: string }
  | { kind: 'separate'; name: string }

function readOption(token: string): OptionToken | null {
  if (!token.startsWith('--')) return null
  const body = token.slice(2)
  const eq = body.indexOf('=')
  const name = eq === -1 ? body : body.slice(0, eq)
  if (name.length === 0) {
    throw ErrInvalidOption.create({ token })
  }
  return eq === -1 ? { kind: 'separate', name } : { kind: 'inline', name, value: body.slice(eq + 1) }
}

export function resolveArguments(params: readonly ParamSpec[], tokens: readonly string[]): ResolvedArguments {
  const known = new Set(params.map((p) => p.name))
  const bound = new Map<string, string>()

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    const option = readOption(token)

    if (option) {
      if (!known.has(option.name)) {
        throw ErrUnknownArgument.create({ argument: option.name })
      }
      if (option.kind === 'inline') {
        bound.set(option.name, option.value)
        continue
      }
      if (i + 1 >= tokens.length) {
        throw ErrMissingValue.create({ argument: option.name })
      }
      bound.set(option.name, tokens[++i])
      continue
    }

    const slot = params.find((p) => !bound.has(p.name))
    if (!slot) {
      throw ErrUnexpectedArgument.create({ value: token })
    }
    bound.set(slot.name, token)
  }

  const entries: [string, string][] = []
  for (const param of params) {
    const value = bound.get(param.name) ?? param.default
    if (value !== undefined) {
      entries.push([param.name, value])
    } else if (param.required) {
      throw ErrMissingArgument.create({ argument: param.name })
    }
  }
  // fromEntries defines own properties, so a parameter called "__proto__" stays data
  return Object.freeze(Object.fromEntries(entries))
}
