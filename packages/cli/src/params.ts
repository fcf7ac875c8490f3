/**
 * Parameter declarations.
 *
 * Handlers declare their parameters explicitly, in positional order. A bare
 * string is a required parameter; the object form can make it optional
 * and give it a default. The declaration list types the handler's argument
 * object, so `args.name` is a `string` only when it is guaranteed to be bound.
 */

import { NAME_PATTERN } from './command-path.js'
import { ErrInvalidParams } from './errors.js'

export interface ParamOptions<N extends string = string> {
  readonly name: N
  readonly optional?: boolean
  /** Implies optional. */
  readonly default?: string
  readonly help?: string
}

export type ParamDecl<N extends string = string> = N | ParamOptions<N>

/** Normalised parameter, as stored on a command record. */
export interface ParamSpec {
  readonly name: string
  readonly required: boolean
  readonly default?: string
  readonly help?: string
}

/** Name → value, one entry per bound parameter, in declaration order. */
export type ResolvedArguments = Readonly<Record<string, string>>

/** Ordered suggestion values per parameter name. */
export type CompletionHints<Names extends string = string> = { readonly [K in Names]?: readonly string[] }

// ============================================================================
// Type-level inference
// ============================================================================

export type ParamName<D> = D extends string ? D : D extends ParamOptions<infer N> ? N : never

/** A parameter is always present when it is required or has a default. */
type AlwaysBound<D> = D extends string
  ? true
  : D extends { readonly default: string }
    ? true
    : D extends { readonly optional: true }
      ? false
      : true

/** The argument object a handler declared with `Ps` receives. */
export type ArgsOf<Ps extends readonly ParamDecl[]> = {
  readonly [D in Ps[number] as AlwaysBound<D> extends true ? ParamName<D> : never]: string
} & {
  readonly [D in Ps[number] as AlwaysBound<D> extends true ? never : ParamName<D>]?: string
}

// ============================================================================
// Normalisation
// ============================================================================

export function normalizeParams(path: string, decls: readonly ParamDecl[]): readonly ParamSpec[] {
  const seen = new Set<string>()
  let sawOptional = false

  const specs = decls.map((decl): ParamSpec => {
    const spec: ParamSpec = typeof decl === 'string'
      ? { name: decl, required: true }
      : {
          name: decl.name,
          required: !(decl.optional === true || decl.default !== undefined),
          ...(decl.default !== undefined ? { default: decl.default } : {}),
          ...(decl.help !== undefined ? { help: decl.help } : {}),
        }

    if (!NAME_PATTERN.test(spec.name)) {
      throw ErrInvalidParams.create({ path, reason: `"${spec.name}" is not a valid parameter name` })
    }
    if (seen.has(spec.name)) {
      throw ErrInvalidParams.create({ path, reason: `parameter "${spec.name}" is declared twice` })
    }
    if (spec.required && sawOptional) {
      throw ErrInvalidParams.create({ path, reason: `required parameter "${spec.name}" follows an optional one` })
    }
    seen.add(spec.name)
    sawOptional ||= !spec.required
    return Object.freeze(spec)
  })

  return Object.freeze(specs)
}

/** Copy hints into an insertion-ordered map, rejecting names that are not parameters. */
export function normalizeHints(
  path: string,
  params: readonly ParamSpec[],
  hints: CompletionHints | undefined,
): ReadonlyMap<string, readonly string[]> {
  const out = new Map<string, readonly string[]>()
  if (!hints) return out
  for (const [name, values] of Object.entries(hints)) {
    if (values === undefined) continue
    if (!params.some((p) => p.name === name)) {
      throw ErrInvalidParams.create({ path, reason: `completion hints given for unknown parameter "${name}"` })
    }
    out.set(name, Object.freeze([...values]))
  }
  return out
}
