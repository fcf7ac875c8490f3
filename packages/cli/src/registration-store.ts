/**
 * RegistrationStore — ordered command records, before any tree exists.
 *
 * Records are only accumulated here. Duplicate paths are allowed to coexist
 * until the tree is built, which is where they are rejected; that way a
 * clash between a group and its parent fails the same way as a clash within
 * one store.
 */

import type { BivariantFunction } from '@treecli/core'
import { CommandPath } from './command-path.js'
import { ErrRegistrationClosed } from './errors.js'
import {
  normalizeHints,
  normalizeParams,
  type CompletionHints,
  type ParamDecl,
  type ParamSpec,
} from './params.js'

export interface CommandRecord {
  readonly path: CommandPath
  readonly params: readonly ParamSpec[]
  readonly help?: string
  /** Parameter name → suggestions, in the order the author gave them. */
  readonly completions: ReadonlyMap<string, readonly string[]>
  /** Called with the resolved arguments of `params`. */
  readonly handler: BivariantFunction<unknown>
}

export interface CommandSpec {
  readonly params?: readonly ParamDecl[]
  readonly help?: string
  readonly completions?: CompletionHints
}

export class RegistrationStore {
  private readonly entries: CommandRecord[] = []
  private readonly byPath = new Map<string, CommandRecord>()
  private sealedBy: string | null = null

  register(path: string, spec: CommandSpec, handler: BivariantFunction<unknown>): CommandRecord {
    const parsed = CommandPath.parse(path)
    const key = CommandPath.format(parsed)
    this.assertOpen(key)

    const params = normalizeParams(key, spec.params ?? [])
    const record: CommandRecord = Object.freeze({
      path: parsed,
      params,
      ...(spec.help !== undefined ? { help: spec.help } : {}),
      completions: normalizeHints(key, params, spec.completions),
      handler,
    })
    this.add(key, record)
    return record
  }

  /**
   * Copy every record of `other`, re-rooted under `prefix` when one is given.
   * `other` is sealed afterwards: its records now belong to this store.
   */
  merge(other: RegistrationStore, prefix?: string): void {
    const base = prefix === undefined ? undefined : CommandPath.parse(prefix)
    for (const record of other.records()) {
      const path = CommandPath.rebase(record.path, base)
      const key = CommandPath.format(path)
      this.assertOpen(key)
      this.add(key, Object.freeze({ ...record, path }))
    }
    other.seal('a merge into another store')
  }

  /** First record registered at exactly this path. */
  lookup(path: string | CommandPath): CommandRecord | undefined {
    const parsed = typeof path === 'string' ? CommandPath.parse(path) : path
    return this.byPath.get(CommandPath.format(parsed))
  }

  records(): readonly CommandRecord[] {
    return this.entries
  }

  get size(): number {
    return this.entries.length
  }

  /** Refuse further registrations; `owner` names what consumed the records. */
  seal(owner: string): void {
    this.sealedBy ??= owner
  }

  get sealed(): boolean {
    return this.sealedBy !== null
  }

  private add(key: string, record: CommandRecord): void {
    this.entries.push(record)
    if (!this.byPath.has(key)) this.byPath.set(key, record)
  }

  private assertOpen(path: string): void {
    if (this.sealedBy !== null) {
      throw ErrRegistrationClosed.create({ path }, `closed by ${this.sealedBy}`)
    }
  }
}
