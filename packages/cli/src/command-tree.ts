/**
 * CommandTree — one node per path segment, built once from the records.
 *
 * Intermediate segments exist even when nothing is registered at them
 * ("config" in "config/set"); such nodes carry no record and cannot be
 * invoked. Children keep first-insertion order, which is the order the
 * completion script offers them in.
 */

import { Inspect } from '@treecli/core'
import { CommandPath } from './command-path.js'
import { ErrRegistrationConflict } from './errors.js'
import type { CommandRecord } from './registration-store.js'

export class CommandNode {
  readonly segment: string | null
  readonly path: CommandPath
  readonly parent: CommandNode | null
  #record: CommandRecord | undefined
  readonly #children = new Map<string, CommandNode>()

  static {
    Inspect(this, (self) => ({
      format: 'CommandNode(%s%s, children: [%s])',
      params: [self.isRoot ? '<root>' : self.pathString, self.record ? ' *' : '', self.childNames().join(', ')],
    }))
  }

  private constructor(segment: string | null, parent: CommandNode | null) {
    this.segment = segment
    this.parent = parent
    this.path = parent && segment !== null ? Object.freeze([...parent.path, segment]) : Object.freeze([])
  }

  static root(): CommandNode {
    return new CommandNode(null, null)
  }

  get isRoot(): boolean {
    return this.parent === null
  }

  get pathString(): string {
    return CommandPath.format(this.path)
  }

  get record(): CommandRecord | undefined {
    return this.#record
  }

  child(segment: string): CommandNode | undefined {
    return this.#children.get(segment)
  }

  children(): readonly CommandNode[] {
    return [...this.#children.values()]
  }

  childNames(): readonly string[] {
    return [...this.#children.keys()]
  }

  /** Depth-first, pre-order, children in insertion order. */
  *walk(): Generator<CommandNode> {
    yield this
    for (const child of this.#children.values()) {
      yield* child.walk()
    }
  }

  /** Root first, excluding this node. */
  ancestors(): readonly CommandNode[] {
    const out: CommandNode[] = []
    for (let node = this.parent; node; node = node.parent) out.unshift(node)
    return out
  }

  /** @internal tree construction only */
  ensureChild(segment: string): CommandNode {
    let child = this.#children.get(segment)
    if (!child) {
      child = new CommandNode(segment, this)
      this.#children.set(segment, child)
    }
    return child
  }

  /** @internal tree construction only */
  attach(record: CommandRecord): void {
    if (this.#record) {
      throw ErrRegistrationConflict.create({ path: this.pathString })
    }
    this.#record = record
  }
}

export interface PrefixMatch {
  /** Deepest node reached. */
  readonly node: CommandNode
  /** Tokens that named path segments. */
  readonly consumed: readonly string[]
  /** Everything after the matched path: the raw argument tokens. */
  readonly rest: readonly string[]
}

export class CommandTree {
  private constructor(readonly root: CommandNode) {}

  static build(records: readonly CommandRecord[]): CommandTree {
    const root = CommandNode.root()
    for (const record of records) {
      let node = root
      for (const segment of record.path) {
        node = node.ensureChild(segment)
      }
      node.attach(record)
    }
    return new CommandTree(root)
  }

  /** Longest-prefix match, exact segment equality; stops at the first token that is not a child. */
  resolvePrefix(tokens: readonly string[]): PrefixMatch {
    let node = this.root
    let consumed = 0
    while (consumed < tokens.length) {
      const next = node.child(tokens[consumed])
      if (!next) break
      node = next
      consumed++
    }
    return { node, consumed: tokens.slice(0, consumed), rest: tokens.slice(consumed) }
  }

  /** Node at exactly this path, if the tree has one. */
  find(path: CommandPath): CommandNode | undefined {
    let node: CommandNode | undefined = this.root
    for (const segment of path) {
      node = node.child(segment)
      if (!node) return undefined
    }
    return node
  }

  /** Every node carrying a record, depth-first. */
  *commands(): Generator<CommandNode & { readonly record: CommandRecord }> {
    for (const node of this.root.walk()) {
      if (hasRecord(node)) yield node
    }
  }
}

function hasRecord(node: CommandNode): node is CommandNode & { readonly record: CommandRecord } {
  return node.record !== undefined
}
