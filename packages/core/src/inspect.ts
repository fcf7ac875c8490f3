import util, {type InspectOptions} from 'node-inspect-extracted'

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block so it is installed once, on the prototype.
 *
 * `fn` returns a format string plus params for `util.formatWithOptions`.
 *
 * ```typescript
 * class CommandNode {
 *   static {
 *     Inspect(this, (self) => ({ format: "CommandNode( %s )", params: [self.pathString] }));
 *   }
 * }
 * ```
 */
export function Inspect<T>(
  cls: { prototype: T },
  fn: (self: T, options: InspectOptions) => { format: string; params: readonly unknown[] },
): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function (this: T, depth: number | undefined, options: InspectOptions): string {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}
