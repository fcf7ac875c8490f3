/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;

/**
 * A function that accepts anything and produces a T.
 *
 * Use it where a registry has to hold callbacks whose parameter types differ
 * per entry: a `(args: { name: string }) => void` cannot be stored as a
 * `(args: Record<string, string>) => void` under strict function types, but
 * the registry only ever calls it with the arguments it was declared for.
 */
export type BivariantFunction<T> = (...args: any[]) => T
