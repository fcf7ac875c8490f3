import {StaticTypeCompanion} from "./companion.js";

/** A value computed on first read of `get`, then cached. */
export interface LazyOne<T> {
  readonly get: T
  /** Whether `get` has been read (and the value computed) yet. */
  readonly resolved: boolean
}

export const Lazy = StaticTypeCompanion({
  once<F>(fn: () => F): LazyOne<F> {
    let done = false
    let value: F
    return {
      get get() {
        if (!done) {
          value = fn()
          done = true
        }
        return value
      },
      get resolved() {
        return done
      },
    }
  },
})
