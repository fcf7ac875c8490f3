/**
 * Marks an object as the companion of a type of the same name, e.g. the
 * `TreeError` interface and the `TreeError` object holding its statics.
 * Identity at runtime.
 */
export function StaticTypeCompanion<const Companion>(companion: Companion): Companion {
  return companion
}
