/**
 * @treecli/core - Error system and small shared utilities for treecli
 */

// Errors
export { TreeError, ErrFacet } from "./tree-error.js";
export type {
  ErrorDef,
  ErrorBoundary,
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  FacetProps,
  MergeFacetProps,
} from "./tree-error.js";
export { NotFound, BadInput, InvariantViolated } from "./errors/errors.js";

// Utilities
export { StaticTypeCompanion } from "./companion.js";
export type { UnionToIntersection, BivariantFunction } from "./type-system-utils.js";
export { Inspect, inspect } from "./inspect.js";
export { Lazy } from "./lazy.js";
export type { LazyOne } from "./lazy.js";
export { Fmt } from "./fmt.js";

// Logging
export { createDebugLogger } from "./debug-log.js";
export type { DebugLogger, LineSink } from "./debug-log.js";
