/**
 * CLI error boundary — errors owned by registration, routing and binding.
 *
 * BadInput/NotFound errors are the user's: the CLI reports them and exits 1.
 * InvariantViolated errors are the calling program's bugs.
 */

import { BadInput, ErrFacet, InvariantViolated, NotFound, TreeError } from '@treecli/core'

export const CliBoundary = TreeError.boundary('cli')

// ============================================================================
// Facets
// ============================================================================

/** Carries the argument (parameter) name a binding failed on. */
export const HasArgument = ErrFacet.data<{ argument: string }>('HasArgument')

/** Carries the command path; filled in by the dispatcher once a node is matched. */
export const HasCommand = ErrFacet.data<{ command?: string }>('HasCommand')

// ============================================================================
// Configuration & registration
// ============================================================================

export const ErrInvalidConfig = CliBoundary.define('invalid_config', {
  customProps: ErrFacet.props<{ field: string; value: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid ${d.field}: "${d.value}"`,
})

export const ErrInvalidPath = CliBoundary.define('invalid_path', {
  customProps: ErrFacet.props<{ path: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid command path "${d.path}": ${d.reason}`,
})

export const ErrInvalidParams = CliBoundary.define('invalid_params', {
  customProps: ErrFacet.props<{ path: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid parameters for "${d.path}": ${d.reason}`,
})

/** Two records resolve to the same command path. Fatal: the tree is ill-defined. */
export const ErrRegistrationConflict = CliBoundary.define('registration_conflict', {
  customProps: ErrFacet.props<{ path: string }>(),
  facets: [BadInput],
  message: (d) => `Command "${d.path}" is registered more than once`,
})

export const ErrRegistrationClosed = CliBoundary.define('registration_closed', {
  customProps: ErrFacet.props<{ path: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Cannot register "${d.path}": registration is closed`,
})

/** The process harness could not read its own leading flags. */
export const ErrInvalidHarnessFlags = CliBoundary.define('invalid_harness_flags', {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid harness flags: ${d.reason}`,
})

// ============================================================================
// Routing
// ============================================================================

/** No invocable command at the longest matched path. */
export const ErrUnknownCommand = CliBoundary.define('unknown_command', {
  customProps: ErrFacet.props<{ command: string; matched: string; available: string[] }>(),
  facets: [NotFound],
  message: (d) => `Unknown command: ${d.command}`,
})

// ============================================================================
// Binding
// ============================================================================

export const ErrMissingArgument = CliBoundary.define('missing_argument', {
  facets: [BadInput, HasArgument, HasCommand],
  message: (d) => `Missing required argument: ${d.argument}`,
})

export const ErrMissingValue = CliBoundary.define('missing_value', {
  facets: [BadInput, HasArgument, HasCommand],
  message: (d) => `Option --${d.argument} expects a value`,
})

export const ErrUnknownArgument = CliBoundary.define('unknown_argument', {
  facets: [BadInput, HasArgument, HasCommand],
  message: (d) => `Unknown argument: --${d.argument}`,
})

export const ErrUnexpectedArgument = CliBoundary.define('unexpected_argument', {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [BadInput, HasCommand],
  message: (d) => `Unexpected argument: ${d.value}`,
})

export const ErrInvalidOption = CliBoundary.define('invalid_option', {
  customProps: ErrFacet.props<{ token: string }>(),
  facets: [BadInput, HasCommand],
  message: (d) => `Invalid option token: ${d.token}`,
})
