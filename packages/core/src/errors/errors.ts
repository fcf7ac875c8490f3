/**
 * Standard facets shared by every boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 */

import {ErrFacet} from "../tree-error.js";

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal invariant violated — always a bug in the calling program */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");
