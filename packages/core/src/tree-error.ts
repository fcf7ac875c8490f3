/**
 * TreeError - errors described by facets and owned by a boundary.
 *
 * A facet is either a marker ("this is bad input") or a typed slot of data
 * ("this happened at command X"). A boundary names a layer: every error it
 * defines gets a `<domain>.<code>` code, and `boundary.is(err)` tells that
 * layer its own errors apart from anything else that was thrown.
 *
 *   const Cli = TreeError.boundary("cli")
 *   const ErrMissing = Cli.define("missing", { facets: [BadInput, HasArgument], message: (d) => ... })
 *   if (TreeError.has(err, BadInput)) ...
 */

import {StaticTypeCompanion} from "./companion.js";
import {UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// -- Facets -------------------------------------------------------------------

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Data an error carries beyond its facets; type-only. */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};
/** `& {}` keeps the merged data usable as a plain object while `Fs` is still generic. */
export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<FacetProps<Fs[number]>> & {};

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    const facet: ErrDataFacet<TData> = { kind: "data", name };
    return Object.freeze(facet);
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// -- Definitions --------------------------------------------------------------

export interface ErrorDef<Fs extends readonly ErrFacetAny[], D extends Record<string, unknown>> {
  readonly code: string;
  /** `context` is appended to the message: "Cannot register x — closed by y". */
  create(data: MergeFacetProps<Fs> & D, context?: string): TreeError<Fs>;
  is(err: unknown): err is TreeError<Fs> & { readonly data: MergeFacetProps<Fs> & D };
}

export interface ErrorBoundary {
  readonly domain: string;
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  is(err: unknown): err is TreeError;
}

// -- The error ----------------------------------------------------------------

const UNKNOWN = "unknown";

export class TreeError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;

  static {
    Inspect(this, (self, opts) => ({
      format: "%s",
      params: [self.prettyPrint({ color: opts.colors, includeStackTrace: true })],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: MergeFacetProps<Fs>,
  ) {
    super(message);
    this.name = `TreeError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.facetNames = facetNames;
    this.data = data;
  }

  /**
   * One headline, then one line per data field:
   *
   *   error[cli.missing_argument]: Missing required argument: value
   *     argument: value
   *     command: config/set
   */
  prettyPrint(opts: { color?: boolean; includeStackTrace?: boolean } = {}): string {
    const paint = (code: string) => (text: string) => (opts.color ? `\x1b[${code}m${text}\x1b[0m` : text);
    const red = paint("31");
    const dim = paint("2");

    const lines = [`${red(`error[${this.code}]`)}: ${this.message}`];
    const fields: [string, unknown][] = Object.entries(this.data);
    for (const [key, value] of fields) {
      if (value === undefined) continue;
      lines.push(`  ${dim(`${key}:`)} ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
    if (opts.includeStackTrace) {
      for (const frame of stackFrames(this.stack)) lines.push(dim(frame));
    }
    return lines.join("\n");
  }

  // -- Statics ----------------------------------------------------------------

  static boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },
      is(err: unknown): err is TreeError {
        return err instanceof TreeError && err.domain === domain;
      },
    };
  }

  /** For a data facet, narrows `err.data` to carry its fields. */
  static has<F extends ErrFacetAny>(err: unknown, facet: F): err is TreeError & { readonly data: FacetProps<F> } {
    return err instanceof TreeError && err.facetNames.has(facet.name);
  }

  /** Fill in facet data a lower layer could not know; mutates `err.data`. */
  static enrich<F extends ErrDataFacet>(
    err: TreeError & { readonly data: FacetProps<F> },
    _facet: F,
    partialData: Partial<FacetProps<F>>,
  ): void {
    Object.assign(err.data, partialData);
  }

  /** Anything thrown, as a TreeError; the original stack is kept. */
  static wrap(thrown: unknown): TreeError {
    if (thrown instanceof TreeError) return thrown;
    const message = thrown instanceof Error ? thrown.message : String(thrown);
    const wrapped = new TreeError<readonly ErrFacetAny[]>(UNKNOWN, UNKNOWN, message, new Set<string>(), {});
    if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
    return wrapped;
  }
}

/** The "    at ..." lines of a stack, without the message. */
function stackFrames(stack: string | undefined): string[] {
  return (stack ?? "").split("\n").filter((line) => line.trimStart().startsWith("at "));
}

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown>>(
  code: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames: ReadonlySet<string> = new Set(opts.facets.map((f) => f.name));

  function create(data: MergeFacetProps<Fs> & D, context?: string): TreeError<Fs> {
    const message = opts.message(data);
    const err = new TreeError<Fs>(code, domain, context ? `${message} — ${context}` : message, facetNames, { ...data });
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    create,
    is(err: unknown): err is TreeError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof TreeError && err.code === code;
    },
  });
}
