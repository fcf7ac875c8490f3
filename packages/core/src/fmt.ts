/**
 * Fmt — text formatting interface.
 *
 * Two built-in implementations: ANSI terminal colours and a no-op passthrough.
 * Obtain the right one via Fmt.from(boolean).
 */
import {StaticTypeCompanion} from "./companion.js";

export interface Fmt {
  readonly isColor: boolean
  dim(text: string): string
  bold(text: string): string
  red(text: string): string
  yellow(text: string): string
}

const RESET = "\x1b[0m";

const ansiFmt: Fmt = {
  isColor: true,
  dim(text) { return `\x1b[2m${text}${RESET}` },
  bold(text) { return `\x1b[1m${text}${RESET}` },
  red(text) { return `\x1b[31m${text}${RESET}` },
  yellow(text) { return `\x1b[33m${text}${RESET}` },
}

const noopFmt: Fmt = {
  isColor: false,
  dim: (t) => t,
  bold: (t) => t,
  red: (t) => t,
  yellow: (t) => t,
}

export const Fmt = StaticTypeCompanion({
  ansi: ansiFmt,
  noop: noopFmt,
  from(color: boolean): Fmt {
    return color ? ansiFmt : noopFmt
  },
})
