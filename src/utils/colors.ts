/**
 * ANSI color and formatting codes for CLI output
 * Respects the NO_COLOR environment variable
 */

const ANSI_CODES = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
} as const;

const NO_COLORS = {
  bold: "",
  dim: "",
  reset: "",
  red: "",
  green: "",
  yellow: "",
} as const;

export type ColorCodes = { readonly [K in keyof typeof ANSI_CODES]: string };

/**
 * NO_COLOR standard: if set (any value), disable colors
 */
export function supportsColor(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NO_COLOR === undefined;
}

export function colorsFor(env: NodeJS.ProcessEnv = process.env): ColorCodes {
  return supportsColor(env) ? ANSI_CODES : NO_COLORS;
}

export const COLORS: ColorCodes = colorsFor();
