/**
 * Shared ANSI color utilities with TTY detection.
 * Colors are off when not writing to a TTY, when NO_COLOR is set, or after disableColor().
 */

let colorDisabled = false;

/** Turn colors off for the rest of the process (the --no-color switch). */
export function disableColor(): void {
  colorDisabled = true;
}

/**
 * Determines if color output should be used.
 * Evaluated lazily to allow tests to control via environment variables.
 * @internal Exported for testing
 */
export function shouldUseColor(): boolean {
  return Boolean(process.stdout.isTTY && !process.env.NO_COLOR && !colorDisabled);
}

const green = (s: string) => (shouldUseColor() ? `\x1b[32m${s}\x1b[0m` : s);
const yellow = (s: string) => (shouldUseColor() ? `\x1b[33m${s}\x1b[0m` : s);
const cyan = (s: string) => (shouldUseColor() ? `\x1b[36m${s}\x1b[0m` : s);
const red = (s: string) => (shouldUseColor() ? `\x1b[31m${s}\x1b[0m` : s);
const dim = (s: string) => (shouldUseColor() ? `\x1b[2m${s}\x1b[0m` : s);
const bold = (s: string) => (shouldUseColor() ? `\x1b[1m${s}\x1b[0m` : s);

/**
 * Color object for convenient grouped access.
 */
export const colors = {
  green,
  yellow,
  cyan,
  red,
  dim,
  bold,
};
