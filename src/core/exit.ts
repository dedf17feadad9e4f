/**
 * Process-facing wrappers. Everything else in the core is free of process side effects.
 */

import type { Grammar, ParseOutcome, RawArg } from '@/types';
import type { FlagsError } from './errors';
import { parseArgs } from './matcher';

/**
 * Print the error (help to stdout, failures to stderr) and return the exit code to use.
 */
export function reportError(error: FlagsError): number {
  if (error.isHelp()) {
    console.log(error.message);
  } else {
    console.error(error.message);
  }
  return error.exitCode;
}

/**
 * Print the error and exit: code 0 for help requests, 2 for parse failures.
 */
export function exitWithError(error: FlagsError): never {
  process.exit(reportError(error));
}

/**
 * Parse the process arguments (without the program name), exiting on errors and help requests.
 */
export function parseOrExit(
  grammar: Grammar,
  args: readonly RawArg[] = process.argv.slice(2),
): ParseOutcome {
  const result = parseArgs(grammar, args);
  if (!result.ok) {
    exitWithError(result.error);
  }
  return result.outcome;
}
