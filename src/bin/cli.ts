import { resolve } from 'node:path';
import { loadConfig } from '@/core/config';
import { reportError } from '@/core/exit';
import { parseArgs } from '@/core/matcher';
import { hasSwitch, leafOutcome } from '@/core/materialize';
import type { RawArg } from '@/types';
import { findCommand } from './commands';
import { cliGrammar } from './flags';
import { disableColor } from './utils/colors';
import { stringSwitch } from './utils/values';

export interface RunOptions {
  /** Base directory for --cwd and relative paths; defaults to process.cwd() */
  cwd?: string;
}

/**
 * Run the CLI and return the exit code. Nothing here calls process.exit.
 */
export function runCli(argv: readonly RawArg[], options: RunOptions = {}): number {
  const result = parseArgs(cliGrammar, argv);
  if (!result.ok) {
    return reportError(result.error);
  }
  const root = result.outcome;

  if (hasSwitch(root, 'no-color')) {
    disableColor();
  }

  const base = options.cwd ?? process.cwd();
  const cwdFlag = stringSwitch(root, 'cwd');
  const cwd = cwdFlag !== undefined ? resolve(base, cwdFlag) : base;

  const outcome = leafOutcome(root);
  const command = findCommand(outcome.command.name);
  if (!command) {
    throw new Error(`no handler for command \`${outcome.command.name}\``);
  }
  return command.run({ outcome, root, cwd, config: loadConfig(cwd) });
}
