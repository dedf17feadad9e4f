import { parse as splitShell } from 'shell-quote';
import { reportError } from '@/core/exit';
import { parseArgs } from '@/core/matcher';
import { hasSwitch } from '@/core/materialize';
import type { RawArg } from '@/types';
import { formatOutcomeJson, formatOutcomeTree } from '../format';
import { loadCliGrammar } from '../grammar-file';
import { colors } from '../utils/colors';
import { rawPositionals, stringSwitch } from '../utils/values';
import type { Command } from './types';

export type SplitResult = { ok: true; args: string[] } | { ok: false; message: string };

/**
 * Split a command line the way a POSIX shell would, without expanding anything.
 * Operators such as `|` and `;` are rejected; glob patterns are kept as written.
 */
export function splitCommandLine(line: string): SplitResult {
  const args: string[] = [];
  for (const entry of splitShell(line, (name) => `$${name}`)) {
    if (typeof entry === 'string') {
      args.push(entry);
    } else if ('comment' in entry) {
      break;
    } else if (entry.op === 'glob') {
      args.push(entry.pattern);
    } else {
      return { ok: false, message: `shell operator \`${entry.op}\` is not supported in --line` };
    }
  }
  return { ok: true, args };
}

function argumentsToParse(
  line: string | undefined,
  positionals: RawArg[],
): { ok: true; args: readonly RawArg[] } | { ok: false; message: string } {
  if (line === undefined) {
    return { ok: true, args: positionals };
  }
  if (positionals.length > 0) {
    return { ok: false, message: 'pass arguments either with --line or after `parse`, not both' };
  }
  return splitCommandLine(line);
}

export const parseCommand: Command = {
  name: 'parse',
  run(context) {
    const input = argumentsToParse(
      stringSwitch(context.outcome, 'line'),
      rawPositionals(context.outcome, 'args'),
    );
    if (!input.ok) {
      console.error(colors.red(`✗ ${input.message}`));
      return 1;
    }

    const loaded = loadCliGrammar(context);
    if (!loaded.ok) {
      console.error(colors.red(`✗ ${loaded.message}`));
      return 1;
    }

    const result = parseArgs(loaded.grammar, input.args);
    if (!result.ok) {
      return reportError(result.error);
    }
    console.log(
      hasSwitch(context.outcome, 'json')
        ? formatOutcomeJson(result.outcome)
        : formatOutcomeTree(result.outcome),
    );
    return 0;
  },
};
