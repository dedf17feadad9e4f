import type { Config } from '@/core/config';
import type { ParseOutcome } from '@/types';

export interface CommandContext {
  /** Outcome of the invoked subcommand */
  outcome: ParseOutcome;
  /** Root outcome, where the global switches live */
  root: ParseOutcome;
  /** Directory relative paths are resolved against */
  cwd: string;
  config: Config;
}

/**
 * A subcommand of the flagtree CLI. `run` returns the process exit code.
 */
export interface Command {
  /** Primary command name, as declared in the CLI grammar */
  name: string;
  run(context: CommandContext): number;
}
