import { checkCommand } from './check';
import { codegenCommand } from './codegen';
import { helpCommand } from './help';
import { parseCommand } from './parse';
import type { Command } from './types';
import { versionCommand } from './version';

/** @internal Exported for testing */
export type { Command, CommandContext } from './types';

/**
 * All registered commands. Names match the subcommands of the CLI grammar.
 * @internal Exported for testing
 */
export const commands: readonly Command[] = [
  checkCommand,
  helpCommand,
  parseCommand,
  codegenCommand,
  versionCommand,
];

/**
 * Lookup a command by name.
 * Returns undefined if not found.
 */
export function findCommand(name: string): Command | undefined {
  return commands.find((cmd) => cmd.name === name);
}
