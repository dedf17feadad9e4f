/**
 * Output formatting for the parse and check commands.
 */

import { toFlags } from '@/core/materialize';
import type { CommandNode, Grammar, ParseOutcome } from '@/types';
import { colors } from './utils/colors';

const INDENT = '  ';

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Render one parsed value: strings quoted, bytes as hex.
 * @internal Exported for testing
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Uint8Array) return `bytes(${toHex(value)})`;
  return String(value);
}

function outcomeLines(outcome: ParseOutcome, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  const lines = [`${pad}${colors.bold(outcome.command.name)}`];

  for (const positional of outcome.command.positionals) {
    const values = outcome.positionals.get(positional.name) ?? [];
    if (values.length > 0) {
      lines.push(`${pad}${INDENT}<${positional.name}> = ${values.map(formatValue).join(', ')}`);
    }
  }
  for (const sw of outcome.command.switches) {
    const values = outcome.switches.get(sw.long) ?? [];
    if (values.length === 0) continue;
    const name = colors.cyan(`--${sw.long}`);
    if (!sw.value) {
      lines.push(`${pad}${INDENT}${name}${values.length > 1 ? ` x${values.length}` : ''}`);
    } else {
      lines.push(`${pad}${INDENT}${name} = ${values.map(formatValue).join(', ')}`);
    }
  }

  if (outcome.subcommand) {
    lines.push(...outcomeLines(outcome.subcommand, depth + 1));
  }
  return lines;
}

/**
 * Indented view of an outcome: each command of the path, then the values it collected.
 */
export function formatOutcomeTree(outcome: ParseOutcome): string {
  return outcomeLines(outcome, 0).join('\n');
}

/** toFlags() as JSON; byte values become hex strings. */
export function formatOutcomeJson(outcome: ParseOutcome): string {
  return JSON.stringify(
    toFlags(outcome),
    (_key, value: unknown) => (value instanceof Uint8Array ? toHex(value) : value),
    2,
  );
}

export interface GrammarSummary {
  commands: number;
  switches: number;
  positionals: number;
}

export function summarize(grammar: Grammar): GrammarSummary {
  const summary: GrammarSummary = { commands: 0, switches: 0, positionals: 0 };
  const visit = (node: CommandNode) => {
    summary.commands++;
    summary.switches += node.switches.length;
    summary.positionals += node.positionals.length;
    node.commands.forEach(visit);
  };
  visit(grammar.root);
  return summary;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/** e.g. "3 commands, 1 switch, 2 positionals" */
export function formatSummary(summary: GrammarSummary): string {
  return [
    plural(summary.commands, 'command'),
    plural(summary.switches, 'switch', 'switches'),
    plural(summary.positionals, 'positional'),
  ].join(', ');
}
