import type { CommandNode, Positional, Switch } from '@/types';
import { commandPath, implicitHelp, visibleSwitches } from './grammar';

const INDENT = '  ';
const HELP_DOC = 'Prints help';

interface Row {
  label: string;
  doc?: string;
}

function positionalUsage(positional: Positional): string {
  switch (positional.arity) {
    case 'required':
      return `<${positional.name}>`;
    case 'optional':
      return `[${positional.name}]`;
    case 'repeated':
      return `[${positional.name}]...`;
  }
}

/**
 * Usage-line form: the short spelling when there is one, bracketed unless required.
 * e.g. "[-o <path>]", "--pass-me", "[-v]..."
 */
function switchUsage(sw: Switch): string {
  const name = sw.short ? `-${sw.short}` : `--${sw.long}`;
  const form = sw.value ? `${name} <${sw.value.name}>` : name;
  switch (sw.arity) {
    case 'required':
      return form;
    case 'optional':
      return `[${form}]`;
    case 'repeated':
      return `[${form}]...`;
  }
}

function switchLabel(sw: Switch): string {
  const names = sw.short ? `-${sw.short}, --${sw.long}` : `    --${sw.long}`;
  return sw.value ? `${names} <${sw.value.name}>` : names;
}

function helpSwitch(node: CommandNode): { usage: string; label: string } | undefined {
  const help = implicitHelp(node);
  if (help.short && help.long) return { usage: '[-h]', label: '-h, --help' };
  if (help.short) return { usage: '[-h]', label: '-h' };
  if (help.long) return { usage: '[--help]', label: '    --help' };
  return undefined;
}

function formatRows(rows: readonly Row[], width: number): string[] {
  return rows.flatMap((row) => {
    const [first = '', ...rest] = (row.doc ?? '').split('\n');
    return [
      `${INDENT}${row.label.padEnd(width)}${first}`.trimEnd(),
      ...rest.map((line) => `${INDENT}${' '.repeat(width)}${line}`.trimEnd()),
    ];
  });
}

/**
 * Render help for a command. Inherited switches are listed before the command's own.
 */
export function renderHelp(node: CommandNode): string {
  const switches = visibleSwitches(node);
  const help = helpSwitch(node);

  const usage = [
    ...commandPath(node).map((n) => n.name),
    ...node.positionals.map(positionalUsage),
    ...switches.map(switchUsage),
  ];
  if (help) {
    usage.push(help.usage);
  }

  const argumentRows: Row[] = node.positionals.map((p) => ({
    label: positionalUsage(p),
    doc: p.doc,
  }));
  const optionRows: Row[] = switches.map((sw) => ({ label: switchLabel(sw), doc: sw.doc }));
  if (help) {
    optionRows.push({ label: help.label, doc: HELP_DOC });
  }
  // The default child cannot be named on a command line.
  const commandRows: Row[] = node.commands
    .filter((cmd) => cmd !== node.defaultCommand)
    .map((cmd) => ({ label: [cmd.name, ...cmd.aliases].join(', '), doc: cmd.doc }));

  const labels = [...argumentRows, ...optionRows, ...commandRows].map((row) => row.label.length);
  const width = Math.max(0, ...labels) + 2;

  const sections: string[][] = node.doc ? [node.doc.split('\n')] : [];
  const usageSection = [`Usage: ${usage.join(' ')}`];
  if (argumentRows.length > 0) {
    usageSection.push('Arguments:', ...formatRows(argumentRows, width));
  }
  sections.push(usageSection);
  if (optionRows.length > 0) {
    sections.push(['Options:', ...formatRows(optionRows, width)]);
  }
  if (commandRows.length > 0) {
    sections.push(['Commands:', ...formatRows(commandRows, width)]);
  }
  return sections.map((lines) => lines.join('\n')).join('\n\n');
}
