/**
 * Accessors over parse outcomes, and materialization into plain objects.
 */

import type { Arity, CommandNode, ParseOutcome, ValueType } from '@/types';

export interface FieldDescriptor {
  /** camelCase property name */
  field: string;
  source: 'positional' | 'switch';
  /** Name as declared: positional name or long switch name */
  name: string;
  arity: Arity;
  /** Absent for boolean switches */
  type?: ValueType;
  doc?: string;
}

/** "pass-me" -> "passMe", "dry_run" -> "dryRun" */
export function fieldName(name: string): string {
  return name.replace(/[-_.]+([A-Za-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

/** Positionals first, then the node's own switches, in declaration order. */
export function fieldsOf(node: CommandNode): FieldDescriptor[] {
  return [
    ...node.positionals.map(
      (p): FieldDescriptor => ({
        field: fieldName(p.name),
        source: 'positional',
        name: p.name,
        arity: p.arity,
        type: p.type,
        doc: p.doc,
      }),
    ),
    ...node.switches.map(
      (sw): FieldDescriptor => ({
        field: fieldName(sw.long),
        source: 'switch',
        name: sw.long,
        arity: sw.arity,
        type: sw.value?.type,
        doc: sw.doc,
      }),
    ),
  ];
}

/** Outcomes from the root down to the selected leaf command. */
function outcomeChain(outcome: ParseOutcome): ParseOutcome[] {
  const chain: ParseOutcome[] = [];
  for (let current: ParseOutcome | undefined = outcome; current; current = current.subcommand) {
    chain.push(current);
  }
  return chain;
}

export function leafOutcome(outcome: ParseOutcome): ParseOutcome {
  let current = outcome;
  while (current.subcommand) {
    current = current.subcommand;
  }
  return current;
}

/** Names of the invoked command path, e.g. ["app", "foo"] */
export function commandNames(outcome: ParseOutcome): string[] {
  return outcomeChain(outcome).map((o) => o.command.name);
}

/**
 * Occurrences of a switch, looked up on whichever command of the chain declares it.
 */
export function switchValues(outcome: ParseOutcome, long: string): readonly unknown[] {
  for (const o of outcomeChain(outcome)) {
    const values = o.switches.get(long);
    if (values) return values;
  }
  return [];
}

export function switchCount(outcome: ParseOutcome, long: string): number {
  return switchValues(outcome, long).length;
}

export function hasSwitch(outcome: ParseOutcome, long: string): boolean {
  return switchCount(outcome, long) > 0;
}

export function positionalValues(outcome: ParseOutcome, name: string): readonly unknown[] {
  return outcome.positionals.get(name) ?? [];
}

function materializeField(descriptor: FieldDescriptor, values: readonly unknown[]): unknown {
  if (!descriptor.type) {
    // Boolean switch: presence, or a count when repeated.
    return descriptor.arity === 'repeated' ? values.length : values.length > 0;
  }
  return descriptor.arity === 'repeated' ? [...values] : values[0];
}

/**
 * Materialize an outcome into a plain object keyed by camelCase field names.
 * A command with children gets `subcommand: { name, flags }`.
 */
export function toFlags(outcome: ParseOutcome): Record<string, unknown> {
  const flags: Record<string, unknown> = {};
  for (const descriptor of fieldsOf(outcome.command)) {
    const values =
      descriptor.source === 'positional'
        ? positionalValues(outcome, descriptor.name)
        : (outcome.switches.get(descriptor.name) ?? []);
    flags[descriptor.field] = materializeField(descriptor, values);
  }
  if (outcome.subcommand) {
    flags.subcommand = {
      name: outcome.subcommand.command.name,
      flags: toFlags(outcome.subcommand),
    };
  }
  return flags;
}
