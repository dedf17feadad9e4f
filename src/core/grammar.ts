/**
 * Grammar model: builds the immutable command tree from a description and validates it.
 */

import type {
  CommandDescription,
  CommandNode,
  Grammar,
  Positional,
  PositionalDescription,
  Switch,
  SwitchDescription,
  SwitchToken,
  ValueParser,
  ValueType,
} from '@/types';
import { GrammarError } from './errors';
import { fieldName } from './materialize';
import { buildValueTypeTable, type ValueTypeTable } from './value-types';

/** Command names, aliases, long switch names and positional names. */
export const NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const SHORT_PATTERN = /^[A-Za-z0-9]$/;

export interface GrammarOptions {
  /** Additional textual value types, keyed by type tag */
  valueTypes?: Readonly<Record<string, ValueParser>>;
}

interface NodeDraft {
  name: string;
  aliases: string[];
  doc?: string;
  positionals: Positional[];
  switches: Switch[];
  commands: CommandNode[];
  defaultCommand?: CommandNode;
  parent?: CommandNode;
}

export function commandPath(node: CommandNode): CommandNode[] {
  const path: CommandNode[] = [];
  for (let current: CommandNode | undefined = node; current; current = current.parent) {
    path.unshift(current);
  }
  return path;
}

function describePath(node: CommandNode): string {
  return commandPath(node)
    .map((n) => n.name)
    .join(' ');
}

/**
 * Switches settable at `node`: those of its ancestors (root first), then its own.
 */
export function visibleSwitches(node: CommandNode): Switch[] {
  return commandPath(node).flatMap((n) => n.switches);
}

export function findSwitch(node: CommandNode, token: SwitchToken): Switch | undefined {
  return visibleSwitches(node).find((sw) =>
    token.kind === 'long' ? sw.long === token.name : sw.short === token.name,
  );
}

function namedChild(node: CommandNode, name: string): CommandNode | undefined {
  return node.commands.find((cmd) => cmd.name === name || cmd.aliases.includes(name));
}

/**
 * Exact match against child names and aliases, as typed on a command line.
 * The default child is only ever entered implicitly, so its name never matches.
 */
export function findSubcommand(node: CommandNode, name: string): CommandNode | undefined {
  const child = namedChild(node, name);
  return child === node.defaultCommand ? undefined : child;
}

/**
 * Follow subcommand names from the root, default children included.
 * Returns undefined if any name does not resolve.
 */
export function resolveCommand(
  grammar: Grammar,
  names: readonly string[],
): CommandNode | undefined {
  let node: CommandNode | undefined = grammar.root;
  for (const name of names) {
    node = node ? namedChild(node, name) : undefined;
  }
  return node;
}

/**
 * Which spellings of the implicit help switch are available at `node`.
 * A declared `--help` or `-h` takes the name over as an ordinary switch.
 */
export function implicitHelp(node: CommandNode): { long: boolean; short: boolean } {
  const visible = visibleSwitches(node);
  return {
    long: !visible.some((sw) => sw.long === 'help'),
    short: !visible.some((sw) => sw.short === 'h'),
  };
}

export function isHelpToken(node: CommandNode, token: SwitchToken): boolean {
  const help = implicitHelp(node);
  return token.kind === 'long'
    ? help.long && token.name === 'help'
    : help.short && token.name === 'h';
}

function resolveType(table: ValueTypeTable, tag: string, where: string): ValueType {
  const type = table.get(tag);
  if (!type) {
    throw new GrammarError(`unknown value type \`${tag}\` for ${where}`);
  }
  return type;
}

function checkName(name: string, what: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new GrammarError(`invalid ${what} name ${JSON.stringify(name)}`);
  }
}

function buildSwitch(
  description: SwitchDescription,
  owner: CommandNode,
  visible: readonly Switch[],
  table: ValueTypeTable,
): Switch {
  checkName(description.long, 'switch');
  const where = `\`--${description.long}\` in \`${describePath(owner)}\``;

  const clash = visible.find((sw) => sw.long === description.long);
  if (clash) {
    throw new GrammarError(
      clash.owner === owner
        ? `duplicate switch ${where}`
        : `switch ${where} shadows the one declared on \`${describePath(clash.owner)}\``,
    );
  }

  const { short } = description;
  if (short !== undefined) {
    if (!SHORT_PATTERN.test(short)) {
      throw new GrammarError(`invalid short name ${JSON.stringify(short)} for ${where}`);
    }
    const shortClash = visible.find((sw) => sw.short === short);
    if (shortClash) {
      throw new GrammarError(
        `short name \`-${short}\` of ${where} is already used by \`--${shortClash.long}\``,
      );
    }
  }

  const value = description.value
    ? {
        name: description.value.name,
        type: resolveType(table, description.value.type, where),
      }
    : undefined;
  if (value) {
    checkName(value.name, 'value');
  }

  return Object.freeze({
    long: description.long,
    short,
    arity: description.arity,
    value: value && Object.freeze(value),
    doc: description.doc,
    owner,
  });
}

function buildPositionals(
  descriptions: readonly PositionalDescription[],
  owner: CommandNode,
  visible: readonly Switch[],
  table: ValueTypeTable,
): Positional[] {
  const where = describePath(owner);
  const names = new Set<string>();
  let seenOptional = false;

  return descriptions.map((description, index) => {
    checkName(description.name, 'positional');
    if (names.has(description.name)) {
      throw new GrammarError(`duplicate positional \`${description.name}\` in \`${where}\``);
    }
    names.add(description.name);
    if (visible.some((sw) => sw.long === description.name)) {
      throw new GrammarError(
        `positional \`${description.name}\` in \`${where}\` has the same name as a switch`,
      );
    }

    if (description.arity === 'repeated' && index !== descriptions.length - 1) {
      throw new GrammarError(
        `repeated positional \`${description.name}\` in \`${where}\` must be the last positional`,
      );
    }
    if (description.arity === 'required' && seenOptional) {
      throw new GrammarError(
        `required positional \`${description.name}\` in \`${where}\` follows an optional one`,
      );
    }
    if (description.arity !== 'required') {
      seenOptional = true;
    }

    return Object.freeze({
      name: description.name,
      arity: description.arity,
      type: resolveType(table, description.type, `\`${description.name}\` in \`${where}\``),
      doc: description.doc,
    });
  });
}

function checkFieldNames(node: NodeDraft, where: string, hasChildren: boolean): void {
  const fields = new Map<string, string>();
  const claim = (field: string, label: string) => {
    const previous = fields.get(field);
    if (previous) {
      throw new GrammarError(
        `${label} and ${previous} in \`${where}\` both map to the field \`${field}\``,
      );
    }
    fields.set(field, label);
  };
  if (hasChildren) {
    claim('subcommand', 'the subcommand');
  }
  for (const positional of node.positionals) {
    claim(fieldName(positional.name), `\`<${positional.name}>\``);
  }
  for (const sw of node.switches) {
    claim(fieldName(sw.long), `\`--${sw.long}\``);
  }
}

function checkSiblings(children: readonly CommandNode[], where: string): void {
  const seen = new Set<string>();
  for (const child of children) {
    for (const name of [child.name, ...child.aliases]) {
      if (seen.has(name)) {
        throw new GrammarError(`duplicate subcommand name \`${name}\` in \`${where}\``);
      }
      seen.add(name);
    }
  }
}

function buildNode(
  description: CommandDescription,
  parent: CommandNode | undefined,
  inherited: readonly Switch[],
  table: ValueTypeTable,
): CommandNode {
  checkName(description.name, 'command');
  for (const alias of description.aliases ?? []) {
    checkName(alias, 'alias');
  }

  const node: NodeDraft = {
    name: description.name,
    aliases: [...(description.aliases ?? [])],
    doc: description.doc,
    positionals: [],
    switches: [],
    commands: [],
    parent,
  };
  const where = describePath(node);

  const visible = [...inherited];
  for (const switchDescription of description.switches ?? []) {
    const sw = buildSwitch(switchDescription, node, visible, table);
    node.switches.push(sw);
    visible.push(sw);
  }
  node.positionals.push(...buildPositionals(description.positionals ?? [], node, visible, table));

  const children = description.commands ?? [];
  checkFieldNames(node, where, children.length > 0);

  const defaults = children.filter((child) => child.default);
  if (defaults.length > 1) {
    throw new GrammarError(
      `\`${where}\` has more than one default subcommand: ${defaults
        .map((c) => `\`${c.name}\``)
        .join(', ')}`,
    );
  }
  const fallback = defaults[0];
  if (fallback?.aliases?.length) {
    throw new GrammarError(
      `default subcommand \`${fallback.name}\` in \`${where}\` cannot have aliases`,
    );
  }

  for (const childDescription of children) {
    const child = buildNode(childDescription, node, visible, table);
    node.commands.push(child);
    if (childDescription.default) {
      node.defaultCommand = child;
    }
  }
  checkSiblings(node.commands, where);

  Object.freeze(node.aliases);
  Object.freeze(node.positionals);
  Object.freeze(node.switches);
  Object.freeze(node.commands);
  return Object.freeze(node);
}

/**
 * Build and validate a grammar. Structural problems throw GrammarError.
 */
export function defineGrammar(
  description: CommandDescription,
  options: GrammarOptions = {},
): Grammar {
  if (description.default) {
    throw new GrammarError(`root command \`${description.name}\` cannot be a default subcommand`);
  }
  const table = buildValueTypeTable(options.valueTypes);
  return Object.freeze({ root: buildNode(description, undefined, [], table) });
}
