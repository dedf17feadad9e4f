/**
 * TypeScript declarations for a grammar, matching the shape produced by toFlags().
 * Generation is always an explicit call; nothing here runs as a side effect of loading a grammar.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { CommandNode, Grammar, ValueType } from '@/types';
import { type FieldDescriptor, fieldName, fieldsOf } from './materialize';

export const GENERATED_START = '// generated start';
export const GENERATED_END = '// generated end';

export interface CodegenOptions {
  /** TypeScript type for each custom value type tag; unlisted tags become `unknown` */
  typeNames?: Readonly<Record<string, string>>;
  /** Module the RawArg type is imported from */
  importFrom?: string;
}

export type SyncStatus = 'created' | 'updated' | 'unchanged' | 'stale';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function pascalCase(name: string): string {
  // Trailing separators survive fieldName and cannot appear in a type name.
  const camel = fieldName(name).replace(/[^A-Za-z0-9_$]/g, '');
  const pascal = camel.charAt(0).toUpperCase() + camel.slice(1);
  return /^[0-9]/.test(pascal) ? `_${pascal}` : pascal;
}

function propertyName(field: string): string {
  return IDENTIFIER.test(field) ? field : JSON.stringify(field);
}

function docLines(doc: string | undefined, indent: string): string[] {
  if (!doc) return [];
  const lines = doc.split('\n');
  if (lines.length === 1) return [`${indent}/** ${doc} */`];
  return [`${indent}/**`, ...lines.map((line) => `${indent} * ${line}`.trimEnd()), `${indent} */`];
}

function valueTypeName(type: ValueType, typeNames: Readonly<Record<string, string>>): string {
  switch (type.kind) {
    case 'raw-path':
      return 'RawArg';
    case 'raw-bytes':
      return 'Uint8Array';
    case 'text':
      break;
  }
  switch (type.tag) {
    case 'string':
      return typeNames.string ?? 'string';
    case 'integer':
    case 'number':
      return typeNames[type.tag] ?? 'number';
    case 'boolean':
      return typeNames.boolean ?? 'boolean';
    default:
      return typeNames[type.tag] ?? 'unknown';
  }
}

function fieldLine(
  descriptor: FieldDescriptor,
  typeNames: Readonly<Record<string, string>>,
): string {
  const name = propertyName(descriptor.field);
  if (!descriptor.type) {
    return `  ${name}: ${descriptor.arity === 'repeated' ? 'number' : 'boolean'};`;
  }
  const type = valueTypeName(descriptor.type, typeNames);
  switch (descriptor.arity) {
    case 'required':
      return `  ${name}: ${type};`;
    case 'optional':
      return `  ${name}?: ${type};`;
    case 'repeated':
      return `  ${name}: ${/[\s|&]/.test(type) ? `(${type})` : type}[];`;
  }
}

/** Type names for every command in pre-order; clashes take the parent's name as a prefix. */
function assignTypeNames(root: CommandNode): Map<CommandNode, string> {
  const names = new Map<CommandNode, string>();
  const used = new Set<string>();
  const visit = (node: CommandNode) => {
    let name = pascalCase(node.name);
    if (used.has(name) && node.parent) {
      name = `${names.get(node.parent) ?? ''}${name}`;
    }
    for (let n = 2; used.has(name); n++) {
      name = `${pascalCase(node.name)}${n}`;
    }
    used.add(name);
    if (node.commands.length > 0) {
      used.add(`${name}Cmd`);
    }
    names.set(node, name);
    node.commands.forEach(visit);
  };
  visit(root);
  return names;
}

/**
 * Generate the declaration block for a grammar, including the start and end markers.
 */
export function generateTypes(grammar: Grammar, options: CodegenOptions = {}): string {
  const typeNames = options.typeNames ?? {};
  const names = assignTypeNames(grammar.root);
  const nameOf = (node: CommandNode) => names.get(node) ?? pascalCase(node.name);
  const chunks: string[] = [];
  let usesRawArg = false;

  const visit = (node: CommandNode) => {
    const typeName = nameOf(node);
    const body: string[] = [];
    for (const descriptor of fieldsOf(node)) {
      body.push(...docLines(descriptor.doc, '  '));
      body.push(fieldLine(descriptor, typeNames));
      if (descriptor.type?.kind === 'raw-path') {
        usesRawArg = true;
      }
    }
    if (node.commands.length > 0) {
      body.push(`  subcommand: ${typeName}Cmd;`);
    }

    const header = docLines(node.doc, '');
    chunks.push(
      body.length > 0
        ? [...header, `export interface ${typeName} {`, ...body, '}'].join('\n')
        : [...header, `export interface ${typeName} {}`].join('\n'),
    );

    if (node.commands.length > 0) {
      const members = node.commands.map(
        (child) => `  | { name: '${child.name}'; flags: ${nameOf(child)} }`,
      );
      chunks.push([`export type ${typeName}Cmd =`, ...members].join('\n') + ';');
    }
    node.commands.forEach(visit);
  };
  visit(grammar.root);

  const header = [
    GENERATED_START,
    '// The following code is generated by `flagtree codegen`.',
    '// Run `flagtree codegen --out <file>` to regenerate.',
  ];
  if (usesRawArg) {
    header.push(`import type { RawArg } from '${options.importFrom ?? 'flagtree'}';`);
  }
  return `${[header.join('\n'), ...chunks].join('\n\n')}\n${GENERATED_END}`;
}

/**
 * Replace the generated block in `source`, or append one if there is none.
 */
export function spliceGenerated(source: string, block: string): string {
  const start = source.indexOf(GENERATED_START);
  const end = start === -1 ? -1 : source.indexOf(GENERATED_END, start);
  if (start !== -1 && end !== -1) {
    return source.slice(0, start) + block + source.slice(end + GENERATED_END.length);
  }
  if (source === '') {
    return `${block}\n`;
  }
  return `${source}${source.endsWith('\n') ? '\n' : '\n\n'}${block}\n`;
}

/**
 * Bring the generated block of a file up to date. With `write` false the file is only checked.
 */
export function syncGeneratedFile(path: string, block: string, write: boolean): SyncStatus {
  const exists = existsSync(path);
  const current = exists ? readFileSync(path, 'utf-8') : '';
  const next = spliceGenerated(current, block);
  if (exists && next === current) {
    return 'unchanged';
  }
  if (!write) {
    return 'stale';
  }
  writeFileSync(path, next, 'utf-8');
  return exists ? 'updated' : 'created';
}
