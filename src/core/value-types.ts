/**
 * Value types: the closed table of parsers that turn argument text into typed values.
 */

import type * as z from 'zod';
import type { RawArg, ValueParser, ValueType } from '@/types';
import { displayArg, FlagsError, GrammarError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const integerParser: ValueParser<number> = {
  parse(text) {
    if (!INTEGER_PATTERN.test(text)) {
      throw new Error('expected an integer');
    }
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw new Error('integer is out of range');
    }
    return value;
  },
};

const numberParser: ValueParser<number> = {
  parse(text) {
    const value = text.trim() === '' ? Number.NaN : Number(text);
    if (!Number.isFinite(value)) {
      throw new Error('expected a number');
    }
    return value;
  },
};

const booleanParser: ValueParser<boolean> = {
  parse(text) {
    if (text === 'true') return true;
    if (text === 'false') return false;
    throw new Error('expected "true" or "false"');
  },
};

const stringParser: ValueParser<string> = {
  parse: (text) => text,
};

/** Tags whose values are copied from the raw argument and never fail. */
const RAW_TYPE_TAGS: readonly string[] = ['path', 'bytes'];

export const BUILTIN_VALUE_TYPES: Readonly<Record<string, ValueType>> = {
  path: { kind: 'raw-path', tag: 'path' },
  bytes: { kind: 'raw-bytes', tag: 'bytes' },
  string: { kind: 'text', tag: 'string', parser: stringParser },
  integer: { kind: 'text', tag: 'integer', parser: integerParser },
  number: { kind: 'text', tag: 'number', parser: numberParser },
  boolean: { kind: 'text', tag: 'boolean', parser: booleanParser },
};

export type ValueTypeTable = ReadonlyMap<string, ValueType>;

/**
 * Build the lookup table used while constructing a grammar.
 * Custom parsers may replace textual built-ins but not the raw tags.
 */
export function buildValueTypeTable(
  custom: Readonly<Record<string, ValueParser>> = {},
): ValueTypeTable {
  const table = new Map<string, ValueType>(Object.entries(BUILTIN_VALUE_TYPES));
  for (const [tag, parser] of Object.entries(custom)) {
    if (RAW_TYPE_TAGS.includes(tag)) {
      throw new GrammarError(`value type \`${tag}\` is built in and cannot be redefined`);
    }
    table.set(tag, { kind: 'text', tag, parser });
  }
  return table;
}

/**
 * Adapt a zod schema into a value parser. The first issue's message becomes the failure reason.
 */
export function fromSchema<T>(schema: z.ZodType<T>): ValueParser<T> {
  return {
    parse(text) {
      const result = schema.safeParse(text);
      if (!result.success) {
        throw new Error(result.error.issues[0]?.message ?? 'invalid value');
      }
      return result.data;
    },
  };
}

function toBytes(raw: RawArg): Uint8Array {
  return typeof raw === 'string' ? new TextEncoder().encode(raw) : Uint8Array.from(raw);
}

/**
 * Convert one argument for the switch or positional named `target` (e.g. "--jobs", "<file>").
 * `text` is the decoded argument, or undefined when the bytes are not valid UTF-8.
 */
export function coerceValue(
  type: ValueType,
  raw: RawArg,
  text: string | undefined,
  target: string,
): unknown {
  switch (type.kind) {
    case 'raw-path':
      return raw;
    case 'raw-bytes':
      return toBytes(raw);
    case 'text':
      break;
  }

  const fail = (reason: string): FlagsError =>
    new FlagsError({
      kind: 'type-conversion',
      name: target,
      raw: text ?? displayArg(raw),
      type: type.tag,
      reason,
    });

  if (text === undefined) {
    throw fail('argument is not valid UTF-8');
  }
  try {
    return type.parser.parse(text);
  } catch (error) {
    throw fail(error instanceof Error ? error.message : String(error));
  }
}
