import { expect } from 'vitest';
import type { FlagsError } from '@/core/errors';
import { defineGrammar } from '@/core/grammar';
import { parseArgs } from '@/core/matcher';
import type { CommandDescription, Grammar, ParseOutcome, RawArg } from '@/types';

/**
 * app [-v]... [-c <file>]
 *   build (default) [target] [-j <n>] [--release]
 *   run <script> [rest]... --pass-me
 */
export const TOOL: CommandDescription = {
  name: 'app',
  doc: 'Example tool',
  switches: [
    { long: 'verbose', short: 'v', arity: 'repeated', doc: 'More output' },
    { long: 'config', short: 'c', arity: 'optional', value: { name: 'file', type: 'path' } },
  ],
  commands: [
    {
      name: 'build',
      doc: 'Compile things',
      default: true,
      positionals: [{ name: 'target', arity: 'optional', type: 'string' }],
      switches: [
        { long: 'jobs', short: 'j', arity: 'optional', value: { name: 'n', type: 'integer' } },
        { long: 'release', arity: 'optional' },
      ],
    },
    {
      name: 'run',
      doc: 'Run a script',
      positionals: [
        { name: 'script', arity: 'required', type: 'string', doc: 'Script to run' },
        { name: 'rest', arity: 'repeated', type: 'path' },
      ],
      switches: [{ long: 'pass-me', arity: 'required' }],
    },
  ],
};

export function toolGrammar(): Grammar {
  return defineGrammar(TOOL);
}

export function parseOk(grammar: Grammar, args: readonly RawArg[]): ParseOutcome {
  const result = parseArgs(grammar, args);
  if (!result.ok) {
    throw new Error(`expected a successful parse, got: ${result.error.message}`);
  }
  return result.outcome;
}

export function parseFail(grammar: Grammar, args: readonly RawArg[]): FlagsError {
  const result = parseArgs(grammar, args);
  expect(result.ok).toBe(false);
  if (result.ok) {
    throw new Error('expected the parse to fail');
  }
  return result.error;
}

export interface Captured<T> {
  result: T;
  stdout: string;
  stderr: string;
}

/**
 * Capture console.log and console.error output during a function call.
 */
export function captureOutput<T>(fn: () => T): Captured<T> {
  const originalLog = console.log;
  const originalError = console.error;
  let stdout = '';
  let stderr = '';
  console.log = (...args: unknown[]) => {
    stdout += `${args.map(String).join(' ')}\n`;
  };
  console.error = (...args: unknown[]) => {
    stderr += `${args.map(String).join(' ')}\n`;
  };
  try {
    return { result: fn(), stdout, stderr };
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
}

export function withEnv<T>(env: Record<string, string | undefined>, fn: () => T): T {
  const original: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    original[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    return fn();
  } finally {
    for (const [key, value] of Object.entries(original)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}
