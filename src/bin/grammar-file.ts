import { relative, resolve } from 'node:path';
import { GrammarError } from '@/core/errors';
import { loadGrammarFile } from '@/core/load';
import { BUILTIN_VALUE_TYPES } from '@/core/value-types';
import type { Grammar, ValueParser } from '@/types';
import type { CommandContext } from './commands/types';
import { stringSwitch } from './utils/values';

export type LoadedGrammar =
  | { ok: true; grammar: Grammar; path: string }
  | { ok: false; message: string };

const passThrough: ValueParser<string> = { parse: (text) => text };

/**
 * Custom tags named in `typeNames` are accepted as plain text, so grammars that rely on
 * application-defined value types can still be checked and exercised from the command line.
 */
function configuredValueTypes(
  typeNames: Readonly<Record<string, string>>,
): Record<string, ValueParser> {
  const types: Record<string, ValueParser> = {};
  for (const tag of Object.keys(typeNames)) {
    if (!(tag in BUILTIN_VALUE_TYPES)) {
      types[tag] = passThrough;
    }
  }
  return types;
}

/** Path for messages: relative to the working directory when that is shorter. */
export function displayPath(path: string, cwd: string): string {
  const rel = relative(cwd, path);
  return rel && !rel.startsWith('..') ? rel : path;
}

/**
 * Load the grammar named by --grammar, falling back to the config file's `grammar`.
 */
export function loadCliGrammar(context: CommandContext): LoadedGrammar {
  const flag = stringSwitch(context.root, 'grammar');
  const path = flag !== undefined ? resolve(context.cwd, flag) : context.config.grammar;
  if (path === undefined) {
    return {
      ok: false,
      message: 'no grammar file: pass --grammar or set "grammar" in .flagtree.json',
    };
  }

  try {
    const grammar = loadGrammarFile(path, {
      valueTypes: configuredValueTypes(context.config.typeNames),
    });
    return { ok: true, grammar, path };
  } catch (error) {
    const where = displayPath(path, context.cwd);
    if (error instanceof GrammarError) {
      return { ok: false, message: `${where}: ${error.message}` };
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { ok: false, message: `${where}: file not found` };
    }
    throw error;
  }
}
