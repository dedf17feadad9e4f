import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import type { CommandDescription, Grammar } from '@/types';
import { parseGrammarSource } from './dsl';
import { GrammarError } from './errors';
import { defineGrammar, type GrammarOptions } from './grammar';
import { CommandDescriptionSchema, formatIssues } from './schema';

/**
 * Parse the JSON form of a grammar description.
 */
export function parseGrammarJson(text: string): CommandDescription {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GrammarError(`invalid JSON: ${reason}`);
  }
  const result = CommandDescriptionSchema.safeParse(parsed);
  if (!result.success) {
    const issues = formatIssues(result.error).join('\n  ');
    throw new GrammarError(`invalid grammar description:\n  ${issues}`);
  }
  return result.data;
}

/**
 * Read a grammar file: `.json` descriptions, or the text syntax for any other extension.
 */
export function loadGrammarFile(path: string, options: GrammarOptions = {}): Grammar {
  const text = readFileSync(path, 'utf-8');
  const description =
    extname(path).toLowerCase() === '.json' ? parseGrammarJson(text) : parseGrammarSource(text);
  return defineGrammar(description, options);
}
