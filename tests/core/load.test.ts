import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { GrammarError } from '@/core/errors';
import { loadGrammarFile, parseGrammarJson } from '@/core/load';
import { TOOL } from '../helpers';

describe('parseGrammarJson', () => {
  test('returns the description', () => {
    expect(parseGrammarJson(JSON.stringify(TOOL))).toEqual(TOOL);
  });

  test('reports malformed JSON', () => {
    expect(() => parseGrammarJson('{')).toThrow(GrammarError);
  });

  test('reports schema problems with their path', () => {
    let message = '';
    try {
      parseGrammarJson(JSON.stringify({ name: 'app', switches: [{ long: 'x' }] }));
    } catch (error) {
      if (!(error instanceof GrammarError)) throw error;
      message = error.message;
    }
    expect(message.split('\n')[0]).toBe('invalid grammar description:');
    expect(message).toContain('switches.0.arity: ');
  });
});

describe('loadGrammarFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'flagtree-load-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('reads JSON descriptions', () => {
    const path = join(tempDir, 'cli.json');
    writeFileSync(path, JSON.stringify(TOOL));
    expect(loadGrammarFile(path).root.commands.map((c) => c.name)).toEqual(['build', 'run']);
  });

  test('reads the text syntax for other extensions', () => {
    const path = join(tempDir, 'cli.flags');
    writeFileSync(path, 'cmd app { optional -q, --quiet }');
    expect(loadGrammarFile(path).root.switches[0]?.long).toBe('quiet');
  });

  test('passes custom value types through', () => {
    const path = join(tempDir, 'cli.flags');
    writeFileSync(path, 'cmd app { optional --port: port }');
    expect(() => loadGrammarFile(path)).toThrow('unknown value type `port`');
    const grammar = loadGrammarFile(path, { valueTypes: { port: { parse: Number } } });
    expect(grammar.root.switches[0]?.value?.type.tag).toBe('port');
  });
});
