import { describe, expect, test } from 'vitest';
import { commands, findCommand } from '@/bin/commands';
import { splitCommandLine } from '@/bin/commands/parse';
import { readVersion } from '@/bin/commands/version';
import { cliGrammar } from '@/bin/flags';

describe('command registry', () => {
  test('every subcommand of the CLI grammar has a handler', () => {
    const names = cliGrammar.root.commands.map((c) => c.name);
    expect(names).toEqual(['check', 'help', 'parse', 'codegen', 'version']);
    expect(commands.map((c) => c.name)).toEqual(names);
  });

  test('findCommand', () => {
    expect(findCommand('codegen')?.name).toBe('codegen');
    expect(findCommand('nonexistent')).toBeUndefined();
  });
});

describe('splitCommandLine', () => {
  test('splits with shell quoting', () => {
    expect(splitCommandLine(`build "a b" 'c d' e\\ f`)).toEqual({
      ok: true,
      args: ['build', 'a b', 'c d', 'e f'],
    });
  });

  test('keeps variables and globs as written', () => {
    expect(splitCommandLine('run $HOME *.ts')).toEqual({ ok: true, args: ['run', '$HOME', '*.ts'] });
  });

  test('stops at a comment', () => {
    expect(splitCommandLine('run a # trailing')).toEqual({ ok: true, args: ['run', 'a'] });
  });

  test('rejects operators', () => {
    expect(splitCommandLine('a && b')).toEqual({
      ok: false,
      message: 'shell operator `&&` is not supported in --line',
    });
  });
});

describe('readVersion', () => {
  test('reads the package manifest', () => {
    expect(readVersion()).toBe('0.1.0');
  });

  test('falls back to dev', () => {
    expect(readVersion(new URL('./missing-package.json', import.meta.url))).toBe('dev');
  });
});
