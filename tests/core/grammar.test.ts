import { describe, expect, test } from 'vitest';
import { GrammarError } from '@/core/errors';
import {
  commandPath,
  defineGrammar,
  findSubcommand,
  resolveCommand,
  visibleSwitches,
} from '@/core/grammar';
import type { CommandDescription } from '@/types';
import { TOOL, toolGrammar } from '../helpers';

function grammarError(description: CommandDescription): string {
  try {
    defineGrammar(description);
  } catch (error) {
    if (error instanceof GrammarError) return error.message;
    throw error;
  }
  throw new Error('expected a GrammarError');
}

describe('defineGrammar', () => {
  test('builds a frozen tree with parent links', () => {
    const grammar = toolGrammar();
    const build = resolveCommand(grammar, ['build']);
    expect(build?.parent).toBe(grammar.root);
    expect(grammar.root.defaultCommand).toBe(build);
    expect(Object.isFrozen(grammar.root)).toBe(true);
    expect(Object.isFrozen(grammar.root.switches)).toBe(true);
    expect(commandPath(build ?? grammar.root).map((n) => n.name)).toEqual(['app', 'build']);
  });

  test('switches record the declaring command', () => {
    const grammar = toolGrammar();
    const run = resolveCommand(grammar, ['run']);
    if (!run) throw new Error('missing run command');
    expect(visibleSwitches(run).map((sw) => [sw.long, sw.owner.name])).toEqual([
      ['verbose', 'app'],
      ['config', 'app'],
      ['pass-me', 'run'],
    ]);
  });

  test('subcommands are found by name or alias', () => {
    const grammar = defineGrammar({
      name: 'app',
      commands: [{ name: 'build', aliases: ['b'] }, { name: 'run' }],
    });
    expect(findSubcommand(grammar.root, 'b')?.name).toBe('build');
    expect(findSubcommand(grammar.root, 'bu')).toBeUndefined();
  });

  test('the default child is found by path but not by command-line name', () => {
    const grammar = toolGrammar();
    expect(findSubcommand(grammar.root, 'build')).toBeUndefined();
    expect(findSubcommand(grammar.root, 'run')?.name).toBe('run');
    expect(resolveCommand(grammar, ['build'])?.name).toBe('build');
    expect(resolveCommand(grammar, ['run', 'x'])).toBeUndefined();
    expect(resolveCommand(grammar, [])).toBe(grammar.root);
  });

  test('custom value types are resolved by tag', () => {
    const grammar = defineGrammar(
      {
        name: 'net',
        switches: [
          { long: 'port', arity: 'optional', value: { name: 'port', type: 'port' } },
        ],
      },
      { valueTypes: { port: { parse: (text) => Number(text) } } },
    );
    expect(grammar.root.switches[0]?.value?.type.tag).toBe('port');
  });

  describe('rejects', () => {
    test('unknown value types', () => {
      expect(
        grammarError({
          name: 'app',
          positionals: [{ name: 'n', arity: 'required', type: 'port' }],
        }),
      ).toBe('unknown value type `port` for `n` in `app`');
    });

    test('a switch redeclared on a child', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [{ long: 'verbose', arity: 'optional' }],
          commands: [{ name: 'sub', switches: [{ long: 'verbose', arity: 'optional' }] }],
        }),
      ).toBe('switch `--verbose` in `app sub` shadows the one declared on `app`');
    });

    test('duplicate switches on one command', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [
            { long: 'all', arity: 'optional' },
            { long: 'all', arity: 'repeated' },
          ],
        }),
      ).toBe('duplicate switch `--all` in `app`');
    });

    test('short name clashes with an ancestor', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [{ long: 'verbose', short: 'v', arity: 'optional' }],
          commands: [{ name: 'sub', switches: [{ long: 'version', short: 'v', arity: 'optional' }] }],
        }),
      ).toBe('short name `-v` of `--version` in `app sub` is already used by `--verbose`');
    });

    test('invalid names', () => {
      expect(grammarError({ name: '-app' })).toBe('invalid command name "-app"');
      expect(
        grammarError({ name: 'app', switches: [{ long: 'x', short: 'ab', arity: 'optional' }] }),
      ).toBe('invalid short name "ab" for `--x` in `app`');
    });

    test('a repeated positional that is not last', () => {
      expect(
        grammarError({
          name: 'app',
          positionals: [
            { name: 'files', arity: 'repeated', type: 'path' },
            { name: 'dest', arity: 'required', type: 'path' },
          ],
        }),
      ).toBe('repeated positional `files` in `app` must be the last positional');
    });

    test('a required positional after an optional one', () => {
      expect(
        grammarError({
          name: 'app',
          positionals: [
            { name: 'src', arity: 'optional', type: 'path' },
            { name: 'dest', arity: 'required', type: 'path' },
          ],
        }),
      ).toBe('required positional `dest` in `app` follows an optional one');
    });

    test('a positional named like a visible switch', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [{ long: 'out', arity: 'optional' }],
          commands: [{ name: 'sub', positionals: [{ name: 'out', arity: 'required', type: 'path' }] }],
        }),
      ).toBe('positional `out` in `app sub` has the same name as a switch');
    });

    test('names that map to the same field', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [
            { long: 'dry-run', arity: 'optional' },
            { long: 'dry_run', arity: 'optional' },
          ],
        }),
      ).toBe('`--dry_run` and `--dry-run` in `app` both map to the field `dryRun`');
    });

    test('a switch named subcommand on a command with children', () => {
      expect(
        grammarError({
          name: 'app',
          switches: [{ long: 'subcommand', arity: 'optional' }],
          commands: [{ name: 'sub' }],
        }),
      ).toBe('`--subcommand` and the subcommand in `app` both map to the field `subcommand`');
    });

    test('duplicate sibling names and aliases', () => {
      expect(
        grammarError({ name: 'app', commands: [{ name: 'a' }, { name: 'b', aliases: ['a'] }] }),
      ).toBe('duplicate subcommand name `a` in `app`');
    });

    test('more than one default child', () => {
      expect(
        grammarError({
          name: 'app',
          commands: [
            { name: 'a', default: true },
            { name: 'b', default: true },
          ],
        }),
      ).toBe('`app` has more than one default subcommand: `a`, `b`');
    });

    test('aliases on a default child', () => {
      expect(
        grammarError({
          name: 'app',
          commands: [{ name: 'a', aliases: ['x'], default: true }, { name: 'b' }],
        }),
      ).toBe('default subcommand `a` in `app` cannot have aliases');
    });

    test('a default root', () => {
      expect(grammarError({ ...TOOL, default: true })).toBe(
        'root command `app` cannot be a default subcommand',
      );
    });
  });
});
