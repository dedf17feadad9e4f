import { resolve } from 'node:path';
import { generateTypes, type SyncStatus, syncGeneratedFile } from '@/core/codegen';
import { hasSwitch } from '@/core/materialize';
import { displayPath, loadCliGrammar } from '../grammar-file';
import { colors } from '../utils/colors';
import { stringSwitch } from '../utils/values';
import type { Command } from './types';

const STATUS_MESSAGES: Record<SyncStatus, (file: string) => string> = {
  created: (file) => colors.green(`✓ created ${file}`),
  updated: (file) => colors.green(`✓ updated ${file}`),
  unchanged: (file) => colors.dim(`✓ ${file} is up to date`),
  stale: (file) => colors.red(`✗ ${file} is out of date; run \`flagtree codegen\` to update it`),
};

export const codegenCommand: Command = {
  name: 'codegen',
  run(context) {
    const check = hasSwitch(context.outcome, 'check');
    const flag = stringSwitch(context.outcome, 'out');
    const out = flag !== undefined ? resolve(context.cwd, flag) : context.config.out;

    const loaded = loadCliGrammar(context);
    if (!loaded.ok) {
      console.error(colors.red(`✗ ${loaded.message}`));
      return 1;
    }

    const block = generateTypes(loaded.grammar, {
      typeNames: context.config.typeNames,
      importFrom: context.config.importFrom,
    });
    if (out === undefined) {
      if (check) {
        console.error(
          colors.red('✗ --check needs a file: pass --out or set "out" in .flagtree.json'),
        );
        return 1;
      }
      console.log(block);
      return 0;
    }

    const status = syncGeneratedFile(out, block, !check);
    const message = STATUS_MESSAGES[status](displayPath(out, context.cwd));
    if (status === 'stale') {
      console.error(message);
      return 1;
    }
    console.log(message);
    return 0;
  },
};
