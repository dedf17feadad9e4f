import { resolveCommand } from '@/core/grammar';
import { renderHelp } from '@/core/help';
import { loadCliGrammar } from '../grammar-file';
import { colors } from '../utils/colors';
import { stringPositionals } from '../utils/values';
import type { Command } from './types';

export const helpCommand: Command = {
  name: 'help',
  run(context) {
    const loaded = loadCliGrammar(context);
    if (!loaded.ok) {
      console.error(colors.red(`✗ ${loaded.message}`));
      return 1;
    }

    const path = stringPositionals(context.outcome, 'command');
    const node = resolveCommand(loaded.grammar, path);
    if (!node) {
      console.error(`Unknown command: ${path.join(' ')}`);
      return 1;
    }
    console.log(renderHelp(node));
    return 0;
  },
};
