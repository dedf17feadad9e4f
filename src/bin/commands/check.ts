import { getConfigPath, validateConfigFile } from '@/core/config';
import { formatSummary, summarize } from '../format';
import { displayPath, loadCliGrammar } from '../grammar-file';
import { colors } from '../utils/colors';
import type { Command } from './types';

export const checkCommand: Command = {
  name: 'check',
  run(context) {
    const configPath = getConfigPath(context.cwd);
    const { errors } = validateConfigFile(configPath);
    for (const error of errors) {
      console.error(colors.yellow(`⚠ ${displayPath(configPath, context.cwd)}: ${error}`));
    }

    const loaded = loadCliGrammar(context);
    if (!loaded.ok) {
      console.error(colors.red(`✗ ${loaded.message}`));
      return 1;
    }
    const where = displayPath(loaded.path, context.cwd);
    const summary = `${where}: ${formatSummary(summarize(loaded.grammar))}`;
    if (errors.length > 0) {
      console.log(colors.red(`✗ ${summary} (config has problems)`));
      return 1;
    }
    console.log(colors.green(`✓ ${summary}`));
    return 0;
  },
};
