import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_FILE_NAME, ConfigSchema, formatIssues } from './schema';

export interface Config {
  /** Absolute path of the grammar file, if configured */
  grammar?: string;
  /** Absolute path of the file holding the generated block, if configured */
  out?: string;
  typeNames: Record<string, string>;
  importFrom: string;
}

export interface ValidationResult {
  errors: string[];
}

const DEFAULT_IMPORT_FROM = 'flagtree';

export function getConfigPath(cwd: string): string {
  return join(cwd, CONFIG_FILE_NAME);
}

function defaultConfig(): Config {
  return { typeNames: {}, importFrom: DEFAULT_IMPORT_FROM };
}

function readConfigFile(path: string): { data?: unknown; errors: string[] } {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { errors: [`cannot read ${path}: ${reason}`] };
  }
  if (!content.trim()) {
    return { errors: ['config file is empty'] };
  }
  try {
    return { data: JSON.parse(content), errors: [] };
  } catch (error) {
    return { errors: [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }
}

/**
 * Validate a config file. A missing file is valid (there is nothing to report).
 */
export function validateConfigFile(path: string): ValidationResult {
  if (!existsSync(path)) {
    return { errors: [] };
  }
  const { data, errors } = readConfigFile(path);
  if (errors.length > 0) {
    return { errors };
  }
  const result = ConfigSchema.safeParse(data);
  return { errors: result.success ? [] : formatIssues(result.error) };
}

/**
 * Load .flagtree.json from `cwd`. A missing or invalid file yields the defaults;
 * use validateConfigFile to report problems.
 */
export function loadConfig(cwd: string = process.cwd()): Config {
  const path = getConfigPath(cwd);
  if (!existsSync(path)) {
    return defaultConfig();
  }

  const { data } = readConfigFile(path);
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    return defaultConfig();
  }

  const base = dirname(resolve(path));
  const parsed = result.data;
  return {
    ...(parsed.grammar ? { grammar: resolve(base, parsed.grammar) } : {}),
    ...(parsed.out ? { out: resolve(base, parsed.out) } : {}),
    typeNames: parsed.typeNames ?? {},
    importFrom: parsed.importFrom ?? DEFAULT_IMPORT_FROM,
  };
}
