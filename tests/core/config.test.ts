import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { getConfigPath, loadConfig, validateConfigFile } from '@/core/config';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'flagtree-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(data: unknown): void {
    const content = typeof data === 'string' ? data : JSON.stringify(data);
    writeFileSync(getConfigPath(tempDir), content, 'utf-8');
  }

  describe('loadConfig', () => {
    test('defaults when there is no config file', () => {
      expect(loadConfig(tempDir)).toEqual({ typeNames: {}, importFrom: 'flagtree' });
    });

    test('resolves paths against the config directory', () => {
      writeConfig({
        version: 1,
        grammar: 'cli.flags',
        out: 'src/flags.ts',
        typeNames: { level: "'debug' | 'info'" },
        importFrom: './flags-runtime',
      });
      expect(loadConfig(tempDir)).toEqual({
        grammar: join(tempDir, 'cli.flags'),
        out: join(tempDir, 'src/flags.ts'),
        typeNames: { level: "'debug' | 'info'" },
        importFrom: './flags-runtime',
      });
    });

    test('an invalid config falls back to defaults', () => {
      writeConfig({ version: 2, grammar: 'cli.flags' });
      expect(loadConfig(tempDir)).toEqual({ typeNames: {}, importFrom: 'flagtree' });
    });

    test('malformed JSON falls back to defaults', () => {
      writeConfig('{ not json');
      expect(loadConfig(tempDir).grammar).toBeUndefined();
    });
  });

  describe('validateConfigFile', () => {
    test('a missing file has nothing to report', () => {
      expect(validateConfigFile(getConfigPath(tempDir))).toEqual({ errors: [] });
    });

    test('a valid file', () => {
      writeConfig({ version: 1, grammar: 'cli.flags' });
      expect(validateConfigFile(getConfigPath(tempDir))).toEqual({ errors: [] });
    });

    test('empty file', () => {
      writeConfig('   ');
      expect(validateConfigFile(getConfigPath(tempDir))).toEqual({
        errors: ['config file is empty'],
      });
    });

    test('invalid JSON', () => {
      writeConfig('{ not json');
      const { errors } = validateConfigFile(getConfigPath(tempDir));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith('invalid JSON: ')).toBe(true);
    });

    test('schema problems name the field', () => {
      writeConfig({ version: 1, grammar: 42 });
      const { errors } = validateConfigFile(getConfigPath(tempDir));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith('grammar: ')).toBe(true);
    });

    test('unknown keys are rejected', () => {
      writeConfig({ version: 1, grammer: 'cli.flags' });
      const { errors } = validateConfigFile(getConfigPath(tempDir));
      expect(errors).toHaveLength(1);
      expect(errors[0]).toContain('grammer');
    });
  });
});
