import { readFileSync } from 'node:fs';
import * as z from 'zod';
import { PROGRAM_NAME } from '../flags';
import type { Command } from './types';

const PackageSchema = z.object({ version: z.string() });

/** Version from the package manifest; "dev" if it cannot be read. */
export function readVersion(manifest = new URL('../../../package.json', import.meta.url)): string {
  try {
    const result = PackageSchema.safeParse(JSON.parse(readFileSync(manifest, 'utf-8')));
    return result.success ? result.data.version : 'dev';
  } catch {
    return 'dev';
  }
}

export const versionCommand: Command = {
  name: 'version',
  run() {
    console.log(`${PROGRAM_NAME} ${readVersion()}`);
    return 0;
  },
};
