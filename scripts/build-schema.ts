#!/usr/bin/env tsx
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { buildConfigJsonSchema } from '@/core/schema';

const SCHEMA_OUTPUT_PATH = 'assets/flagtree.schema.json';

function main(): void {
  console.log('Generating JSON Schema...');

  const schema = buildConfigJsonSchema();
  mkdirSync(dirname(SCHEMA_OUTPUT_PATH), { recursive: true });
  writeFileSync(SCHEMA_OUTPUT_PATH, `${JSON.stringify(schema, null, 2)}\n`);

  console.log(`✓ JSON Schema generated: ${SCHEMA_OUTPUT_PATH}`);
}

main();
