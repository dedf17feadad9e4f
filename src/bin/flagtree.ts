#!/usr/bin/env tsx
import { runCli } from '@/bin/cli';
import { envTruthy } from '@/bin/utils/env';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error: unknown) {
  const detail = envTruthy('FLAGTREE_DEBUG') && error instanceof Error ? error.stack : error;
  console.error('flagtree error:', detail);
  process.exitCode = 1;
}
