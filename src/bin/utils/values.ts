/**
 * Narrowing helpers for values read out of a parse outcome.
 */

import { positionalValues, switchValues } from '@/core/materialize';
import type { ParseOutcome, RawArg } from '@/types';

function isRawArg(value: unknown): value is RawArg {
  return typeof value === 'string' || value instanceof Uint8Array;
}

export function stringSwitch(outcome: ParseOutcome, long: string): string | undefined {
  const [value] = switchValues(outcome, long);
  return typeof value === 'string' ? value : undefined;
}

export function stringPositionals(outcome: ParseOutcome, name: string): string[] {
  return positionalValues(outcome, name).filter((v): v is string => typeof v === 'string');
}

export function rawPositionals(outcome: ParseOutcome, name: string): RawArg[] {
  return positionalValues(outcome, name).filter(isRawArg);
}
