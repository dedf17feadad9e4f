import type { RawArg, Token } from '@/types';

const SEPARATOR = '--';

/**
 * Decode an argument as UTF-8. Returns undefined for byte sequences that are not valid UTF-8.
 */
export function decodeArg(raw: RawArg): string | undefined {
  if (typeof raw === 'string') {
    return raw;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch {
    return undefined;
  }
}

function classify(raw: RawArg, text: string | undefined): Token {
  if (text === undefined) {
    return { kind: 'bare', raw };
  }
  if (text === SEPARATOR) {
    return { kind: 'separator' };
  }
  if (text.startsWith('--')) {
    const body = text.slice(2);
    const eq = body.indexOf('=');
    return eq === -1
      ? { kind: 'long', name: body, text }
      : { kind: 'long', name: body.slice(0, eq), inline: body.slice(eq + 1), text };
  }
  // A lone "-" is a value (conventionally stdin), not a switch.
  if (text.startsWith('-') && text.length > 1) {
    return { kind: 'short', name: text.slice(1), text };
  }
  return { kind: 'bare', raw, text };
}

/**
 * Lazily classify arguments. Everything after the first `--` is bare.
 */
export function* tokenize(args: readonly RawArg[]): Generator<Token, void, undefined> {
  let afterSeparator = false;
  for (const raw of args) {
    const text = decodeArg(raw);
    if (afterSeparator) {
      yield text === undefined ? { kind: 'bare', raw } : { kind: 'bare', raw, text };
      continue;
    }
    const token = classify(raw, text);
    if (token.kind === 'separator') {
      afterSeparator = true;
    }
    yield token;
  }
}
