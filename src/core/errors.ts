import type { RawArg } from '@/types';

export type FlagsErrorDetail =
  | { kind: 'unknown-switch'; token: string; suggestion?: string }
  | { kind: 'unexpected-argument'; argument: string }
  | { kind: 'missing-value'; name: string }
  | { kind: 'duplicate-switch'; name: string }
  | { kind: 'missing-required'; name: string; what: 'switch' | 'positional' | 'subcommand' }
  | { kind: 'type-conversion'; name: string; raw: string; type: string; reason: string }
  | { kind: 'help-requested'; help: string }
  | { kind: 'custom'; message: string };

export type FlagsErrorKind = FlagsErrorDetail['kind'];

function formatMessage(detail: FlagsErrorDetail): string {
  switch (detail.kind) {
    case 'unknown-switch':
      return detail.suggestion
        ? `unexpected flag: \`${detail.token}\`, did you mean \`${detail.suggestion}\`?`
        : `unexpected flag: \`${detail.token}\``;
    case 'unexpected-argument':
      return `unexpected argument: ${JSON.stringify(detail.argument)}`;
    case 'missing-value':
      return `expected a value for \`${detail.name}\``;
    case 'duplicate-switch':
      return `flag specified more than once: \`${detail.name}\``;
    case 'missing-required':
      if (detail.what === 'subcommand') {
        return `subcommand is required for \`${detail.name}\``;
      }
      return detail.what === 'switch'
        ? `flag is required: \`${detail.name}\``
        : `argument is required: \`${detail.name}\``;
    case 'type-conversion':
      return `can't parse \`${detail.name}\` value ${JSON.stringify(detail.raw)} as ${detail.type}: ${detail.reason}`;
    case 'help-requested':
      return detail.help;
    case 'custom':
      return detail.message;
  }
}

/**
 * A user-input failure or a help request, reported through one channel.
 */
export class FlagsError extends Error {
  readonly detail: FlagsErrorDetail;

  constructor(detail: FlagsErrorDetail) {
    super(formatMessage(detail));
    this.name = 'FlagsError';
    this.detail = detail;
  }

  /**
   * An application-level validation failure, reported and exited like a parse failure.
   */
  static custom(message: string): FlagsError {
    return new FlagsError({ kind: 'custom', message });
  }

  get kind(): FlagsErrorKind {
    return this.detail.kind;
  }

  /** True when the "error" is a request for help rather than a parse failure. */
  isHelp(): boolean {
    return this.detail.kind === 'help-requested';
  }

  get exitCode(): number {
    return this.isHelp() ? 0 : 2;
  }
}

/**
 * Structural defect in a grammar. Raised while the grammar is built, never while parsing.
 */
export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GrammarError';
  }
}

/**
 * Render an argument for messages. Undecodable bytes are shown with replacement characters.
 */
export function displayArg(raw: RawArg): string {
  return typeof raw === 'string' ? raw : new TextDecoder().decode(raw);
}
