/**
 * Shared types for flagtree grammars, tokens and parse outcomes.
 */

/** A single command-line argument: text, or bytes that may not be valid UTF-8. */
export type RawArg = string | Uint8Array;

/** How many times a switch or positional may (or must) appear. */
export type Arity = 'optional' | 'required' | 'repeated';

/** Value carried by a switch, e.g. `--jobs n: integer` */
export interface ValueDescription {
  /** Placeholder shown in help, e.g. "n" */
  name: string;
  /** Type tag resolved against the value-type table */
  type: string;
}

export interface SwitchDescription {
  /** Long name without dashes, e.g. "verbose" */
  long: string;
  /** Single-character alias without the dash, e.g. "v" */
  short?: string;
  arity: Arity;
  /** Absent for boolean switches */
  value?: ValueDescription;
  doc?: string;
}

export interface PositionalDescription {
  name: string;
  arity: Arity;
  type: string;
  doc?: string;
}

/** Plain-data description of a command, as produced by an authoring step. */
export interface CommandDescription {
  name: string;
  aliases?: string[];
  doc?: string;
  /** Selected when the parent is invoked without a subcommand name */
  default?: boolean;
  positionals?: PositionalDescription[];
  switches?: SwitchDescription[];
  commands?: CommandDescription[];
}

/** Converts argument text into a typed value. Throws to reject the text. */
export interface ValueParser<T = unknown> {
  parse(text: string): T;
}

export type ValueType =
  | { readonly kind: 'raw-path'; readonly tag: string }
  | { readonly kind: 'raw-bytes'; readonly tag: string }
  | { readonly kind: 'text'; readonly tag: string; readonly parser: ValueParser };

export interface Switch {
  readonly long: string;
  readonly short?: string;
  readonly arity: Arity;
  readonly value?: { readonly name: string; readonly type: ValueType };
  readonly doc?: string;
  /** Command that declares the switch; descendants inherit it */
  readonly owner: CommandNode;
}

export interface Positional {
  readonly name: string;
  readonly arity: Arity;
  readonly type: ValueType;
  readonly doc?: string;
}

export interface CommandNode {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly doc?: string;
  readonly positionals: readonly Positional[];
  /** Switches declared on this node only (see visibleSwitches for inherited ones) */
  readonly switches: readonly Switch[];
  readonly commands: readonly CommandNode[];
  readonly defaultCommand?: CommandNode;
  readonly parent?: CommandNode;
}

export interface Grammar {
  readonly root: CommandNode;
}

export type Token =
  | { readonly kind: 'long'; readonly name: string; readonly inline?: string; readonly text: string }
  | { readonly kind: 'short'; readonly name: string; readonly text: string }
  | { readonly kind: 'separator' }
  | { readonly kind: 'bare'; readonly raw: RawArg; readonly text?: string };

export type SwitchToken = Extract<Token, { kind: 'long' | 'short' }>;
export type BareToken = Extract<Token, { kind: 'bare' }>;

/** Result of matching arguments against one command of the resolved path. */
export interface ParseOutcome {
  readonly command: CommandNode;
  /** Occurrences of the switches this command declares, keyed by long name */
  readonly switches: ReadonlyMap<string, readonly unknown[]>;
  /** Values of this command's positionals, keyed by name */
  readonly positionals: ReadonlyMap<string, readonly unknown[]>;
  readonly subcommand?: ParseOutcome;
}
