/**
 * The matcher: walks tokens against the grammar, resolving subcommands, collecting switch
 * occurrences on the command that declares them, and filling positionals in order.
 */

import type {
  BareToken,
  CommandNode,
  Grammar,
  ParseOutcome,
  Positional,
  RawArg,
  Switch,
  SwitchToken,
  Token,
} from '@/types';
import { displayArg, FlagsError } from './errors';
import { findSubcommand, findSwitch, isHelpToken, visibleSwitches } from './grammar';
import { renderHelp } from './help';
import { closestMatch } from './suggest';
import { tokenize } from './tokenize';
import { coerceValue } from './value-types';

export type ParseResult =
  | { ok: true; outcome: ParseOutcome }
  | { ok: false; error: FlagsError };

interface Frame {
  node: CommandNode;
  switches: Map<string, unknown[]>;
  positionals: Map<string, unknown[]>;
  /** Index of the next positional to fill */
  slot: number;
}

interface MatchState {
  frames: Frame[];
  current: Frame;
}

type TokenStream = Iterator<Token, void, undefined>;

function openFrame(node: CommandNode): Frame {
  return {
    node,
    switches: new Map(node.switches.map((sw): [string, unknown[]] => [sw.long, []])),
    positionals: new Map(node.positionals.map((p): [string, unknown[]] => [p.name, []])),
    slot: 0,
  };
}

function descend(state: MatchState, child: CommandNode): void {
  checkPositionals(state.current);
  const frame = openFrame(child);
  state.frames.push(frame);
  state.current = frame;
}

function checkPositionals(frame: Frame): void {
  for (const positional of frame.node.positionals) {
    if (positional.arity === 'required' && frame.positionals.get(positional.name)?.length === 0) {
      throw new FlagsError({
        kind: 'missing-required',
        name: `<${positional.name}>`,
        what: 'positional',
      });
    }
  }
}

function checkSwitches(frame: Frame): void {
  for (const sw of frame.node.switches) {
    if (sw.arity === 'required' && frame.switches.get(sw.long)?.length === 0) {
      throw new FlagsError({ kind: 'missing-required', name: `--${sw.long}`, what: 'switch' });
    }
  }
}

/**
 * Default descendants of `node`, nearest first, down to the first one that can see the switch.
 */
function defaultPathTo(node: CommandNode, token: SwitchToken): CommandNode[] | undefined {
  const path: CommandNode[] = [];
  for (let next = node.defaultCommand; next; next = next.defaultCommand) {
    path.push(next);
    if (findSwitch(next, token)) {
      return path;
    }
  }
  return undefined;
}

function resolveSwitch(state: MatchState, token: SwitchToken): Switch {
  const node = state.current.node;
  const found = findSwitch(node, token);
  if (found) {
    return found;
  }
  if (isHelpToken(node, token)) {
    throw new FlagsError({ kind: 'help-requested', help: renderHelp(node) });
  }

  const viaDefault = defaultPathTo(node, token);
  if (viaDefault) {
    for (const child of viaDefault) {
      descend(state, child);
    }
    return resolveSwitch(state, token);
  }

  const candidates = visibleSwitches(node).flatMap((sw) =>
    sw.short ? [`--${sw.long}`, `-${sw.short}`] : [`--${sw.long}`],
  );
  throw new FlagsError({
    kind: 'unknown-switch',
    token: token.text,
    suggestion: closestMatch(token.text, candidates),
  });
}

function frameOf(state: MatchState, owner: CommandNode): Frame {
  const frame = state.frames.find((f) => f.node === owner);
  if (!frame) {
    throw new Error(`switch owner \`${owner.name}\` is not on the resolved command path`);
  }
  return frame;
}

function takeValue(sw: Switch, token: SwitchToken, tokens: TokenStream): BareToken {
  if (token.kind === 'long' && token.inline !== undefined) {
    return { kind: 'bare', raw: token.inline, text: token.inline };
  }
  const next = tokens.next();
  const value = next.done ? undefined : next.value;
  if (value?.kind !== 'bare') {
    throw new FlagsError({ kind: 'missing-value', name: `--${sw.long}` });
  }
  return value;
}

function matchSwitch(state: MatchState, token: SwitchToken, tokens: TokenStream): void {
  const sw = resolveSwitch(state, token);
  const occurrences = frameOf(state, sw.owner).switches.get(sw.long);
  if (!occurrences) {
    throw new Error(`no occurrence list for \`--${sw.long}\``);
  }
  if (sw.arity !== 'repeated' && occurrences.length > 0) {
    throw new FlagsError({ kind: 'duplicate-switch', name: `--${sw.long}` });
  }

  if (!sw.value) {
    if (token.kind === 'long' && token.inline !== undefined) {
      throw new FlagsError({ kind: 'unexpected-argument', argument: token.text });
    }
    occurrences.push(true);
    return;
  }

  const value = takeValue(sw, token, tokens);
  occurrences.push(coerceValue(sw.value.type, value.raw, value.text, `--${sw.long}`));
}

function fillSlot(frame: Frame, positional: Positional, token: BareToken): void {
  const values = frame.positionals.get(positional.name);
  if (!values) {
    throw new Error(`no value list for \`<${positional.name}>\``);
  }
  values.push(coerceValue(positional.type, token.raw, token.text, `<${positional.name}>`));
  if (positional.arity !== 'repeated') {
    frame.slot++;
  }
}

function matchBare(state: MatchState, token: BareToken): void {
  for (;;) {
    const frame = state.current;
    const positional = frame.node.positionals[frame.slot];
    if (positional) {
      fillSlot(frame, positional, token);
      return;
    }

    const child = token.text === undefined ? undefined : findSubcommand(frame.node, token.text);
    if (child) {
      descend(state, child);
      return;
    }

    const fallback = frame.node.defaultCommand;
    if (!fallback) {
      throw new FlagsError({ kind: 'unexpected-argument', argument: displayArg(token.raw) });
    }
    descend(state, fallback);
  }
}

function finish(state: MatchState): ParseOutcome {
  checkPositionals(state.current);
  while (state.current.node.commands.length > 0) {
    const fallback = state.current.node.defaultCommand;
    if (!fallback) {
      throw new FlagsError({
        kind: 'missing-required',
        name: state.frames.map((f) => f.node.name).join(' '),
        what: 'subcommand',
      });
    }
    descend(state, fallback);
  }
  checkPositionals(state.current);
  for (const frame of state.frames) {
    checkSwitches(frame);
  }

  const outcome = state.frames.reduceRight<ParseOutcome | undefined>(
    (subcommand, frame) => ({
      command: frame.node,
      switches: frame.switches,
      positionals: frame.positionals,
      ...(subcommand ? { subcommand } : {}),
    }),
    undefined,
  );
  if (!outcome) {
    throw new Error('matcher finished without a root command');
  }
  return outcome;
}

/**
 * Match arguments against the grammar, throwing FlagsError on invalid input or a help request.
 */
export function parseOrThrow(grammar: Grammar, args: readonly RawArg[]): ParseOutcome {
  const root = openFrame(grammar.root);
  const state: MatchState = { frames: [root], current: root };
  const tokens = tokenize(args);

  for (let step = tokens.next(); !step.done; step = tokens.next()) {
    const token = step.value;
    switch (token.kind) {
      case 'separator':
        break;
      case 'long':
      case 'short':
        matchSwitch(state, token, tokens);
        break;
      case 'bare':
        matchBare(state, token);
        break;
    }
  }

  return finish(state);
}

/**
 * Match arguments against the grammar. User-input errors and help requests come back as values.
 */
export function parseArgs(grammar: Grammar, args: readonly RawArg[]): ParseResult {
  try {
    return { ok: true, outcome: parseOrThrow(grammar, args) };
  } catch (error) {
    if (error instanceof FlagsError) {
      return { ok: false, error };
    }
    throw error;
  }
}
