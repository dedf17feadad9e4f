/**
 * Text syntax for grammars:
 *
 *   /// Doc comment for the next item.
 *   cmd app a
 *       required input: path
 *   {
 *       repeated -v, --verbose
 *       optional -o, --output file: path
 *       default cmd run { }
 *   }
 */

import type {
  Arity,
  CommandDescription,
  PositionalDescription,
  SwitchDescription,
} from '@/types';
import { GrammarError } from './errors';

const ARITIES: ReadonlySet<string> = new Set(['optional', 'required', 'repeated']);
const WORD_START = /[A-Za-z0-9_.]/;
const WORD_CHAR = /[A-Za-z0-9_.-]/;

interface SyntaxToken {
  kind: 'doc' | 'word' | 'long' | 'short' | 'punct' | 'eof';
  text: string;
  line: number;
  column: number;
}

export class GrammarSyntaxError extends GrammarError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${line}:${column}: ${message}`);
    this.name = 'GrammarSyntaxError';
    this.line = line;
    this.column = column;
  }
}

function isArity(text: string): text is Arity {
  return ARITIES.has(text);
}

/** @internal Exported for testing */
export function lexGrammar(source: string): SyntaxToken[] {
  const tokens: SyntaxToken[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;

  const advance = (count: number) => {
    for (let i = 0; i < count; i++) {
      if (source[pos] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
      pos++;
    }
  };
  const readWhile = (start: number, pattern: RegExp): number => {
    let end = start;
    while (end < source.length && pattern.test(source.charAt(end))) end++;
    return end;
  };

  while (pos < source.length) {
    const ch = source.charAt(pos);
    const startLine = line;
    const startColumn = column;
    const push = (kind: SyntaxToken['kind'], text: string, length: number) => {
      tokens.push({ kind, text, line: startLine, column: startColumn });
      advance(length);
    };

    if (/\s/.test(ch)) {
      advance(1);
    } else if (source.startsWith('//', pos)) {
      const end = source.indexOf('\n', pos);
      const stop = end === -1 ? source.length : end;
      if (source.startsWith('///', pos)) {
        push('doc', source.slice(pos + 3, stop).replace(/^ /, '').trimEnd(), stop - pos);
      } else {
        advance(stop - pos);
      }
    } else if ('{},:'.includes(ch)) {
      push('punct', ch, 1);
    } else if (source.startsWith('--', pos)) {
      const end = readWhile(pos + 2, WORD_CHAR);
      if (end === pos + 2) {
        throw new GrammarSyntaxError('expected a switch name after `--`', line, column);
      }
      push('long', source.slice(pos + 2, end), end - pos);
    } else if (ch === '-') {
      const end = readWhile(pos + 1, WORD_CHAR);
      if (end !== pos + 2) {
        throw new GrammarSyntaxError('short switch names are a single character', line, column);
      }
      push('short', source.charAt(pos + 1), 2);
    } else if (WORD_START.test(ch)) {
      const end = readWhile(pos, WORD_CHAR);
      push('word', source.slice(pos, end), end - pos);
    } else {
      throw new GrammarSyntaxError(`unexpected character ${JSON.stringify(ch)}`, line, column);
    }
  }

  tokens.push({ kind: 'eof', text: '', line, column });
  return tokens;
}

const EXPECTED: Record<SyntaxToken['kind'], string> = {
  doc: 'a doc comment',
  word: 'a name',
  long: 'a long switch name',
  short: 'a short switch name',
  punct: 'punctuation',
  eof: 'end of input',
};

function describe(token: SyntaxToken): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'doc':
      return 'doc comment';
    case 'long':
      return `\`--${token.text}\``;
    case 'short':
      return `\`-${token.text}\``;
    default:
      return `\`${token.text}\``;
  }
}

class GrammarParser {
  private pos = 0;

  constructor(private readonly tokens: readonly SyntaxToken[]) {}

  private peek(offset = 0): SyntaxToken {
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    if (!token) {
      throw new GrammarSyntaxError('empty token stream', 1, 1);
    }
    return token;
  }

  private next(): SyntaxToken {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  private fail(expected: string, token = this.peek()): never {
    throw new GrammarSyntaxError(
      `expected ${expected}, found ${describe(token)}`,
      token.line,
      token.column,
    );
  }

  private expect(kind: SyntaxToken['kind'], text?: string): SyntaxToken {
    const token = this.peek();
    if (token.kind !== kind || (text !== undefined && token.text !== text)) {
      this.fail(text === undefined ? EXPECTED[kind] : `\`${text}\``);
    }
    return this.next();
  }

  private isWord(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'word' && token.text === text;
  }

  private docs(): string | undefined {
    const lines: string[] = [];
    while (this.peek().kind === 'doc') {
      lines.push(this.next().text);
    }
    return lines.length > 0 ? lines.join('\n') : undefined;
  }

  private arity(): Arity {
    const token = this.expect('word');
    if (!isArity(token.text)) {
      this.fail('`optional`, `required` or `repeated`', token);
    }
    return token.text;
  }

  parseFile(): CommandDescription {
    const doc = this.docs();
    const command = this.command(doc);
    this.expect('eof');
    return command;
  }

  private command(doc: string | undefined, isDefault = false): CommandDescription {
    this.expect('word', 'cmd');
    const name = this.expect('word').text;

    const aliases: string[] = [];
    while (this.peek().kind === 'word' && !isArity(this.peek().text)) {
      aliases.push(this.next().text);
    }

    const positionals: PositionalDescription[] = [];
    for (;;) {
      const positionalDoc = this.docs();
      if (this.peek().kind !== 'word') {
        if (positionalDoc !== undefined) this.fail('a positional after the doc comment');
        break;
      }
      positionals.push(this.positional(positionalDoc));
    }

    const switches: SwitchDescription[] = [];
    const commands: CommandDescription[] = [];
    this.expect('punct', '{');
    for (;;) {
      const itemDoc = this.docs();
      const token = this.peek();
      if (token.kind === 'punct' && token.text === '}') {
        if (itemDoc !== undefined) this.fail('a switch or command after the doc comment');
        break;
      }
      if (this.isWord('cmd')) {
        commands.push(this.command(itemDoc));
      } else if (this.isWord('default') && this.isWord('cmd', 1)) {
        this.next();
        commands.push(this.command(itemDoc, true));
      } else if (token.kind === 'word' && isArity(token.text)) {
        switches.push(this.switchItem(itemDoc));
      } else {
        this.fail('a switch, `cmd` or `}`');
      }
    }
    this.expect('punct', '}');

    return {
      name,
      ...(aliases.length > 0 ? { aliases } : {}),
      ...(doc !== undefined ? { doc } : {}),
      ...(isDefault ? { default: true } : {}),
      ...(positionals.length > 0 ? { positionals } : {}),
      ...(switches.length > 0 ? { switches } : {}),
      ...(commands.length > 0 ? { commands } : {}),
    };
  }

  private positional(doc: string | undefined): PositionalDescription {
    const arity = this.arity();
    const name = this.expect('word').text;
    this.expect('punct', ':');
    const type = this.expect('word').text;
    return { name, arity, type, ...(doc !== undefined ? { doc } : {}) };
  }

  private switchItem(doc: string | undefined): SwitchDescription {
    const arity = this.arity();
    let short: string | undefined;
    if (this.peek().kind === 'short') {
      short = this.next().text;
      this.expect('punct', ',');
    }
    const long = this.expect('long').text;

    let value: SwitchDescription['value'];
    const ahead = this.peek();
    const colon = (offset: number) => {
      const token = this.peek(offset);
      return token.kind === 'punct' && token.text === ':';
    };
    if (ahead.kind === 'word' && colon(1)) {
      this.next();
      this.next();
      value = { name: ahead.text, type: this.expect('word').text };
    } else if (colon(0)) {
      this.next();
      value = { name: long, type: this.expect('word').text };
    }

    return {
      long,
      arity,
      ...(short !== undefined ? { short } : {}),
      ...(value ? { value } : {}),
      ...(doc !== undefined ? { doc } : {}),
    };
  }
}

/**
 * Parse grammar source text into a command description. Syntax errors carry line and column.
 */
export function parseGrammarSource(source: string): CommandDescription {
  return new GrammarParser(lexGrammar(source)).parseFile();
}
