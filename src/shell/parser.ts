import {
  TokenKind,
  type Token,
  type ParsedCommand,
  type ParsedChain,
  type ParsedLine,
} from './types.js';
import { ParseError } from './errors.js';
import { lex } from './lexer.js';

/**
 * Parse one or more newline-separated lines into chains of piped stages.
 * Pure: the result is frozen and depends only on `line`.
 */
export function parse(line: string): ParsedLine {
  const parser = new Parser(line, lex(line));
  return parser.parseLine();
}

const describe = (token: Token): string =>
  token.kind === TokenKind.EOF ? 'end of input'
    : token.kind === TokenKind.Newline ? 'newline'
      : `'${token.value}'`;

class Parser {
  private pos = 0;
  private redirect: string | null = null;

  constructor(private source: string, private tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.pos] ?? { kind: TokenKind.EOF, value: '', pos: this.source.length, end: this.source.length };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== TokenKind.EOF) {
      this.pos++;
    }
    return token;
  }

  private expect(kind: TokenKind, message: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new ParseError(`${message}, got ${describe(token)}`, token.pos);
    }
    return this.advance();
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private skipNewlines(): void {
    while (this.peek().kind === TokenKind.Newline) {
      this.advance();
    }
  }

  parseLine(): ParsedLine {
    const chains: ParsedChain[] = [];

    this.skipNewlines();
    while (!this.isAtEnd()) {
      chains.push(this.parseChain());

      if (this.redirect !== null) {
        this.skipNewlines();
        if (!this.isAtEnd()) {
          const token = this.peek();
          if (token.kind === TokenKind.RedirectOut) {
            throw new ParseError('multiple redirects', token.pos);
          }
          throw new ParseError(`redirect must end the input, got ${describe(token)}`, token.pos);
        }
        break;
      }

      this.parseSeparator();
    }

    return Object.freeze({ redirect: this.redirect, chains: Object.freeze(chains) });
  }

  /** Consumes `;` and/or newlines after a chain. `;` may not be followed by another `;`. */
  private parseSeparator(): void {
    const token = this.peek();
    if (token.kind === TokenKind.Semi) {
      this.advance();
      if (this.peek().kind === TokenKind.Semi) {
        throw new ParseError("empty command between ';'", this.peek().pos);
      }
      this.skipNewlines();
      return;
    }
    if (token.kind === TokenKind.Newline) {
      this.skipNewlines();
      return;
    }
    if (token.kind !== TokenKind.EOF) {
      throw new ParseError(`unexpected ${describe(token)}`, token.pos);
    }
  }

  private parseChain(): ParsedChain {
    const first = this.peek();
    if (first.kind === TokenKind.Semi) {
      throw new ParseError("missing command before ';'", first.pos);
    }

    const stages: Array<{ name: string; args: string[] }> = [];
    stages.push(this.parseStage('before'));
    while (this.peek().kind === TokenKind.Pipe) {
      this.advance();
      stages.push(this.parseStage('after'));
    }

    const end = this.tokens[this.pos - 1]?.end ?? first.end;
    let background = false;

    if (this.peek().kind === TokenKind.Amp) {
      this.advance();
      background = true;
      const next = this.peek();
      if (next.kind !== TokenKind.Semi && next.kind !== TokenKind.Newline && next.kind !== TokenKind.EOF) {
        throw new ParseError(`'&' must end a chain, got ${describe(next)}`, next.pos);
      }
    } else if (this.peek().kind === TokenKind.RedirectOut) {
      this.advance();
      const target = this.expect(TokenKind.Word, "missing redirect target after '>'");
      this.redirect = target.value;
    }

    let head: ParsedCommand | null = null;
    for (let i = stages.length - 1; i >= 0; i--) {
      head = Object.freeze({
        name: stages[i].name,
        args: Object.freeze(stages[i].args),
        next: head,
      });
    }
    if (head === null) {
      throw new ParseError('empty command', first.pos);
    }

    return Object.freeze({ head, background, text: this.source.slice(first.pos, end).trim() });
  }

  private parseStage(side: 'before' | 'after'): { name: string; args: string[] } {
    const words: string[] = [];
    while (this.peek().kind === TokenKind.Word) {
      words.push(this.advance().value);
    }

    if (words.length === 0) {
      const token = this.peek();
      if (side === 'after' || token.kind === TokenKind.Pipe) {
        throw new ParseError(`missing command ${side} '|'`, token.pos);
      }
      throw new ParseError(`unexpected ${describe(token)}`, token.pos);
    }

    const [name, ...args] = words;
    return { name, args };
  }
}
