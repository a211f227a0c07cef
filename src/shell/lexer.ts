import { TokenKind, type Token } from './types.js';
import { ParseError } from './errors.js';

export function lex(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    // Skip whitespace (but NOT newlines -- they become Newline tokens)
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }

    // Line continuation
    if (ch === '\\' && input[i + 1] === '\n') {
      i += 2;
      continue;
    }

    if (ch === '\n') {
      tokens.push({ kind: TokenKind.Newline, value: '\n', pos: i, end: i + 1 });
      i++;
      continue;
    }

    // Comment -- only at the start of a word; skip to end of line
    if (ch === '#') {
      while (i < input.length && input[i] !== '\n') {
        i++;
      }
      continue;
    }

    const op = tryOperator(input, i);
    if (op) {
      tokens.push(op);
      i = op.end;
      continue;
    }

    const word = readWord(input, i);
    tokens.push(word);
    i = word.end;
  }

  tokens.push({ kind: TokenKind.EOF, value: '', pos: i, end: i });
  return tokens;
}

function tryOperator(input: string, pos: number): Token | null {
  switch (input[pos]) {
    case '|':
      return { kind: TokenKind.Pipe, value: '|', pos, end: pos + 1 };
    case ';':
      return { kind: TokenKind.Semi, value: ';', pos, end: pos + 1 };
    case '&':
      return { kind: TokenKind.Amp, value: '&', pos, end: pos + 1 };
    case '>':
      return { kind: TokenKind.RedirectOut, value: '>', pos, end: pos + 1 };
    default:
      return null;
  }
}

function isWordBreak(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n'
    || ch === '|' || ch === '&' || ch === ';' || ch === '>';
}

function readWord(input: string, pos: number): Token {
  let i = pos;
  let value = '';

  while (i < input.length) {
    const ch = input[i];

    if (ch === '\\') {
      // A backslash before a newline is a continuation, handled by lex()
      if (input[i + 1] === '\n') break;
      if (i + 1 < input.length) {
        value += input[i + 1];
        i += 2;
      } else {
        value += ch;
        i++;
      }
      continue;
    }

    if (ch === "'") {
      const close = input.indexOf("'", i + 1);
      if (close === -1) {
        throw new ParseError('unterminated single quote', i);
      }
      value += input.slice(i + 1, close);
      i = close + 1;
      continue;
    }

    if (ch === '"') {
      const quoted = readDoubleQuoted(input, i);
      value += quoted.text;
      i = quoted.end;
      continue;
    }

    // $(...) or $((...)) command/arithmetic substitution
    if (ch === '$' && input[i + 1] === '(') {
      const subst = readCommandSubstitution(input, i);
      value += subst.text;
      i = subst.end;
      continue;
    }

    // ${...} braced variable -- read until matching }
    if (ch === '$' && input[i + 1] === '{') {
      let j = i + 2;
      let depth = 1;
      while (j < input.length && depth > 0) {
        if (input[j] === '{') depth++;
        else if (input[j] === '}') depth--;
        j++;
      }
      if (depth > 0) {
        throw new ParseError('unterminated ${', i);
      }
      value += input.slice(i, j);
      i = j;
      continue;
    }

    if (isWordBreak(ch)) break;

    value += ch;
    i++;
  }

  return { kind: TokenKind.Word, value, pos, end: i };
}

function readDoubleQuoted(input: string, pos: number): { text: string; end: number } {
  let i = pos + 1; // skip opening quote
  let text = '';

  while (i < input.length && input[i] !== '"') {
    if (input[i] === '\\' && i + 1 < input.length) {
      const next = input[i + 1];
      // Inside double quotes, only these chars are special with backslash
      if (next === '"' || next === '\\' || next === '$' || next === '`') {
        text += next;
        i += 2;
      } else {
        text += '\\';
        i++;
      }
    } else if (input[i] === '$' && input[i + 1] === '(') {
      const subst = readCommandSubstitution(input, i);
      text += subst.text;
      i = subst.end;
    } else {
      text += input[i];
      i++;
    }
  }

  if (i >= input.length) {
    throw new ParseError('unterminated double quote', pos);
  }
  return { text, end: i + 1 };
}

/** Reads `$(...)` or `$((...))` whole, balancing parentheses. */
function readCommandSubstitution(input: string, pos: number): { text: string; end: number } {
  let j = pos + 2; // past $(
  let depth = 1;
  while (j < input.length && depth > 0) {
    if (input[j] === '(') depth++;
    else if (input[j] === ')') depth--;
    j++;
  }
  if (depth > 0) {
    throw new ParseError('unterminated $(', pos);
  }
  return { text: input.slice(pos, j), end: j };
}
