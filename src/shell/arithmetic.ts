/**
 * Integer arithmetic for `$((expr))` expansion.
 *
 * Supports `+ - * / % **`, unary `+`/`-` and parentheses. Identifiers are
 * looked up through the caller's resolver; an identifier that does not
 * resolve to an integer, a division by zero or any syntax error makes the
 * whole expression evaluate to 0.
 */

export type IdentifierResolver = (name: string) => string | undefined;

class ArithmeticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArithmeticError';
  }
}

export function evaluateArithmetic(expr: string, resolve: IdentifierResolver): number {
  try {
    const parser = new ArithParser(expr.trim(), resolve);
    return parser.parse();
  } catch (err) {
    if (err instanceof ArithmeticError) return 0;
    throw err;
  }
}

/** Replace every balanced `$((...))` in `value` with its evaluated result. */
export function expandArithmetic(value: string, resolve: IdentifierResolver): string {
  let result = value;
  let from = 0;

  while (true) {
    const start = result.indexOf('$((', from);
    if (start === -1) break;

    // Balance parens starting at the first '('
    let depth = 0;
    let end = -1;
    for (let i = start + 1; i < result.length; i++) {
      if (result[i] === '(') depth++;
      else if (result[i] === ')') depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
    if (end === -1 || result[end - 2] !== ')') break;

    const expr = result.slice(start + 3, end - 2);
    const evaluated = String(evaluateArithmetic(expr, resolve));
    result = result.slice(0, start) + evaluated + result.slice(end);
    from = start + evaluated.length;
  }

  return result;
}

class ArithParser {
  private pos = 0;

  constructor(private expr: string, private resolve: IdentifierResolver) {}

  parse(): number {
    if (this.peek() === '') {
      throw new ArithmeticError('empty expression');
    }
    const value = this.parseAddition();
    if (this.peek() !== '') {
      throw new ArithmeticError(`unexpected '${this.peek()}'`);
    }
    return value;
  }

  private skipSpaces(): void {
    while (this.pos < this.expr.length && (this.expr[this.pos] === ' ' || this.expr[this.pos] === '\t')) {
      this.pos++;
    }
  }

  private peek(): string {
    this.skipSpaces();
    return this.expr[this.pos] ?? '';
  }

  private peekNext(): string {
    return this.expr[this.pos + 1] ?? '';
  }

  private parseAddition(): number {
    let left = this.parseMultiplication();
    while (true) {
      const ch = this.peek();
      if (ch === '+') {
        this.pos++;
        left = left + this.parseMultiplication();
      } else if (ch === '-') {
        this.pos++;
        left = left - this.parseMultiplication();
      } else {
        break;
      }
    }
    return left;
  }

  private parseMultiplication(): number {
    let left = this.parseExponentiation();
    while (true) {
      const ch = this.peek();
      if (ch === '*' && this.peekNext() !== '*') {
        this.pos++;
        left = left * this.parseExponentiation();
      } else if (ch === '/') {
        this.pos++;
        const right = this.parseExponentiation();
        if (right === 0) throw new ArithmeticError('division by zero');
        left = Math.trunc(left / right);
      } else if (ch === '%') {
        this.pos++;
        const right = this.parseExponentiation();
        if (right === 0) throw new ArithmeticError('division by zero');
        left = left % right;
      } else {
        break;
      }
    }
    return left;
  }

  private parseExponentiation(): number {
    const base = this.parseUnary();
    if (this.peek() === '*' && this.peekNext() === '*') {
      this.pos += 2;
      const exp = this.parseExponentiation(); // right-associative
      if (exp < 0) throw new ArithmeticError('negative exponent');
      return Math.trunc(Math.pow(base, exp));
    }
    return base;
  }

  private parseUnary(): number {
    const ch = this.peek();
    if (ch === '-') {
      this.pos++;
      return -this.parseUnary();
    }
    if (ch === '+') {
      this.pos++;
      return this.parseUnary();
    }
    return this.parsePrimary();
  }

  private parsePrimary(): number {
    const ch = this.peek();

    if (ch === '(') {
      this.pos++;
      const value = this.parseAddition();
      if (this.peek() !== ')') throw new ArithmeticError("missing ')'");
      this.pos++;
      return value;
    }

    if (/[0-9]/.test(ch)) {
      return this.readNumber();
    }

    if (/[A-Za-z_]/.test(ch)) {
      const name = this.readName();
      return toInteger(this.resolve(name), name);
    }

    throw new ArithmeticError(ch ? `unexpected '${ch}'` : 'unexpected end of expression');
  }

  private readNumber(): number {
    const start = this.pos;
    while (this.pos < this.expr.length && /[0-9]/.test(this.expr[this.pos])) {
      this.pos++;
    }
    return parseInt(this.expr.slice(start, this.pos), 10);
  }

  private readName(): string {
    const start = this.pos;
    while (this.pos < this.expr.length && /[A-Za-z0-9_]/.test(this.expr[this.pos])) {
      this.pos++;
    }
    return this.expr.slice(start, this.pos);
  }
}

function toInteger(value: string | undefined, name: string): number {
  const text = value?.trim();
  if (text === undefined || !/^[-+]?[0-9]+$/.test(text)) {
    throw new ArithmeticError(`'${name}' is not an integer`);
  }
  return parseInt(text, 10);
}
