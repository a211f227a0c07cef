import { describe, it, expect } from 'vitest';
import { lex } from '../../src/shell/lexer.js';
import { parse } from '../../src/shell/parser.js';
import { TokenKind, type ParsedCommand } from '../../src/shell/types.js';
import { ParseError } from '../../src/shell/errors.js';

function stages(line: string, chain = 0): Array<{ name: string; args: readonly string[] }> {
  const result: Array<{ name: string; args: readonly string[] }> = [];
  let cmd: ParsedCommand | null = parse(line).chains[chain]?.head ?? null;
  while (cmd) {
    result.push({ name: cmd.name, args: cmd.args });
    cmd = cmd.next;
  }
  return result;
}

describe('lexer', () => {
  it('emits operators and words', () => {
    const kinds = lex('a | b; c & > d\n').map((t) => t.kind);
    expect(kinds).toEqual([
      TokenKind.Word, TokenKind.Pipe, TokenKind.Word, TokenKind.Semi,
      TokenKind.Word, TokenKind.Amp, TokenKind.RedirectOut, TokenKind.Word,
      TokenKind.Newline, TokenKind.EOF,
    ]);
  });

  it('removes quotes and joins adjacent parts', () => {
    const words = lex(`a"b c"'d'e`).filter((t) => t.kind === TokenKind.Word);
    expect(words.map((t) => t.value)).toEqual(['ab cde']);
  });

  it('records source spans', () => {
    const [first, second] = lex('print  "x y"');
    expect(first).toMatchObject({ pos: 0, end: 5 });
    expect(second).toMatchObject({ pos: 7, end: 12, value: 'x y' });
  });
});

describe('parser', () => {
  describe('simple commands', () => {
    it('parses a simple command', () => {
      const line = parse('print hello');
      expect(line.redirect).toBeNull();
      expect(line.chains).toHaveLength(1);
      expect(line.chains[0].background).toBe(false);
      expect(line.chains[0].text).toBe('print hello');
      expect(line.chains[0].head).toEqual({ name: 'print', args: ['hello'], next: null });
    });

    it('parses empty input', () => {
      expect(parse('').chains).toHaveLength(0);
      expect(parse('   ').chains).toHaveLength(0);
    });

    it('parses a comment-only line', () => {
      expect(parse('# nothing here').chains).toHaveLength(0);
    });
  });

  describe('quoting', () => {
    it('keeps a quoted pipe in one stage', () => {
      expect(stages('print "a|b"')).toEqual([{ name: 'print', args: ['a|b'] }]);
    });

    it('keeps quoted separators and redirects in one token', () => {
      const line = parse(`print 'a; b > c'`);
      expect(line.chains).toHaveLength(1);
      expect(line.redirect).toBeNull();
      expect(line.chains[0].head.args).toEqual(['a; b > c']);
    });

    it('handles backslash escapes', () => {
      expect(stages('print a\\ b')).toEqual([{ name: 'print', args: ['a b'] }]);
      expect(stages('print "say \\"hi\\""')).toEqual([{ name: 'print', args: ['say "hi"'] }]);
    });

    it('keeps backslash sequences other than quote and backslash inside double quotes', () => {
      expect(stages('print "a\\nb"')[0].args).toEqual(['a\\nb']);
    });

    it('keeps substitutions whole', () => {
      expect(stages('let x=$(print a b)')[0].args).toEqual(['x=$(print a b)']);
      expect(stages('let y=$((1 + (2 * 3)))')[0].args).toEqual(['y=$((1 + (2 * 3)))']);
      expect(stages('print ${HOME}/x')[0].args).toEqual(['${HOME}/x']);
    });
  });

  describe('pipelines and chains', () => {
    it('links pipe stages in order', () => {
      expect(stages('print x | grep y | grep z')).toEqual([
        { name: 'print', args: ['x'] },
        { name: 'grep', args: ['y'] },
        { name: 'grep', args: ['z'] },
      ]);
    });

    it('splits chains on semicolons', () => {
      const line = parse('print a; print b');
      expect(line.chains.map((c) => c.text)).toEqual(['print a', 'print b']);
    });

    it('allows a trailing semicolon', () => {
      expect(parse('print a;').chains).toHaveLength(1);
    });
  });

  describe('redirects', () => {
    it('parses a trailing redirect', () => {
      const line = parse('print a > out.txt');
      expect(line.redirect).toBe('out.txt');
      expect(line.chains[0].head.args).toEqual(['a']);
    });

    it('applies one redirect to the whole line', () => {
      const line = parse('print a; print b > out.txt');
      expect(line.chains).toHaveLength(2);
      expect(line.redirect).toBe('out.txt');
    });
  });

  describe('comments', () => {
    it('ignores the rest of the line after a comment word', () => {
      expect(stages('print a # note | grep x')).toEqual([{ name: 'print', args: ['a'] }]);
    });

    it('keeps # inside a word', () => {
      expect(stages('print a#b')[0].args).toEqual(['a#b']);
    });
  });

  describe('multi-line input', () => {
    it('treats newlines as separators', () => {
      expect(parse('print a\nprint b').chains).toHaveLength(2);
    });

    it('skips blank lines', () => {
      expect(parse('\n\nprint a\n\n').chains).toHaveLength(1);
    });

    it('joins continued lines', () => {
      expect(stages('print a \\\nb')).toEqual([{ name: 'print', args: ['a', 'b'] }]);
    });
  });

  describe('background chains', () => {
    it('marks a chain ending in & as background', () => {
      const line = parse('sleep 1 &');
      expect(line.chains[0].background).toBe(true);
      expect(line.chains[0].text).toBe('sleep 1');
    });

    it('allows a chain after a background chain', () => {
      const line = parse('sleep 1 &; print b');
      expect(line.chains.map((c) => c.background)).toEqual([true, false]);
    });
  });

  describe('errors', () => {
    it.each([
      ['print "abc', 'unterminated double quote'],
      [`print 'abc`, 'unterminated single quote'],
      ['let x=$(print a', 'unterminated $('],
      ['let y=$((1 + 2)', 'unterminated $('],
      ['print "$(date"', 'unterminated $('],
      ['print ${HOME', 'unterminated ${'],
      ['| grep a', "missing command before '|'"],
      ['print a |', "missing command after '|'"],
      ['print a | | grep b', "missing command after '|'"],
      ['; print a', "missing command before ';'"],
      ['print a; ; print b', "empty command between ';'"],
      ['print a >', "missing redirect target after '>'"],
      ['print a > f extra', 'redirect must end the input'],
      ['print a > f > g', 'multiple redirects'],
      ['print a > f; print b', 'redirect must end the input'],
      ['sleep 1 & print b', "'&' must end a chain"],
      ['print a && print b', "'&' must end a chain"],
      ['&', "unexpected '&'"],
    ])('rejects %j', (input, message) => {
      expect(() => parse(input)).toThrow(ParseError);
      expect(() => parse(input)).toThrow(message);
    });

    it('reports the position of an unterminated quote', () => {
      try {
        parse('print "abc');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.pos).toBe(6);
          expect(err.message).toBe('syntax error: unterminated double quote');
        }
      }
    });

    it('reports the position of an unterminated substitution', () => {
      try {
        parse('print a $(date');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.pos).toBe(8);
          expect(err.message).toBe('syntax error: unterminated $(');
        }
      }
    });
  });

  describe('purity', () => {
    it('yields structurally equal results for the same line', () => {
      const line = 'print "a b" | grep a; print c > out';
      expect(parse(line)).toEqual(parse(line));
    });

    it('freezes the parsed result', () => {
      const line = parse('print a | grep a');
      expect(Object.isFrozen(line)).toBe(true);
      expect(Object.isFrozen(line.chains[0].head)).toBe(true);
      expect(Object.isFrozen(line.chains[0].head.args)).toBe(true);
    });
  });
});
