import { describe, expect, it } from 'vitest';
import { ParseFailure } from '../../../src/errors.js';
import { tokenize } from '../../../src/source/lexer.js';

function kinds(text: string) {
  return tokenize(text).map(token => [token.kind, token.text]);
}

function failureOf(text: string): ParseFailure {
  try {
    tokenize(text);
  } catch (error) {
    if (error instanceof ParseFailure) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe('tokenize', () => {
  it('splits a declaration into tokens', () => {
    expect(kinds('let x=5')).toEqual([
      ['keyword', 'let'],
      ['whitespace', ' '],
      ['identifier', 'x'],
      ['operator', '='],
      ['literal', '5'],
    ]);
  });

  it('covers the text without gaps', () => {
    const text = 'struct Point {\n\tvar x: Int = 0 // origin\n}\r\n';
    const tokens = tokenize(text);
    expect(tokens.map(token => token.text).join('')).toBe(text);
    tokens.forEach((token, i) => {
      expect(token.start).toBe(i === 0 ? 0 : tokens[i - 1].end);
    });
  });

  it('records 1-indexed lines and columns', () => {
    const b = tokenize('a\n  b').find(token => token.text === 'b');
    expect(b).toMatchObject({ line: 2, column: 3, start: 4, end: 5 });
  });

  it('treats CRLF as one newline token', () => {
    expect(kinds('a\r\nb')).toEqual([
      ['identifier', 'a'],
      ['newline', '\r\n'],
      ['identifier', 'b'],
    ]);
  });

  it('nests block comments', () => {
    expect(kinds('/* a /* b */ c */x')).toEqual([
      ['comment', '/* a /* b */ c */'],
      ['identifier', 'x'],
    ]);
  });

  it('keeps interpolated strings in one literal', () => {
    expect(kinds('"a\\(f("b"))c"')).toEqual([['literal', '"a\\(f("b"))c"']]);
  });

  it('reads raw and multi-line strings', () => {
    expect(kinds('#"a"b"#')).toEqual([['literal', '#"a"b"#']]);
    expect(kinds('"""\nhello\n"""')).toEqual([['literal', '"""\nhello\n"""']]);
  });

  it('separates attributes, directives and identifiers', () => {
    expect(kinds('@objc #if DEBUG')).toEqual([
      ['attribute', '@objc'],
      ['whitespace', ' '],
      ['directive', '#if'],
      ['whitespace', ' '],
      ['identifier', 'DEBUG'],
    ]);
  });

  it('reads range operators after integer literals', () => {
    expect(kinds('0..<5')).toEqual([
      ['literal', '0'],
      ['operator', '..<'],
      ['literal', '5'],
    ]);
  });

  it('ends an operator where a comment starts', () => {
    expect(kinds('a+//c')).toEqual([
      ['identifier', 'a'],
      ['operator', '+'],
      ['comment', '//c'],
    ]);
  });

  it('reads escaped identifiers and closure parameters', () => {
    expect(kinds('`default` $0')).toEqual([
      ['identifier', '`default`'],
      ['whitespace', ' '],
      ['identifier', '$0'],
    ]);
  });

  describe('failures', () => {
    it('reports an unclosed bracket at its offset', () => {
      const failure = failureOf('let x = (1');
      expect(failure.message).toBe("Unclosed '('");
      expect(failure.offset).toBe(8);
      expect(failure.code).toBe('parse-failure');
    });

    it('reports a stray closing bracket', () => {
      expect(failureOf('a)').offset).toBe(1);
      expect(failureOf('(]').message).toBe("Unexpected ']'");
    });

    it('reports an unterminated string at its start', () => {
      const failure = failureOf('x = "abc');
      expect(failure.message).toBe('Unterminated string literal');
      expect(failure.offset).toBe(4);
    });

    it('reports characters outside the grammar', () => {
      const failure = failureOf('let € = 1');
      expect(failure.message).toBe("Unexpected character '€'");
      expect(failure.offset).toBe(4);
    });
  });
});
