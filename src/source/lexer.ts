import { ParseFailure } from '../errors.js';
import type { Token, TokenKind } from '../types.js';
import { LineIndex } from './line-index.js';

export const KEYWORDS: ReadonlySet<string> = new Set([
  // declarations
  'actor', 'associatedtype', 'class', 'deinit', 'enum', 'extension', 'func', 'import', 'init',
  'inout', 'let', 'operator', 'precedencegroup', 'protocol', 'struct', 'subscript', 'typealias', 'var',
  // access control
  'fileprivate', 'internal', 'open', 'private', 'public',
  // declaration modifiers
  'convenience', 'dynamic', 'final', 'indirect', 'lazy', 'mutating', 'nonmutating', 'optional',
  'override', 'required', 'static', 'unowned', 'weak',
  // statements
  'break', 'case', 'catch', 'continue', 'default', 'defer', 'do', 'else', 'fallthrough', 'for',
  'guard', 'if', 'in', 'repeat', 'return', 'switch', 'throw', 'where', 'while',
  // expressions and types
  'as', 'async', 'await', 'false', 'is', 'nil', 'rethrows', 'self', 'Self', 'super', 'throws',
  'true', 'try', 'some', 'any',
  // accessors
  'get', 'set', 'willSet', 'didSet',
]);

const OPERATOR_CHARS = '/=-+!*%<>&|^~?';
const OPENING = '([{';
const CLOSING = ')]}';

const IDENTIFIER = /[\p{L}_$][\p{L}\p{N}\p{M}_$]*/uy;
const NUMBER =
  /0x[0-9a-fA-F_]+(?:\.[0-9a-fA-F_]+)?(?:[pP][+-]?[0-9_]+)?|0b[01_]+|0o[0-7_]+|[0-9][0-9_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9_]+)?/y;
const RAW_STRING_START = /#+"/y;

/**
 * Lexer for Swift source text. Produces a lossless token stream and checks
 * bracket balance; anything it cannot lex is a ParseFailure.
 */
class Lexer {
  private pos = 0;
  private readonly tokens: Token[] = [];
  private readonly brackets: Array<{ char: string; offset: number }> = [];
  private readonly lines: LineIndex;

  constructor(private readonly text: string) {
    this.lines = new LineIndex(text);
  }

  run(): Token[] {
    while (this.pos < this.text.length) {
      this.scanToken();
    }

    const unclosed = this.brackets.pop();
    if (unclosed) {
      throw new ParseFailure(`Unclosed '${unclosed.char}'`, unclosed.offset);
    }

    return this.tokens;
  }

  private scanToken(): void {
    const start = this.pos;
    const ch = this.text[start];

    if (ch === '\n' || ch === '\r') {
      this.pos += ch === '\r' && this.text[start + 1] === '\n' ? 2 : 1;
      this.push('newline', start);
    } else if (ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v') {
      while (this.pos < this.text.length && ' \t\f\v'.includes(this.text[this.pos])) {
        this.pos++;
      }
      this.push('whitespace', start);
    } else if (this.text.startsWith('//', start)) {
      while (this.pos < this.text.length && this.text[this.pos] !== '\n' && this.text[this.pos] !== '\r') {
        this.pos++;
      }
      this.push('comment', start);
    } else if (this.text.startsWith('/*', start)) {
      this.scanBlockComment();
      this.push('comment', start);
    } else if (ch === '"' || (ch === '#' && this.lookingAt(RAW_STRING_START))) {
      this.scanString();
      this.push('literal', start);
    } else if (this.matches(NUMBER)) {
      this.push('literal', start);
    } else if (this.matches(IDENTIFIER)) {
      const word = this.text.slice(start, this.pos);
      this.push(KEYWORDS.has(word) ? 'keyword' : 'identifier', start);
    } else if (ch === '`') {
      const close = this.text.indexOf('`', start + 1);
      if (close === -1 || this.text.slice(start + 1, close).includes('\n')) {
        throw new ParseFailure('Unterminated escaped identifier', start);
      }
      this.pos = close + 1;
      this.push('identifier', start);
    } else if (ch === '@' || ch === '#') {
      this.pos++;
      if (!this.matches(IDENTIFIER)) {
        throw new ParseFailure(`Unexpected character '${ch}'`, start);
      }
      this.push(ch === '@' ? 'attribute' : 'directive', start);
    } else if (OPENING.includes(ch)) {
      this.brackets.push({ char: ch, offset: start });
      this.pos++;
      this.push('brace', start);
    } else if (CLOSING.includes(ch)) {
      const open = this.brackets.pop();
      if (!open || CLOSING.indexOf(ch) !== OPENING.indexOf(open.char)) {
        throw new ParseFailure(`Unexpected '${ch}'`, start);
      }
      this.pos++;
      this.push('brace', start);
    } else if (ch === '.') {
      this.pos++;
      if (this.text[this.pos] === '.') {
        this.scanOperatorChars(true);
        this.push('operator', start);
      } else {
        this.push('punctuation', start);
      }
    } else if (',;:\\'.includes(ch)) {
      this.pos++;
      this.push('punctuation', start);
    } else if (OPERATOR_CHARS.includes(ch)) {
      this.scanOperatorChars(false);
      this.push('operator', start);
    } else {
      throw new ParseFailure(`Unexpected character '${ch}'`, start);
    }
  }

  private matches(pattern: RegExp): boolean {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.text);
    if (!match || match[0].length === 0) return false;
    this.pos += match[0].length;
    return true;
  }

  private scanOperatorChars(allowDots: boolean): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '/' && (this.text[this.pos + 1] === '/' || this.text[this.pos + 1] === '*')) break;
      if (!OPERATOR_CHARS.includes(ch) && !(allowDots && ch === '.')) break;
      this.pos++;
    }
  }

  private scanBlockComment(): void {
    const start = this.pos;
    let depth = 0;
    while (this.pos < this.text.length) {
      if (this.text.startsWith('/*', this.pos)) {
        depth++;
        this.pos += 2;
      } else if (this.text.startsWith('*/', this.pos)) {
        depth--;
        this.pos += 2;
        if (depth === 0) return;
      } else {
        this.pos++;
      }
    }
    throw new ParseFailure('Unterminated block comment', start);
  }

  /** Scans a string literal starting at the current position, raw or not */
  private scanString(): void {
    const start = this.pos;
    let hashes = 0;
    while (this.text[this.pos] === '#') {
      hashes++;
      this.pos++;
    }

    const multiline = this.text.startsWith('"""', this.pos);
    this.pos += multiline ? 3 : 1;

    const closing = (multiline ? '"""' : '"') + '#'.repeat(hashes);
    const escape = '\\' + '#'.repeat(hashes);

    while (true) {
      if (this.pos >= this.text.length) {
        throw new ParseFailure('Unterminated string literal', start);
      }
      const ch = this.text[this.pos];
      if (!multiline && (ch === '\n' || ch === '\r')) {
        throw new ParseFailure('Unterminated string literal', start);
      }
      if (this.text.startsWith(closing, this.pos)) {
        this.pos += closing.length;
        return;
      }
      if (this.text.startsWith(escape, this.pos)) {
        this.pos += escape.length;
        if (this.text[this.pos] === '(') {
          this.pos++;
          this.scanInterpolation(start);
        } else {
          this.pos++;
        }
        continue;
      }
      this.pos++;
    }
  }

  private scanInterpolation(stringStart: number): void {
    let depth = 1;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '"' || (ch === '#' && this.lookingAt(RAW_STRING_START))) {
        this.scanString();
        continue;
      }
      this.pos++;
      if (ch === '(') {
        depth++;
      } else if (ch === ')') {
        depth--;
        if (depth === 0) return;
      }
    }
    throw new ParseFailure('Unterminated string interpolation', stringStart);
  }

  private lookingAt(pattern: RegExp): boolean {
    pattern.lastIndex = this.pos;
    return pattern.test(this.text);
  }

  private push(kind: TokenKind, start: number): void {
    const { line, column } = this.lines.positionAt(start);
    this.tokens.push({
      kind,
      text: this.text.slice(start, this.pos),
      start,
      end: this.pos,
      line,
      column,
    });
  }
}

/**
 * Tokenize Swift source text
 * @throws ParseFailure when the text cannot be lexed
 */
export function tokenize(text: string): Token[] {
  return new Lexer(text).run();
}
