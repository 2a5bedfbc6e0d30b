import type { ParseFailure } from '../errors.js';
import type { Token, TokenKind } from '../types.js';
import { LineIndex, type Position } from './line-index.js';
import type { Parser } from './parser.js';

/** Kinds skipped by default when navigating between siblings */
export const TRIVIA: ReadonlySet<TokenKind> = new Set(['whitespace', 'newline', 'comment']);

/** Kinds skipped when staying on the same line */
export const INLINE_SPACE: ReadonlySet<TokenKind> = new Set(['whitespace']);

/** Keywords that introduce a braced construct */
const BLOCK_KEYWORDS: ReadonlySet<string> = new Set([
  'actor', 'class', 'enum', 'extension', 'protocol', 'struct',
  'func', 'init', 'deinit', 'subscript', 'var', 'let',
  'get', 'set', 'willSet', 'didSet',
  'if', 'else', 'guard', 'for', 'while', 'repeat', 'switch', 'do', 'catch', 'defer',
]);

const OPEN_BRACKETS = '([{';

/**
 * Token view of one file revision with positional and structural lookups.
 * A model never changes; applying edits yields a new model via `revise`.
 */
export class SourceModel {
  readonly lines: LineIndex;
  private readonly partners: number[];
  private readonly parents: number[];

  constructor(
    readonly path: string,
    readonly text: string,
    readonly tokens: readonly Token[],
    readonly revision: number
  ) {
    let expected = 0;
    for (const token of tokens) {
      if (token.start !== expected || token.end < token.start || text.slice(token.start, token.end) !== token.text) {
        throw new Error(`Token stream for ${path} does not cover the text at offset ${expected}`);
      }
      expected = token.end;
    }
    if (expected !== text.length) {
      throw new Error(`Token stream for ${path} ends at ${expected}, text length is ${text.length}`);
    }

    this.lines = new LineIndex(text);
    this.partners = new Array<number>(tokens.length).fill(-1);
    this.parents = new Array<number>(tokens.length).fill(-1);

    const stack: number[] = [];
    tokens.forEach((token, index) => {
      const isClose = token.kind === 'brace' && !OPEN_BRACKETS.includes(token.text);
      if (isClose) {
        const open = stack.pop();
        if (open !== undefined) {
          this.partners[open] = index;
          this.partners[index] = open;
        }
      }
      this.parents[index] = stack.length > 0 ? stack[stack.length - 1] : -1;
      if (token.kind === 'brace' && !isClose) {
        stack.push(index);
      }
    });
  }

  /** A later revision of the same file */
  revise(text: string, tokens: readonly Token[]): SourceModel {
    return new SourceModel(this.path, text, tokens, this.revision + 1);
  }

  /** Index of the token containing `offset`, or -1 */
  tokenIndexAt(offset: number): number {
    let low = 0;
    let high = this.tokens.length - 1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      const token = this.tokens[mid];
      if (offset < token.start) {
        high = mid - 1;
      } else if (offset >= token.end) {
        low = mid + 1;
      } else {
        return mid;
      }
    }
    return -1;
  }

  tokenAt(offset: number): Token | undefined {
    const index = this.tokenIndexAt(offset);
    return index === -1 ? undefined : this.tokens[index];
  }

  /** Index of the nearest preceding token whose kind is not in `skip`, or -1 */
  previous(index: number, skip: ReadonlySet<TokenKind> = TRIVIA): number {
    for (let i = index - 1; i >= 0; i--) {
      if (!skip.has(this.tokens[i].kind)) return i;
    }
    return -1;
  }

  /** Index of the nearest following token whose kind is not in `skip`, or -1 */
  next(index: number, skip: ReadonlySet<TokenKind> = TRIVIA): number {
    for (let i = index + 1; i < this.tokens.length; i++) {
      if (!skip.has(this.tokens[i].kind)) return i;
    }
    return -1;
  }

  /** Index of the bracket paired with the bracket at `index`, or -1 */
  matchingBracket(index: number): number {
    return this.partners[index] ?? -1;
  }

  /** Index of the innermost open bracket containing the token at `index`, or -1 */
  enclosingBracket(index: number): number {
    return this.parents[index] ?? -1;
  }

  /**
   * Keyword of the construct a `{` opens (`enum`, `func`, `if`, ...), found by
   * walking back to the previous statement boundary. Undefined when none.
   */
  declarationKeyword(openIndex: number): string | undefined {
    let i = this.previous(openIndex);
    while (i !== -1) {
      const token = this.tokens[i];
      if (token.kind === 'brace') {
        if (token.text === '{' || token.text === '}') return undefined;
        if (token.text === ')' || token.text === ']') {
          const open = this.matchingBracket(i);
          if (open === -1) return undefined;
          i = this.previous(open);
          continue;
        }
        return undefined;
      }
      if (token.kind === 'punctuation' && token.text === ';') return undefined;
      if (token.kind === 'keyword' && BLOCK_KEYWORDS.has(token.text)) return token.text;
      i = this.previous(i);
    }
    return undefined;
  }

  /** Whether only whitespace separates the token at `index` from the start of its line */
  startsLine(index: number): boolean {
    const prev = this.previous(index, INLINE_SPACE);
    return prev === -1 || this.tokens[prev].kind === 'newline';
  }

  /** Whether only whitespace separates the token at `index` from the end of its line */
  endsLine(index: number): boolean {
    const next = this.next(index, INLINE_SPACE);
    return next === -1 || this.tokens[next].kind === 'newline';
  }

  positionAt(offset: number): Position {
    return this.lines.positionAt(offset);
  }
}

export type BuildResult =
  | { success: true; model: SourceModel }
  | { success: false; error: ParseFailure };

/**
 * Parse `text` and build its source model
 */
export function buildSourceModel(path: string, text: string, parser: Parser, revision = 0): BuildResult {
  const parsed = parser.parse(text);
  if (!parsed.success) {
    return parsed;
  }
  return { success: true, model: new SourceModel(path, text, parsed.tokens, revision) };
}
