import { INLINE_SPACE, type SourceModel } from '../source/source-model.js';
import type { Edit, Token } from '../types.js';

const LEFT_DELIMITERS = new Set(['(', '[', '{', ',', ';', ':']);
const RIGHT_DELIMITERS = new Set([')', ']', '}', ',', ';', ':']);

function isSpace(token: Token | undefined): boolean {
  return token === undefined || token.kind === 'whitespace' || token.kind === 'newline' || token.kind === 'comment';
}

/**
 * Whether an operator touches the token before it. Opening brackets and
 * separators count as whitespace, as in the Swift lexer.
 */
export function isLeftBound(source: SourceModel, index: number): boolean {
  const prev = source.tokens[index - 1];
  return !isSpace(prev) && !LEFT_DELIMITERS.has(prev.text);
}

/**
 * Whether an operator touches the token after it. Closing brackets and
 * separators count as whitespace.
 */
export function isRightBound(source: SourceModel, index: number): boolean {
  const next = source.tokens[index + 1];
  return !isSpace(next) && !RIGHT_DELIMITERS.has(next.text);
}

/** Replace `token` with `text` */
export function replaceToken(token: Token, text: string): Edit {
  return { startOffset: token.start, endOffset: token.end, text };
}

/** Delete `token` */
export function removeToken(token: Token): Edit {
  return replaceToken(token, '');
}

/** Insert `text` at `offset` */
export function insertAt(offset: number, text: string): Edit {
  return { startOffset: offset, endOffset: offset, text };
}

/**
 * Edit making the gap before the token at `index` a single space, or
 * undefined when it already is one. Indentation and line breaks are left alone.
 */
export function singleSpaceBefore(source: SourceModel, index: number): Edit | undefined {
  const prev = source.tokens[index - 1];
  if (!prev || prev.kind === 'newline') return undefined;
  if (prev.kind === 'whitespace') {
    if (prev.text === ' ' || source.startsLine(index)) return undefined;
    return replaceToken(prev, ' ');
  }
  return insertAt(source.tokens[index].start, ' ');
}

/**
 * Edit making the gap after the token at `index` a single space, or undefined
 * when it already is one. Gaps before a line end or a comment are left alone.
 */
export function singleSpaceAfter(source: SourceModel, index: number): Edit | undefined {
  const next = source.tokens[index + 1];
  if (!next || next.kind === 'newline' || next.kind === 'comment') return undefined;
  if (next.kind === 'whitespace') {
    const after = source.tokens[index + 2];
    if (next.text === ' ' || !after || after.kind === 'newline' || after.kind === 'comment') return undefined;
    return replaceToken(next, ' ');
  }
  return insertAt(source.tokens[index].end, ' ');
}

/**
 * Edit removing whitespace directly before the token at `index`, unless the
 * whitespace is indentation
 */
export function noSpaceBefore(source: SourceModel, index: number): Edit | undefined {
  const prev = source.tokens[index - 1];
  if (!prev || prev.kind !== 'whitespace' || source.startsLine(index)) return undefined;
  return removeToken(prev);
}

/** Leading whitespace of the line containing `offset` */
export function indentationAt(source: SourceModel, offset: number): string {
  const { line } = source.positionAt(offset);
  const text = source.lines.lineText(line);
  return /^[ \t]*/.exec(text)?.[0] ?? '';
}

/** Whether the token at `index` is followed on its line only by whitespace or a comment */
export function endsStatementLine(source: SourceModel, index: number): boolean {
  const next = source.next(index, INLINE_SPACE);
  if (next === -1 || source.tokens[next].kind === 'newline') return true;
  if (source.tokens[next].kind !== 'comment') return false;
  const afterComment = source.next(next, INLINE_SPACE);
  return afterComment === -1 || source.tokens[afterComment].kind === 'newline';
}

/** Strips the backticks of an escaped identifier */
export function identifierName(token: Token): string {
  return token.text.startsWith('`') ? token.text.slice(1, -1) : token.text;
}

export function compact<T>(items: Array<T | undefined>): T[] {
  return items.filter((item): item is T => item !== undefined);
}
