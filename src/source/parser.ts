import { ParseFailure } from '../errors.js';
import type { Token } from '../types.js';
import { tokenize } from './lexer.js';

export type ParseResult =
  | { success: true; tokens: Token[] }
  | { success: false; error: ParseFailure };

/**
 * Produces the token stream the engine checks. Implementations must return
 * tokens that cover the text contiguously.
 */
export interface Parser {
  /** Language name, used in messages */
  readonly language: string;
  /** File extensions this parser handles, without the dot */
  readonly extensions: readonly string[];
  parse(text: string): ParseResult;
}

export const swiftParser: Parser = {
  language: 'swift',
  extensions: ['swift'],
  parse(text: string): ParseResult {
    try {
      return { success: true, tokens: tokenize(text) };
    } catch (error) {
      if (error instanceof ParseFailure) {
        return { success: false, error };
      }
      throw error;
    }
  },
};
