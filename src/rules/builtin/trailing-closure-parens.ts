import type { SourceModel } from '../../source/source-model.js';
import { INLINE_SPACE } from '../../source/source-model.js';
import { defineRule, noParameters } from '../types.js';

/**
 * Keywords whose `{` belongs to the statement rather than to a call, e.g. the
 * body of `if isReady() {`
 */
const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  'if', 'guard', 'while', 'for', 'switch', 'where', 'catch', 'func', 'init', 'subscript',
]);

/**
 * Whether the call at `index` sits in the header of a statement. The walk
 * crosses line breaks, so continuation lines of a multi-line condition count,
 * and stops where the enclosing statement or bracket begins.
 */
function inStatementHeader(source: SourceModel, index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const token = source.tokens[i];
    if (token.kind === 'punctuation' && token.text === ';') return false;
    if (token.kind === 'brace') {
      if (token.text === ')' || token.text === ']') {
        const open = source.matchingBracket(i);
        if (open === -1) return false;
        i = open;
        continue;
      }
      return false;
    }
    if (token.kind === 'keyword' && STATEMENT_KEYWORDS.has(token.text)) {
      // `Type.init(...)` on an earlier line is an expression, not a header
      const prev = source.previous(i);
      if (prev !== -1 && source.tokens[prev].text === '.') continue;
      return true;
    }
  }
  return false;
}

export const trailingClosureParens = defineRule({
  meta: {
    id: 'closures/trailing-closure-parens',
    title: 'Empty parentheses are omitted before a trailing closure',
    category: 'closures',
    severity: 'warning',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      brace(token, index) {
        if (token.text !== '(') return;
        const close = source.matchingBracket(index);
        if (close !== index + 1) return;

        const callee = source.tokens[index - 1];
        if (!callee || callee.kind !== 'identifier') return;

        const after = source.next(close, INLINE_SPACE);
        if (after === -1 || source.tokens[after].text !== '{') return;
        if (inStatementHeader(source, index)) return;

        context.report({
          startOffset: token.start,
          endOffset: source.tokens[close].end,
          message: `Omit the empty parentheses in '${callee.text}()' before a trailing closure`,
          fix: [{ startOffset: token.start, endOffset: source.tokens[close].end, text: '' }],
        });
      },
    };
  },
});
