import { defineRule, noParameters } from '../types.js';
import { removeToken } from '../helpers.js';

const TRAILING_SPACE = /[ \t]+$/;

export const trailingWhitespace = defineRule({
  meta: {
    id: 'spacing/trailing-whitespace',
    title: 'Lines do not end with whitespace',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    const message = 'Trailing whitespace';
    return {
      whitespace(token, index) {
        const next = source.tokens[index + 1];
        if (next && next.kind !== 'newline') return;
        context.report({ startOffset: token.start, endOffset: token.end, message, fix: [removeToken(token)] });
      },
      comment(token) {
        if (!token.text.startsWith('//')) return;
        const match = TRAILING_SPACE.exec(token.text);
        if (!match) return;
        const startOffset = token.start + match.index;
        context.report({
          startOffset,
          endOffset: token.end,
          message,
          fix: [{ startOffset, endOffset: token.end, text: '' }],
        });
      },
    };
  },
});
