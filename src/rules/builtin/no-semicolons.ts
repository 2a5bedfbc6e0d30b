import { defineRule, noParameters } from '../types.js';
import { endsStatementLine, indentationAt, removeToken } from '../helpers.js';

export const noSemicolons = defineRule({
  meta: {
    id: 'structure/no-semicolons',
    title: 'Statements are neither terminated nor separated by semicolons',
    category: 'structure',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      punctuation(token, index) {
        if (token.text !== ';') return;

        if (endsStatementLine(source, index)) {
          context.report({
            startOffset: token.start,
            endOffset: token.end,
            message: 'Statements should not end with a semicolon',
            fix: [removeToken(token)],
          });
          return;
        }

        const next = source.tokens[index + 1];
        const endOffset = next.kind === 'whitespace' ? next.end : token.end;
        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: 'Put each statement on its own line instead of separating them with semicolons',
          fix: [{ startOffset: token.start, endOffset, text: '\n' + indentationAt(source, token.start) }],
        });
      },
    };
  },
});
