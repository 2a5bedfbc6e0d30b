import { defineRule, noParameters } from '../types.js';
import { singleSpaceBefore } from '../helpers.js';

const OPENERS = new Set(['(', '[', '{']);

export const spaceBeforeBrace = defineRule({
  meta: {
    id: 'spacing/space-before-brace',
    title: 'An opening brace on the same line is preceded by one space',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      brace(token, index) {
        if (token.text !== '{' || index === 0) return;
        if (source.startsLine(index)) return;
        const prev = source.tokens[index - 1];
        if (prev.kind === 'brace' && OPENERS.has(prev.text)) return;

        const edit = singleSpaceBefore(source, index);
        if (!edit) return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: "Expected a single space before '{'",
          fix: [edit],
        });
      },
    };
  },
});
