import { defineRule, noParameters } from '../types.js';
import { insertAt } from '../helpers.js';

export const finalNewline = defineRule({
  meta: {
    id: 'structure/final-newline',
    title: 'Files end with exactly one newline',
    category: 'structure',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    const { tokens, text } = source;
    return {
      file() {
        if (text.length === 0) return;

        let last = tokens.length - 1;
        while (last >= 0 && (tokens[last].kind === 'whitespace' || tokens[last].kind === 'newline')) {
          last--;
        }
        if (last === -1) return;

        const newlines: number[] = [];
        for (let i = last + 1; i < tokens.length; i++) {
          if (tokens[i].kind === 'newline') newlines.push(i);
        }

        if (newlines.length === 0) {
          context.report({
            startOffset: text.length,
            endOffset: text.length,
            message: 'File should end with a newline',
            fix: [insertAt(text.length, '\n')],
          });
          return;
        }

        if (newlines.length > 1) {
          const startOffset = tokens[newlines[0]].end;
          context.report({
            startOffset,
            endOffset: text.length,
            message: 'File should end with a single newline',
            fix: [{ startOffset, endOffset: text.length, text: '' }],
          });
        }
      },
    };
  },
});
