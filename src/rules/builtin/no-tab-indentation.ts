import { defineRule, noParameters } from '../types.js';
import { replaceToken } from '../helpers.js';

export const noTabIndentation = defineRule({
  meta: {
    id: 'spacing/no-tab-indentation',
    title: 'Indentation uses spaces, not tabs',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source, options } = context;
    return {
      whitespace(token, index) {
        if (!token.text.includes('\t')) return;
        const prev = source.tokens[index - 1];
        if (prev && prev.kind !== 'newline') return;
        // whitespace-only lines are trailing whitespace
        const next = source.tokens[index + 1];
        if (!next || next.kind === 'newline') return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: 'Indent with spaces, not tabs',
          fix: [replaceToken(token, token.text.replaceAll('\t', ' '.repeat(options.indentWidth)))],
        });
      },
    };
  },
});
