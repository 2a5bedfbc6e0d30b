import { defineRule, noParameters } from '../types.js';
import { compact, noSpaceBefore, singleSpaceAfter } from '../helpers.js';

export const commaSpacing = defineRule({
  meta: {
    id: 'spacing/comma-spacing',
    title: 'Commas have no space before and one space after',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      punctuation(token, index) {
        if (token.text !== ',') return;

        const next = source.tokens[index + 1];
        // trailing comma in a collection literal
        const closesGroup = next?.kind === 'brace' && (next.text === ')' || next.text === ']');
        const fix = compact([noSpaceBefore(source, index), closesGroup ? undefined : singleSpaceAfter(source, index)]);
        if (fix.length === 0) return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: 'Comma should have no space before it and a single space after it',
          fix,
        });
      },
    };
  },
});
