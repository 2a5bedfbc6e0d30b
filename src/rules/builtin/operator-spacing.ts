import { defineRule, noParameters } from '../types.js';
import { compact, insertAt, isLeftBound, isRightBound, singleSpaceAfter, singleSpaceBefore } from '../helpers.js';

/** Binary operators that take one space on each side */
const SPACED_OPERATORS: ReadonlySet<string> = new Set([
  '=', '==', '!=', '===', '!==', '~=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<=', '>>=',
  '+', '-', '*', '/', '%', '&', '|', '^',
  '&&', '||', '<=', '>=', '??', '->',
]);

export const operatorSpacing = defineRule({
  meta: {
    id: 'spacing/operator-spacing',
    title: 'Binary operators are surrounded by single spaces',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      operator(token, index) {
        if (!SPACED_OPERATORS.has(token.text)) return;

        const left = isLeftBound(source, index);
        const right = isRightBound(source, index);
        // Bound on one side only: a prefix or postfix use
        if (left !== right) return;

        // Unbound on both sides: only existing gaps are normalized, so `map(+)` stays
        const fix = left
          ? [insertAt(token.start, ' '), insertAt(token.end, ' ')]
          : compact([
              source.tokens[index - 1]?.kind === 'whitespace' ? singleSpaceBefore(source, index) : undefined,
              source.tokens[index + 1]?.kind === 'whitespace' ? singleSpaceAfter(source, index) : undefined,
            ]);
        if (fix.length === 0) return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: `Operator '${token.text}' should be surrounded by single spaces`,
          fix,
        });
      },
    };
  },
});
