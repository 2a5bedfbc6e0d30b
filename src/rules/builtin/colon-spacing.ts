import type { SourceModel } from '../../source/source-model.js';
import { defineRule, noParameters } from '../types.js';
import { compact, noSpaceBefore, singleSpaceAfter } from '../helpers.js';

/**
 * Whether the colon at `index` belongs to a `cond ? a : b` expression
 */
function isTernaryColon(source: SourceModel, index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const token = source.tokens[i];
    if (token.kind === 'newline') return false;
    if (token.kind === 'brace') {
      if (token.text === ')' || token.text === ']' || token.text === '}') {
        const open = source.matchingBracket(i);
        if (open === -1) return false;
        i = open;
        continue;
      }
      return false;
    }
    if (token.kind === 'punctuation' && token.text !== '.') return false;
    if (token.kind === 'keyword' && (token.text === 'case' || token.text === 'default')) return false;
    if (token.kind === 'operator' && token.text === '?') {
      const before = source.tokens[i - 1];
      if (before && before.kind === 'whitespace') return true;
    }
  }
  return false;
}

/**
 * Colons in `[:]` and in argument-label lists such as `#selector(move(_:to:))`
 */
function isBareColon(source: SourceModel, index: number): boolean {
  const prev = source.tokens[index - 1];
  const next = source.tokens[index + 1];
  if (prev?.text === '[' && next?.text === ']') return true;

  const parent = source.enclosingBracket(index);
  if (parent === -1 || source.tokens[parent].text !== '(') return false;
  const close = source.matchingBracket(parent);
  return close > 0 && source.tokens[close - 1].text === ':';
}

export const colonSpacing = defineRule({
  meta: {
    id: 'spacing/colon-spacing',
    title: 'Colons have no space before and one space after',
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
        if (token.text !== ':') return;
        if (isTernaryColon(source, index) || isBareColon(source, index)) return;

        const next = source.tokens[index + 1];
        const closesGroup = next?.kind === 'brace' && (next.text === ')' || next.text === ']');
        const fix = compact([noSpaceBefore(source, index), closesGroup ? undefined : singleSpaceAfter(source, index)]);
        if (fix.length === 0) return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: 'Colon should have no space before it and a single space after it',
          fix,
        });
      },
    };
  },
});
