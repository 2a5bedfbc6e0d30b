import type { SourceModel } from '../../source/source-model.js';
import type { TokenKind } from '../../types.js';
import { defineRule, noParameters } from '../types.js';

const LAYOUT: ReadonlySet<TokenKind> = new Set(['whitespace', 'newline']);

/** Tokens after which a `{` on its own line starts a new element, not a body */
function startsElement(text: string): boolean {
  return ['(', '[', '{', '}', ',', ';'].includes(text);
}

function previousCodeToken(source: SourceModel, index: number): number {
  return source.previous(index, LAYOUT);
}

export const braceSameLine = defineRule({
  meta: {
    id: 'structure/brace-same-line',
    title: 'Opening braces do not start a new line',
    category: 'structure',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      brace(token, index) {
        if (token.text !== '{' || !source.startsLine(index)) return;

        const prev = previousCodeToken(source, index);
        if (prev === -1) return;
        const prevToken = source.tokens[prev];
        // a line comment cannot be followed by code on its line
        if (prevToken.kind === 'comment' || startsElement(prevToken.text)) return;

        context.report({
          startOffset: token.start,
          endOffset: token.end,
          message: 'Opening brace should be on the same line as the code it belongs to',
          fix: [{ startOffset: prevToken.end, endOffset: token.start, text: ' ' }],
        });
      },
    };
  },
});
