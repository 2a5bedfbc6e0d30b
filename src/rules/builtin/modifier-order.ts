import { INLINE_SPACE } from '../../source/source-model.js';
import type { Token } from '../../types.js';
import { defineRule, noParameters } from '../types.js';

const ACCESS_MODIFIERS: ReadonlySet<string> = new Set(['open', 'public', 'internal', 'fileprivate', 'private']);

const OTHER_MODIFIERS: ReadonlySet<string> = new Set([
  'convenience', 'dynamic', 'final', 'indirect', 'lazy', 'mutating', 'nonmutating',
  'override', 'required', 'static', 'unowned', 'weak',
]);

function isModifier(token: Token | undefined): token is Token {
  return token !== undefined && token.kind === 'keyword' && (ACCESS_MODIFIERS.has(token.text) || OTHER_MODIFIERS.has(token.text));
}

export const modifierOrder = defineRule({
  meta: {
    id: 'access-control/modifier-order',
    title: 'Access control comes first among declaration modifiers',
    category: 'access-control',
    severity: 'warning',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      keyword(token, index) {
        if (!isModifier(token)) return;
        const prev = source.previous(index, INLINE_SPACE);
        // only look at the first modifier of a run
        if (prev !== -1 && isModifier(source.tokens[prev])) return;

        const run: Token[] = [token];
        for (let i = source.next(index, INLINE_SPACE); i !== -1; i = source.next(i, INLINE_SPACE)) {
          const next = source.tokens[i];
          // private(set) and friends are left as written
          if (next.text === '(') return;
          if (!isModifier(next)) break;
          run.push(next);
        }

        const firstAccess = run.findIndex(modifier => ACCESS_MODIFIERS.has(modifier.text));
        if (firstAccess <= 0) return;

        const reordered = [
          ...run.filter(modifier => ACCESS_MODIFIERS.has(modifier.text)),
          ...run.filter(modifier => !ACCESS_MODIFIERS.has(modifier.text)),
        ];
        const startOffset = run[0].start;
        const endOffset = run[run.length - 1].end;

        context.report({
          startOffset: run[firstAccess].start,
          endOffset: run[firstAccess].end,
          message: `Access modifier '${run[firstAccess].text}' should come before '${run[0].text}'`,
          fix: [{ startOffset, endOffset, text: reordered.map(modifier => modifier.text).join(' ') }],
        });
      },
    };
  },
});
