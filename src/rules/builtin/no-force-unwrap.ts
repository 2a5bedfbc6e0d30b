import type { SourceModel } from '../../source/source-model.js';
import { defineRule, noParameters } from '../types.js';

const TYPE_NAME = /^[A-Z]/;

/** `label: UILabel!` or `-> String!`: the `!` marks an implicitly unwrapped type */
function isTypeAnnotation(source: SourceModel, nameIndex: number): boolean {
  const name = source.tokens[nameIndex];
  if (name.kind !== 'identifier' || !TYPE_NAME.test(name.text)) return false;
  const before = source.previous(nameIndex);
  return before !== -1 && (source.tokens[before].text === ':' || source.tokens[before].text === '->');
}

export const noForceUnwrap = defineRule({
  meta: {
    id: 'optionals/no-force-unwrap',
    title: 'Optionals are unwrapped safely',
    category: 'optionals',
    severity: 'warning',
    fixable: false,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      operator(token, index) {
        if (token.text !== '!') return;
        const prev = source.tokens[index - 1];
        if (!prev) return;

        let message: string | undefined;
        if (isTypeAnnotation(source, index - 1)) {
          message = `Avoid implicitly unwrapped optionals; declare '${prev.text}?' and unwrap it safely`;
        } else if (prev.kind === 'keyword' && prev.text === 'try') {
          message = "Avoid 'try!'; handle the error or use 'try?'";
        } else if (prev.kind === 'keyword' && prev.text === 'as') {
          message = "Avoid force casts ('as!'); use 'as?' with optional binding";
        } else if (
          prev.kind === 'identifier' ||
          (prev.kind === 'keyword' && prev.text === 'self') ||
          (prev.kind === 'brace' && (prev.text === ')' || prev.text === ']'))
        ) {
          message = "Avoid force unwrapping; use optional binding, 'guard', or '??'";
        }
        if (!message) return;

        context.report({ startOffset: token.start, endOffset: token.end, message });
      },
    };
  },
});
