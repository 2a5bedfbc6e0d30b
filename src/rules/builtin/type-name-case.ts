import { defineRule, noParameters } from '../types.js';
import { identifierName } from '../helpers.js';

const TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  'actor', 'associatedtype', 'class', 'enum', 'protocol', 'struct', 'typealias',
]);

const UPPER_CAMEL_CASE = /^[A-Z][A-Za-z0-9]*$/;

export const typeNameCase = defineRule({
  meta: {
    id: 'naming/type-name-case',
    title: 'Type names are UpperCamelCase',
    category: 'naming',
    severity: 'error',
    fixable: false,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;
    return {
      keyword(token, index) {
        if (!TYPE_KEYWORDS.has(token.text)) return;
        const next = source.next(index);
        // `class func`, `class var` and friends
        if (next === -1 || source.tokens[next].kind !== 'identifier') return;

        const nameToken = source.tokens[next];
        const name = identifierName(nameToken);
        if (UPPER_CAMEL_CASE.test(name)) return;

        context.report({
          startOffset: nameToken.start,
          endOffset: nameToken.end,
          message: `Type name '${name}' should be UpperCamelCase`,
        });
      },
    };
  },
});
