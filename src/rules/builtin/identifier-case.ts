import type { SourceModel } from '../../source/source-model.js';
import type { Token } from '../../types.js';
import { defineRule, noParameters } from '../types.js';
import { identifierName } from '../helpers.js';

const LOWER_CAMEL_CASE = /^[a-z][A-Za-z0-9]*$/;

/**
 * Names declared by an enum `case`: the identifier after `case` and after each
 * comma of the same declaration
 */
function caseNames(source: SourceModel, caseIndex: number): Token[] {
  const names: Token[] = [];
  let expectName = true;
  for (let i = source.next(caseIndex); i !== -1; i = source.next(i)) {
    const token = source.tokens[i];
    if (expectName) {
      if (token.kind !== 'identifier') break;
      names.push(token);
      expectName = false;
      continue;
    }
    if (token.kind === 'brace' && (token.text === '(' || token.text === '[')) {
      const close = source.matchingBracket(i);
      if (close === -1) break;
      i = close;
      continue;
    }
    if (token.text === ',') {
      expectName = true;
      continue;
    }
    // a value after `=` may continue, anything else on the next line ends the case
    if (source.startsLine(i)) break;
  }
  return names;
}

function isEnumCase(source: SourceModel, index: number): boolean {
  const parent = source.enclosingBracket(index);
  return parent !== -1 && source.tokens[parent].text === '{' && source.declarationKeyword(parent) === 'enum';
}

export const identifierCase = defineRule({
  meta: {
    id: 'naming/identifier-case',
    title: 'Variables, constants, functions and enum cases are lowerCamelCase',
    category: 'naming',
    severity: 'error',
    fixable: false,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create(context) {
    const { source } = context;

    const checkName = (token: Token): void => {
      const name = identifierName(token);
      if (LOWER_CAMEL_CASE.test(name) || token.text === '_') return;
      context.report({
        startOffset: token.start,
        endOffset: token.end,
        message: `Name '${name}' should be lowerCamelCase`,
      });
    };

    return {
      keyword(token, index) {
        if (token.text === 'case') {
          if (isEnumCase(source, index)) {
            caseNames(source, index).forEach(checkName);
          }
          return;
        }

        if (token.text !== 'let' && token.text !== 'var' && token.text !== 'func') return;
        const next = source.next(index);
        // tuple patterns, operator functions
        if (next === -1 || source.tokens[next].kind !== 'identifier') return;
        checkName(source.tokens[next]);
      },
    };
  },
});
