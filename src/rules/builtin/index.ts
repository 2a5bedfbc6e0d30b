import type { Rule } from '../types.js';
import { modifierOrder } from './modifier-order.js';
import { trailingClosureParens } from './trailing-closure-parens.js';
import { identifierCase } from './identifier-case.js';
import { typeNameCase } from './type-name-case.js';
import { noForceUnwrap } from './no-force-unwrap.js';
import { colonSpacing } from './colon-spacing.js';
import { commaSpacing } from './comma-spacing.js';
import { noTabIndentation } from './no-tab-indentation.js';
import { operatorSpacing } from './operator-spacing.js';
import { spaceBeforeBrace } from './space-before-brace.js';
import { trailingWhitespace } from './trailing-whitespace.js';
import { verticalWhitespace } from './vertical-whitespace.js';
import { braceSameLine } from './brace-same-line.js';
import { finalNewline } from './final-newline.js';
import { lineLength } from './line-length.js';
import { noSemicolons } from './no-semicolons.js';

/**
 * Every rule that ships with stylegate
 */
export const BUILTIN_RULES: readonly Rule[] = [
  modifierOrder,
  trailingClosureParens,
  identifierCase,
  typeNameCase,
  noForceUnwrap,
  colonSpacing,
  commaSpacing,
  noTabIndentation,
  operatorSpacing,
  spaceBeforeBrace,
  trailingWhitespace,
  verticalWhitespace,
  braceSameLine,
  finalNewline,
  lineLength,
  noSemicolons,
];
