import { RuleFault } from '../errors.js';
import { compareIds, type ActiveRule, type RuleRegistry } from '../rules/registry.js';
import type { ReportDescriptor, RuleVisitor, TokenHandler } from '../rules/types.js';
import type { SourceModel } from '../source/source-model.js';
import type { Edit, Fix, TokenKind, Violation } from '../types.js';

const TOKEN_KINDS: readonly TokenKind[] = [
  'identifier',
  'keyword',
  'attribute',
  'directive',
  'operator',
  'literal',
  'comment',
  'whitespace',
  'newline',
  'brace',
  'punctuation',
];

interface RuleState {
  rule: ActiveRule;
  reports: Violation[];
  fault?: RuleFault;
}

interface Subscription {
  state: RuleState;
  handler: TokenHandler;
}

/**
 * Canonical diagnostic order: start offset, then rule id
 */
export function compareViolations(a: Violation, b: Violation): number {
  return a.startOffset - b.startOffset || compareIds(a.ruleId, b.ruleId);
}

/**
 * Sort a fix's edits and make sure they stay inside the text and apart from each other
 */
function normalizeFix(edits: Edit[], textLength: number): Fix {
  const sorted = [...edits].sort((a, b) => a.startOffset - b.startOffset || a.endOffset - b.endOffset);
  for (let i = 0; i < sorted.length; i++) {
    const edit = sorted[i];
    if (edit.startOffset < 0 || edit.endOffset < edit.startOffset || edit.endOffset > textLength) {
      throw new Error(`Edit [${edit.startOffset}, ${edit.endOffset}) is outside the text`);
    }
    const prev = sorted[i - 1];
    if (prev && (edit.startOffset < prev.endOffset || edit.startOffset === prev.startOffset)) {
      throw new Error(`Edits [${prev.startOffset}, ${prev.endOffset}) and [${edit.startOffset}, ${edit.endOffset}) overlap`);
    }
  }
  return Object.freeze({ edits: Object.freeze(sorted.map(edit => Object.freeze({ ...edit }))) });
}

function toViolation(state: RuleState, descriptor: ReportDescriptor, source: SourceModel): Violation {
  const { startOffset, endOffset } = descriptor;
  if (startOffset < 0 || endOffset < startOffset || endOffset > source.text.length) {
    throw new Error(`Reported span [${startOffset}, ${endOffset}) is outside the text`);
  }

  const violation: Violation = {
    ruleId: state.rule.meta.id,
    category: state.rule.meta.category,
    severity: state.rule.severity,
    startOffset,
    endOffset,
    message: descriptor.message,
    ...(descriptor.fix && descriptor.fix.length > 0 && state.rule.meta.fixable
      ? { fix: normalizeFix(descriptor.fix, source.text.length) }
      : {}),
  };
  return Object.freeze(violation);
}

function faultViolation(fault: RuleFault): Violation {
  const violation: Violation = {
    ruleId: fault.ruleId,
    category: 'tool-error',
    severity: 'error',
    startOffset: 0,
    endOffset: 0,
    message: fault.message,
  };
  return Object.freeze(violation);
}

/**
 * Run every active rule over one source model.
 * Rules are visited in a single pass over the tokens, dispatched by token kind.
 * A rule that throws is dropped for this file and replaced by one RuleFault
 * violation; the other rules are unaffected.
 */
export function check(source: SourceModel, registry: RuleRegistry): Violation[] {
  const states: RuleState[] = [];
  const byKind = new Map<TokenKind, Subscription[]>();
  const fileHooks: Array<{ state: RuleState; hook: () => void }> = [];

  const guard = (state: RuleState, fn: () => void): void => {
    if (state.fault) return;
    try {
      fn();
    } catch (error) {
      state.fault = new RuleFault(state.rule.meta.id, error);
    }
  };

  for (const rule of registry.rules) {
    const state: RuleState = { rule, reports: [] };
    states.push(state);

    let visitor: RuleVisitor = {};
    guard(state, () => {
      visitor = rule.create({
        source,
        options: registry.options,
        report: descriptor => {
          state.reports.push(toViolation(state, descriptor, source));
        },
      });
    });

    for (const kind of TOKEN_KINDS) {
      const handler = visitor[kind];
      if (!handler) continue;
      const list = byKind.get(kind) ?? [];
      list.push({ state, handler });
      byKind.set(kind, list);
    }
    if (visitor.file) {
      fileHooks.push({ state, hook: visitor.file });
    }
  }

  source.tokens.forEach((token, index) => {
    const subscriptions = byKind.get(token.kind);
    if (!subscriptions) return;
    for (const { state, handler } of subscriptions) {
      guard(state, () => handler(token, index));
    }
  });

  for (const { state, hook } of fileHooks) {
    guard(state, hook);
  }

  const violations = states.flatMap(state => (state.fault ? [faultViolation(state.fault)] : state.reports));
  return violations.sort(compareViolations);
}
