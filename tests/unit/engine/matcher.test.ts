import { describe, expect, it } from 'vitest';
import { check } from '../../../src/engine/matcher.js';
import { commaSpacing } from '../../../src/rules/builtin/comma-spacing.js';
import { operatorSpacing } from '../../../src/rules/builtin/operator-spacing.js';
import { defineRule, noParameters, type ReportDescriptor, type Rule } from '../../../src/rules/types.js';
import { checkText, parseModel, registryOf, replacingRule } from '../../helpers.js';

function customRule(id: string, fixable: boolean, onFile: (report: (d: ReportDescriptor) => void, text: string) => void): Rule {
  return defineRule({
    meta: { id, title: id, category: 'structure', severity: 'error', fixable, enabledByDefault: true },
    parameters: noParameters,
    create({ source, report }) {
      return {
        file() {
          onFile(report, source.text);
        },
      };
    },
  });
}

const throwing = defineRule({
  meta: {
    id: 'structure/throws',
    title: 'Throws',
    category: 'structure',
    severity: 'warning',
    fixable: false,
    enabledByDefault: true,
  },
  parameters: noParameters,
  create() {
    return {
      identifier() {
        throw new Error('boom');
      },
    };
  },
});

describe('check', () => {
  it('orders violations by offset across rules', () => {
    const violations = checkText('let a=1,b=2', [operatorSpacing, commaSpacing]);
    expect(violations.map(v => [v.startOffset, v.ruleId])).toEqual([
      [5, 'spacing/operator-spacing'],
      [7, 'spacing/comma-spacing'],
      [9, 'spacing/operator-spacing'],
    ]);
  });

  it('breaks offset ties by rule id', () => {
    const violations = checkText('x', [replacingRule('z/rule', 'x', 'y'), replacingRule('a/rule', 'x', 'z')]);
    expect(violations.map(v => v.ruleId)).toEqual(['a/rule', 'z/rule']);
  });

  it('is deterministic', () => {
    const text = 'let a=1,b=2\nlet c=3';
    const registry = registryOf([operatorSpacing, commaSpacing]);
    expect(check(parseModel(text), registry)).toEqual(check(parseModel(text), registry));
  });

  it('carries the effective severity', () => {
    const [violation] = checkText('x=1', [operatorSpacing], {
      rules: { 'spacing/operator-spacing': { severity: 'info' } },
    });
    expect(violation.severity).toBe('info');
    expect(violation.category).toBe('spacing');
  });

  it('replaces the reports of a throwing rule with one fault', () => {
    const violations = checkText('x=1', [throwing, operatorSpacing]);
    expect(violations).toEqual([
      {
        ruleId: 'structure/throws',
        category: 'tool-error',
        severity: 'error',
        startOffset: 0,
        endOffset: 0,
        message: 'Rule structure/throws failed: boom',
      },
      {
        ruleId: 'spacing/operator-spacing',
        category: 'spacing',
        severity: 'error',
        startOffset: 1,
        endOffset: 2,
        message: "Operator '=' should be surrounded by single spaces",
        fix: { edits: [{ startOffset: 1, endOffset: 1, text: ' ' }, { startOffset: 2, endOffset: 2, text: ' ' }] },
      },
    ]);
  });

  it('faults a rule that reports outside the text', () => {
    const rule = customRule('structure/far', false, report => {
      report({ startOffset: 0, endOffset: 50, message: 'too far' });
    });
    const [violation] = checkText('abc', [rule]);
    expect(violation.category).toBe('tool-error');
    expect(violation.message).toBe('Rule structure/far failed: Reported span [0, 50) is outside the text');
  });

  it('faults a rule whose fix overlaps itself', () => {
    const rule = customRule('structure/overlap', true, report => {
      report({
        startOffset: 0,
        endOffset: 2,
        message: 'overlap',
        fix: [
          { startOffset: 0, endOffset: 2, text: 'x' },
          { startOffset: 1, endOffset: 3, text: 'y' },
        ],
      });
    });
    const [violation] = checkText('abc', [rule]);
    expect(violation.ruleId).toBe('structure/overlap');
    expect(violation.message).toBe('Rule structure/overlap failed: Edits [0, 2) and [1, 3) overlap');
  });

  it('drops fixes offered by rules that are not fixable', () => {
    const rule = customRule('structure/unfixable', false, report => {
      report({ startOffset: 0, endOffset: 1, message: 'nope', fix: [{ startOffset: 0, endOffset: 1, text: 'b' }] });
    });
    const [violation] = checkText('a', [rule]);
    expect(violation.fix).toBeUndefined();
  });

  it('sorts the edits of a fix', () => {
    const rule = customRule('structure/sorted', true, report => {
      report({
        startOffset: 0,
        endOffset: 3,
        message: 'wrap',
        fix: [
          { startOffset: 3, endOffset: 3, text: ')' },
          { startOffset: 0, endOffset: 0, text: '(' },
        ],
      });
    });
    const [violation] = checkText('abc', [rule]);
    expect(violation.fix?.edits.map(edit => edit.startOffset)).toEqual([0, 3]);
  });
});
