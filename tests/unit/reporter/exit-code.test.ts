import { describe, expect, it } from 'vitest';
import { computeOutcome, exitCodeFor } from '../../../src/reporter/exit-code.js';
import { makeDiagnostic, makeFile, makeReport } from './fixtures.js';

describe('computeOutcome', () => {
  describe('with failOn = error', () => {
    it('is clean when there are no diagnostics', () => {
      expect(computeOutcome(makeReport([]), 'error')).toBe('clean');
    });

    it('is violations-remain when there are errors', () => {
      expect(computeOutcome(makeReport(['error']), 'error')).toBe('violations-remain');
    });

    it('is clean when there are only warnings or info', () => {
      expect(computeOutcome(makeReport(['warning', 'info']), 'error')).toBe('clean');
    });
  });

  describe('with failOn = warning', () => {
    it('fails on warnings', () => {
      expect(computeOutcome(makeReport(['warning']), 'warning')).toBe('violations-remain');
    });

    it('ignores info', () => {
      expect(computeOutcome(makeReport(['info']), 'warning')).toBe('clean');
    });
  });

  describe('with failOn = info', () => {
    it('fails on any remaining diagnostic', () => {
      expect(computeOutcome(makeReport(['info']), 'info')).toBe('violations-remain');
    });
  });

  it('ignores diagnostics that were fixed', () => {
    const report = { files: [makeFile('a.swift', [makeDiagnostic({ fixed: true })])], interrupted: false };
    expect(computeOutcome(report, 'info')).toBe('clean');
  });

  it('is tool-error when a file hit a tool-level error', () => {
    const failure = makeDiagnostic({ category: 'tool-error', ruleId: 'parse-failure', fixable: false });
    const report = {
      files: [makeFile('a.swift', [failure], { outcome: 'tool-error' }), makeFile('b.swift', [])],
      interrupted: false,
    };
    expect(computeOutcome(report, 'error')).toBe('tool-error');
  });

  it('is tool-error when the run was interrupted', () => {
    expect(computeOutcome(makeReport([], true), 'error')).toBe('tool-error');
  });

  it('does not count a convergence warning as a violation', () => {
    const warning = makeDiagnostic({ category: 'tool-error', ruleId: 'fix-not-converged', severity: 'warning' });
    const report = { files: [makeFile('a.swift', [warning])], interrupted: false };
    expect(computeOutcome(report, 'info')).toBe('clean');
  });
});

describe('exitCodeFor', () => {
  it('maps outcomes to 0, 1 and 2', () => {
    expect(exitCodeFor('clean')).toBe(0);
    expect(exitCodeFor('violations-remain')).toBe(1);
    expect(exitCodeFor('tool-error')).toBe(2);
  });
});
