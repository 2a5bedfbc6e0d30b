import { describe, expect, it } from 'vitest';
import { formatJson, toCheckOutput } from '../../../src/reporter/format-json.js';
import { formatDiagnostic, formatText } from '../../../src/reporter/format-text.js';
import { computeSummary, mergeResults, renderReport, reportExitCode } from '../../../src/reporter/index.js';
import { CheckOutputSchema } from '../../../src/schema.js';
import type { RunReport } from '../../../src/types.js';
import { createColors } from '../../../src/utils/colors.js';
import { makeDiagnostic, makeFile, makeReport } from './fixtures.js';

function sampleReport(): RunReport {
  const a = makeFile(
    'a.swift',
    [
      makeDiagnostic({ path: 'a.swift' }),
      makeDiagnostic({
        path: 'a.swift',
        line: 3,
        column: 1,
        severity: 'warning',
        category: 'optionals',
        ruleId: 'optionals/no-force-unwrap',
        message: 'Avoid force unwrapping',
        fixable: false,
      }),
      makeDiagnostic({ path: 'a.swift', fixed: true }),
    ],
    { changed: true, passes: 1 }
  );
  const b = makeFile(
    'b.swift',
    [
      makeDiagnostic({
        path: 'b.swift',
        line: 2,
        column: 4,
        category: 'tool-error',
        ruleId: 'parse-failure',
        message: "Unclosed '('",
        fixable: false,
      }),
    ],
    { outcome: 'tool-error' }
  );
  return mergeResults([b, a], false);
}

describe('mergeResults', () => {
  it('orders files by path code units', () => {
    const report = mergeResults([makeFile('b.swift', []), makeFile('B.swift', []), makeFile('a.swift', [])], false);
    expect(report.files.map(file => file.path)).toEqual(['B.swift', 'a.swift', 'b.swift']);
  });
});

describe('computeSummary', () => {
  it('counts remaining and fixed diagnostics', () => {
    expect(computeSummary(sampleReport())).toEqual({
      files: 2,
      errors: 1,
      warnings: 1,
      info: 0,
      toolErrors: 1,
      fixable: 1,
      fixed: 1,
    });
  });
});

describe('formatText', () => {
  it('prints one line per remaining diagnostic and a summary', () => {
    expect(formatText(sampleReport(), { color: false })).toBe(
      [
        "a.swift:1:6: error: Operator '=' should be surrounded by single spaces [spacing/operator-spacing]",
        'a.swift:3:1: warning: Avoid force unwrapping [optionals/no-force-unwrap]',
        "b.swift:2:4: tool-error: Unclosed '(' [parse-failure]",
        '',
        '3 problems (1 error, 1 warning, 1 tool error) in 2 files',
        '1 problem fixable with --fix',
        'Fixed 1 problem in 1 file',
        '',
      ].join('\n')
    );
  });

  it('prints nothing for a clean run', () => {
    expect(formatText({ files: [makeFile('a.swift', [])], interrupted: false }, { color: false })).toBe('');
  });

  it('notes an interrupted run', () => {
    expect(formatText(makeReport([], true), { color: false })).toBe('Interrupted after 0 files\n');
  });

  it('colors the location, severity and rule id', () => {
    const line = formatDiagnostic(makeDiagnostic({ path: 'a.swift', message: 'm' }), createColors(true));
    expect(line).toBe('\x1b[1ma.swift:1:6\x1b[0m: \x1b[31merror\x1b[0m: m \x1b[90m[spacing/operator-spacing]\x1b[0m');
  });
});

describe('formatJson', () => {
  it('matches the output schema', () => {
    const parsed = CheckOutputSchema.safeParse(JSON.parse(formatJson(sampleReport(), 'error', false)));
    expect(parsed.success).toBe(true);
  });

  it('lists files and every diagnostic, fixed ones included', () => {
    const output = toCheckOutput(sampleReport(), 'error');
    expect(output.outcome).toBe('tool-error');
    expect(output.interrupted).toBe(false);
    expect(output.files).toEqual([
      { path: 'a.swift', outcome: 'violations-remain', fixedCount: 1, passes: 1 },
      { path: 'b.swift', outcome: 'tool-error', fixedCount: 0, passes: 0 },
    ]);
    expect(output.diagnostics.map(d => [d.path, d.ruleId, d.fixed])).toEqual([
      ['a.swift', 'spacing/operator-spacing', false],
      ['a.swift', 'optionals/no-force-unwrap', false],
      ['a.swift', 'spacing/operator-spacing', true],
      ['b.swift', 'parse-failure', false],
    ]);
  });

  it('is a single line unless pretty', () => {
    const compact = formatJson(sampleReport(), 'error', false);
    expect(compact.trimEnd().split('\n')).toHaveLength(1);
    expect(formatJson(sampleReport(), 'error', true).startsWith('{\n  "outcome": "tool-error"')).toBe(true);
  });
});

describe('renderReport', () => {
  it('picks the formatter', () => {
    const report = makeReport(['warning']);
    const options = { failOn: 'error' as const, pretty: false, color: false };
    expect(renderReport(report, { ...options, format: 'json' })).toBe(formatJson(report, 'error', false));
    expect(renderReport(report, { ...options, format: 'text' })).toBe(formatText(report, { color: false }));
  });

  it('exit code follows the threshold', () => {
    expect(reportExitCode(makeReport(['warning']), 'error')).toBe(0);
    expect(reportExitCode(makeReport(['warning']), 'warning')).toBe(1);
  });
});
