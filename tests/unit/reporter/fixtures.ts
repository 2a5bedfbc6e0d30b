import type { Diagnostic, FileResult, RunReport, Severity } from '../../../src/types.js';

export function makeDiagnostic(overrides: Partial<Diagnostic> = {}): Diagnostic {
  return {
    path: 'Sources/App.swift',
    line: 1,
    column: 6,
    endLine: 1,
    endColumn: 7,
    severity: 'error',
    category: 'spacing',
    ruleId: 'spacing/operator-spacing',
    message: "Operator '=' should be surrounded by single spaces",
    fixable: true,
    fixed: false,
    ...overrides,
  };
}

export function makeFile(path: string, diagnostics: Diagnostic[], overrides: Partial<FileResult> = {}): FileResult {
  const remaining = diagnostics.filter(d => !d.fixed);
  return {
    path,
    diagnostics,
    fixedCount: diagnostics.length - remaining.length,
    passes: 0,
    outcome: remaining.some(d => d.severity === 'error') ? 'violations-remain' : 'clean',
    output: '',
    changed: false,
    ...overrides,
  };
}

export function makeReport(severities: Severity[], interrupted = false): RunReport {
  return {
    files: severities.map((severity, i) => makeFile(`file${i}.swift`, [makeDiagnostic({ path: `file${i}.swift`, severity })])),
    interrupted,
  };
}
