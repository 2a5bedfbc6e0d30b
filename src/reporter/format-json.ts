import type { CheckOutput } from '../schema.js';
import type { RunReport, Severity } from '../types.js';
import { computeOutcome } from './exit-code.js';
import { computeSummary } from './report.js';

/**
 * Build the JSON document for a run. Contains nothing time- or
 * machine-dependent, so identical inputs give identical output.
 */
export function toCheckOutput(report: RunReport, failOn: Severity): CheckOutput {
  return {
    outcome: computeOutcome(report, failOn),
    interrupted: report.interrupted,
    summary: computeSummary(report),
    files: report.files.map(file => ({
      path: file.path,
      outcome: file.outcome,
      fixedCount: file.fixedCount,
      passes: file.passes,
    })),
    diagnostics: report.files.flatMap(file => file.diagnostics),
  };
}

export function formatJson(report: RunReport, failOn: Severity, pretty: boolean): string {
  const output = toCheckOutput(report, failOn);
  return (pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output)) + '\n';
}
