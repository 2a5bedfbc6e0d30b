import type { OutputFormat, RunReport, Severity } from '../types.js';
import { computeOutcome, exitCodeFor } from './exit-code.js';
import { formatJson } from './format-json.js';
import { formatText } from './format-text.js';

export interface ReportOptions {
  format: OutputFormat;
  failOn: Severity;
  pretty: boolean;
  color: boolean;
}

export function renderReport(report: RunReport, options: ReportOptions): string {
  return options.format === 'json'
    ? formatJson(report, options.failOn, options.pretty)
    : formatText(report, { color: options.color });
}

/**
 * Exit code for a finished run: 0 clean, 1 violations remain, 2 tool error
 */
export function reportExitCode(report: RunReport, failOn: Severity): number {
  return exitCodeFor(computeOutcome(report, failOn));
}

export { computeOutcome, exitCodeFor } from './exit-code.js';
export { computeSummary, mergeResults } from './report.js';
export { createLogger, silentLogger, type Logger, type MessageStream } from './logger.js';
