import type { RunOutcome, RunReport, Severity } from '../types.js';

const SEVERITY_ORDER: Severity[] = ['info', 'warning', 'error'];

const EXIT_CODES: Record<RunOutcome, number> = {
  clean: 0,
  'violations-remain': 1,
  'tool-error': 2,
};

/**
 * Classify a whole run
 * @returns tool-error when any file hit a tool-level error or the run was
 * interrupted, violations-remain when a remaining style diagnostic is at or
 * above the threshold, clean otherwise
 */
export function computeOutcome(report: RunReport, failOn: Severity): RunOutcome {
  if (report.interrupted || report.files.some(file => file.outcome === 'tool-error')) {
    return 'tool-error';
  }

  const threshold = SEVERITY_ORDER.indexOf(failOn);

  const hasIssuesAtOrAbove = report.files.some(file =>
    file.diagnostics.some(
      d => !d.fixed && d.category !== 'tool-error' && SEVERITY_ORDER.indexOf(d.severity) >= threshold
    )
  );

  return hasIssuesAtOrAbove ? 'violations-remain' : 'clean';
}

/**
 * @returns 0 = clean, 1 = violations remain, 2 = tool error
 */
export function exitCodeFor(outcome: RunOutcome): number {
  return EXIT_CODES[outcome];
}
