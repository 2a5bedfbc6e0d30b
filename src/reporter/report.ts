import { compareIds } from '../rules/registry.js';
import type { FileResult, RunReport, Summary } from '../types.js';

/**
 * Merge per-file results in path order, whatever order they finished in
 */
export function mergeResults(results: FileResult[], interrupted: boolean): RunReport {
  return {
    files: [...results].sort((a, b) => compareIds(a.path, b.path)),
    interrupted,
  };
}

/**
 * Compute summary statistics from diagnostics
 */
export function computeSummary(report: RunReport): Summary {
  const all = report.files.flatMap(file => file.diagnostics);
  const remaining = all.filter(d => !d.fixed);
  const style = remaining.filter(d => d.category !== 'tool-error');

  return {
    files: report.files.length,
    errors: style.filter(d => d.severity === 'error').length,
    warnings: style.filter(d => d.severity === 'warning').length,
    info: style.filter(d => d.severity === 'info').length,
    toolErrors: remaining.length - style.length,
    fixable: remaining.filter(d => d.fixable).length,
    fixed: all.length - remaining.length,
  };
}
