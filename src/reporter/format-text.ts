import { createColors, type Colors } from '../utils/colors.js';
import type { Diagnostic, RunReport, Summary } from '../types.js';
import { computeSummary } from './report.js';

export interface TextFormatOptions {
  color: boolean;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/** `tool-error` for faults of the tool itself, the severity otherwise */
export function severityLabel(diagnostic: Diagnostic): string {
  return diagnostic.category === 'tool-error' && diagnostic.severity === 'error' ? 'tool-error' : diagnostic.severity;
}

function paintLabel(label: string, colors: Colors): string {
  switch (label) {
    case 'error':
    case 'tool-error':
      return colors.red(label);
    case 'warning':
      return colors.yellow(label);
    default:
      return colors.cyan(label);
  }
}

/**
 * `path:line:col: severity: message [rule-id]`
 */
export function formatDiagnostic(diagnostic: Diagnostic, colors: Colors = createColors(false)): string {
  const location = `${diagnostic.path}:${diagnostic.line}:${diagnostic.column}`;
  const label = paintLabel(severityLabel(diagnostic), colors);
  return `${colors.bold(location)}: ${label}: ${diagnostic.message} ${colors.gray(`[${diagnostic.ruleId}]`)}`;
}

function summaryLines(report: RunReport, summary: Summary, colors: Colors): string[] {
  const lines: string[] = [];
  const remaining = summary.errors + summary.warnings + summary.info + summary.toolErrors;

  if (remaining > 0) {
    const parts = [plural(summary.errors, 'error'), plural(summary.warnings, 'warning')];
    if (summary.info > 0) parts.push(`${summary.info} info`);
    if (summary.toolErrors > 0) parts.push(plural(summary.toolErrors, 'tool error'));
    const files = report.files.filter(file => file.diagnostics.some(d => !d.fixed)).length;
    const line = `${plural(remaining, 'problem')} (${parts.join(', ')}) in ${plural(files, 'file')}`;
    lines.push(summary.errors + summary.toolErrors > 0 ? colors.red(line) : colors.yellow(line));
    if (summary.fixable > 0) {
      lines.push(`${plural(summary.fixable, 'problem')} fixable with --fix`);
    }
  }

  if (summary.fixed > 0) {
    const changed = report.files.filter(file => file.changed).length;
    lines.push(colors.green(`Fixed ${plural(summary.fixed, 'problem')} in ${plural(changed, 'file')}`));
  }

  if (report.interrupted) {
    lines.push(colors.red(`Interrupted after ${plural(report.files.length, 'file')}`));
  }

  return lines;
}

/**
 * Render remaining diagnostics one per line, followed by a summary
 */
export function formatText(report: RunReport, options: TextFormatOptions): string {
  const colors = createColors(options.color);
  const lines: string[] = [];

  for (const file of report.files) {
    for (const diagnostic of file.diagnostics) {
      if (!diagnostic.fixed) {
        lines.push(formatDiagnostic(diagnostic, colors));
      }
    }
  }

  const summary = summaryLines(report, computeSummary(report), colors);
  if (summary.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(...summary);
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}
