import { FixNotConverged } from '../errors.js';
import { compareIds } from '../rules/registry.js';
import type { RuleRegistry } from '../rules/registry.js';
import { LineIndex } from '../source/line-index.js';
import type { Parser } from '../source/parser.js';
import { buildSourceModel, type SourceModel } from '../source/source-model.js';
import type { Diagnostic, FileOutcome, FileResult, Violation } from '../types.js';
import { check } from './matcher.js';
import { applyEdits, resolveEdits } from './fixer.js';

export interface ProcessOptions {
  /** Apply fixes until the text converges */
  fix: boolean;
  parser: Parser;
}

function toDiagnostic(path: string, violation: Violation, lines: LineIndex, fixed: boolean): Diagnostic {
  const start = lines.positionAt(violation.startOffset);
  const end = lines.positionAt(violation.endOffset);
  return {
    path,
    line: start.line,
    column: start.column,
    endLine: end.line,
    endColumn: end.column,
    severity: violation.severity,
    category: violation.category,
    ruleId: violation.ruleId,
    message: violation.message,
    fixable: violation.fix !== undefined,
    fixed,
  };
}

export function toolDiagnostic(
  path: string,
  lines: LineIndex,
  code: string,
  message: string,
  offset = 0,
  severity: 'error' | 'warning' = 'error'
): Diagnostic {
  const { line, column } = lines.positionAt(offset);
  return {
    path,
    line,
    column,
    endLine: line,
    endColumn: column,
    severity,
    category: 'tool-error',
    ruleId: code,
    message,
    fixable: false,
    fixed: false,
  };
}

/**
 * Diagnostic for a file the tool could not process at all
 */
export function failedFileResult(path: string, text: string, code: string, message: string, offset = 0): FileResult {
  return {
    path,
    diagnostics: [toolDiagnostic(path, new LineIndex(text), code, message, offset)],
    fixedCount: 0,
    passes: 0,
    outcome: 'tool-error',
    output: text,
    changed: false,
  };
}

/**
 * Position, then rule id: the order violations come out of the matcher in
 */
function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return a.line - b.line || a.column - b.column || compareIds(a.ruleId, b.ruleId);
}

function classify(diagnostics: Diagnostic[], passes: number): FileOutcome {
  const remaining = diagnostics.filter(d => !d.fixed);
  if (remaining.some(d => d.category === 'tool-error' && d.severity === 'error')) {
    return 'tool-error';
  }
  if (remaining.some(d => d.category !== 'tool-error' && d.severity === 'error')) {
    return 'violations-remain';
  }
  return passes > 0 ? 'fixed' : 'clean';
}

/**
 * Check one file and, when asked, fix it.
 *
 * Each fix pass resolves the current violations into non-conflicting edits,
 * applies them to the pass's text, and re-parses. The loop ends when a pass
 * accepts no edits or after `maxFixIterations` passes.
 */
export function processSource(
  path: string,
  text: string,
  registry: RuleRegistry,
  options: ProcessOptions
): FileResult {
  const initial = buildSourceModel(path, text, options.parser);
  if (!initial.success) {
    return failedFileResult(path, text, initial.error.code, initial.error.message, initial.error.offset);
  }

  let model: SourceModel = initial.model;
  let violations = check(model, registry);
  const fixedDiagnostics: Diagnostic[] = [];
  const toolDiagnostics: Diagnostic[] = [];
  let passes = 0;

  if (options.fix) {
    const limit = registry.options.maxFixIterations;
    while (passes < limit) {
      const resolution = resolveEdits(violations);
      if (resolution.edits.length === 0) break;

      const nextText = applyEdits(model.text, resolution.edits);
      const parsed = options.parser.parse(nextText);
      if (!parsed.success) {
        const ruleIds = [...new Set(resolution.applied.map(v => v.ruleId))].join(', ');
        toolDiagnostics.push(
          toolDiagnostic(
            path,
            model.lines,
            'fix-parse-failure',
            `Fixes from ${ruleIds} produced unparsable ${options.parser.language} (${parsed.error.message}); those fixes were discarded`
          )
        );
        break;
      }

      for (const violation of resolution.applied) {
        fixedDiagnostics.push(toDiagnostic(path, violation, model.lines, true));
      }
      passes++;
      model = model.revise(nextText, parsed.tokens);
      violations = check(model, registry);
    }

    const pending = violations.filter(v => v.fix !== undefined);
    if (passes === limit && pending.length > 0) {
      const notConverged = new FixNotConverged(limit, [...new Set(pending.map(v => v.ruleId))]);
      toolDiagnostics.push(
        toolDiagnostic(path, model.lines, notConverged.code, notConverged.message, 0, 'warning')
      );
    }
  }

  const remaining = violations.map(v => toDiagnostic(path, v, model.lines, false));
  const unresolved = [...toolDiagnostics, ...remaining].sort(compareDiagnostics);
  const diagnostics = [...unresolved, ...fixedDiagnostics];

  return {
    path,
    diagnostics,
    fixedCount: fixedDiagnostics.length,
    passes,
    outcome: classify(diagnostics, passes),
    output: model.text,
    changed: model.text !== text,
  };
}
