import { compareIds } from '../rules/registry.js';
import type { Edit, Fix, Violation } from '../types.js';

/**
 * An edit remembered together with the rule that proposed it
 */
export interface TaggedEdit extends Edit {
  readonly ruleId: string;
}

export interface Resolution {
  /** Accepted edits, sorted by start offset, pairwise non-conflicting */
  edits: TaggedEdit[];
  /** Violations whose fixes were accepted */
  applied: Violation[];
  /** Violations whose fixes conflicted with an accepted one; retried next pass */
  deferred: Violation[];
}

/**
 * Two edits conflict when their spans overlap or when they start at the same
 * offset (two insertions at one point have no defined order).
 */
export function editsConflict(a: Edit, b: Edit): boolean {
  return a.startOffset === b.startOffset || (a.startOffset < b.endOffset && b.startOffset < a.endOffset);
}

/**
 * Pick the fixes to apply in one pass.
 * Fixes are considered in order of their first edit's start offset, then rule
 * id, and each fix is accepted or deferred as a whole.
 */
export function resolveEdits(violations: readonly Violation[]): Resolution {
  const candidates = violations.flatMap((violation, order) => {
    const fix: Fix | undefined = violation.fix;
    return fix && fix.edits.length > 0 ? [{ violation, fix, order }] : [];
  });

  candidates.sort(
    (a, b) =>
      a.fix.edits[0].startOffset - b.fix.edits[0].startOffset ||
      compareIds(a.violation.ruleId, b.violation.ruleId) ||
      a.order - b.order
  );

  const edits: TaggedEdit[] = [];
  const applied: Violation[] = [];
  const deferred: Violation[] = [];

  for (const { violation, fix } of candidates) {
    const conflicts = fix.edits.some(edit => edits.some(accepted => editsConflict(accepted, edit)));
    if (conflicts) {
      deferred.push(violation);
      continue;
    }
    for (const edit of fix.edits) {
      edits.push({ ...edit, ruleId: violation.ruleId });
    }
    applied.push(violation);
  }

  edits.sort((a, b) => a.startOffset - b.startOffset || a.endOffset - b.endOffset);
  return { edits, applied, deferred };
}

/**
 * Apply non-overlapping edits to `text`. Every offset refers to `text` as
 * given; nothing is re-based against partially edited output.
 */
export function applyEdits(text: string, edits: readonly Edit[]): string {
  const sorted = [...edits].sort((a, b) => a.startOffset - b.startOffset || a.endOffset - b.endOffset);

  let result = '';
  let cursor = 0;
  for (const edit of sorted) {
    if (edit.startOffset < cursor || edit.endOffset < edit.startOffset || edit.endOffset > text.length) {
      throw new Error(`Cannot apply edit [${edit.startOffset}, ${edit.endOffset}): overlaps or out of range`);
    }
    result += text.slice(cursor, edit.startOffset) + edit.text;
    cursor = edit.endOffset;
  }

  return result + text.slice(cursor);
}
