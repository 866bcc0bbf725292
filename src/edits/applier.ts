import type {
  ApplyOnOriginalOffsets,
  OverlapRejection
} from '../architecture';
import { InvalidEditError, OverlappingEditsError } from '../lib/errors';
import type { RefactorEdit, SourceUnit, TargetedEdit, TextSpan } from '../types';

function assertSpanInBounds(unit: SourceUnit, span: TextSpan): void {
  const { start, end } = span;
  const valid =
    Number.isInteger(start) &&
    Number.isInteger(end) &&
    start >= 0 &&
    start <= end &&
    end <= unit.text.length;

  if (!valid) {
    throw new InvalidEditError(
      `Edit span [${start}, ${end}) is outside ${unit.name} (length ${unit.text.length}).`,
      { unitName: unit.name, start, end, length: unit.text.length }
    );
  }
}

function compareEdits(a: RefactorEdit, b: RefactorEdit): number {
  return a.span.start - b.span.start || a.span.end - b.span.end;
}

function isInsertion(span: TextSpan): boolean {
  return span.start === span.end;
}

/**
 * Sorts a copy of `edits` and rejects any overlapping pair.
 *
 * After sorting by `(start, end)`, an edit overlaps an earlier one exactly
 * when it starts before the furthest end seen so far, or when both are
 * insertions at the same offset.
 *
 * @see {@link OverlapRejection}
 */
function sortAndCheckEdits(
  unit: SourceUnit,
  edits: readonly RefactorEdit[]
): RefactorEdit[] {
  for (const edit of edits) assertSpanInBounds(unit, edit.span);

  const sorted = [...edits].sort(compareEdits);
  let furthest: RefactorEdit | undefined;

  for (const edit of sorted) {
    if (furthest) {
      const intersects = edit.span.start < furthest.span.end;
      const sameInsertionPoint =
        isInsertion(edit.span) &&
        isInsertion(furthest.span) &&
        edit.span.start === furthest.span.start;

      if (intersects || sameInsertionPoint) {
        throw new OverlappingEditsError(unit.name, furthest.span, edit.span);
      }
    }

    if (!furthest || edit.span.end >= furthest.span.end) furthest = edit;
  }

  return sorted;
}

/**
 * Applies a set of edits to one unit.
 *
 * Every span refers to the original text. The result is the original text
 * with each span replaced, independent of the order `edits` is given in.
 *
 * @throws {InvalidEditError} A span is out of bounds or inverted.
 * @throws {OverlappingEditsError} Two edits overlap.
 *
 * @see {@link ApplyOnOriginalOffsets}
 */
export function applyEdits(
  unit: SourceUnit,
  edits: readonly RefactorEdit[]
): SourceUnit {
  if (edits.length === 0) return unit;

  const sorted = sortAndCheckEdits(unit, edits);
  const parts: string[] = [];
  let cursor = 0;

  for (const { span, replacement } of sorted) {
    parts.push(unit.text.slice(cursor, span.start), replacement);
    cursor = span.end;
  }
  parts.push(unit.text.slice(cursor));

  return Object.freeze({ name: unit.name, text: parts.join('') });
}

/**
 * Applies edits addressed to several units.
 *
 * Edits are grouped by `unitName`; each group is applied with
 * {@link applyEdits}. Units without edits are returned unchanged, in their
 * original order.
 *
 * @throws {InvalidEditError} An edit names a unit that is not in `units`.
 */
export function applyTargetedEdits(
  units: readonly SourceUnit[],
  edits: readonly TargetedEdit[]
): SourceUnit[] {
  const groups = new Map<string, RefactorEdit[]>(
    units.map(unit => [unit.name, []])
  );

  for (const { unitName, edit } of edits) {
    const group = groups.get(unitName);
    if (!group) {
      throw new InvalidEditError(`Edit targets unknown unit "${unitName}".`, {
        unitName
      });
    }
    group.push(edit);
  }

  return units.map(unit => applyEdits(unit, groups.get(unit.name) ?? []));
}
