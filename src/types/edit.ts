import type { ApplyOnOriginalOffsets } from '../architecture';

/**
 * Half-open character range `[start, end)` into a unit's original text.
 * An empty span (`start === end`) is an insertion point.
 */
export type TextSpan = Readonly<{
  start: number;
  end: number;
}>;

/**
 * Replacement of one contiguous span with new text.
 *
 * Offsets always refer to the text the node was parsed from.
 *
 * @see {@link ApplyOnOriginalOffsets}
 */
export type RefactorEdit = Readonly<{
  span: TextSpan;
  replacement: string;
}>;

/**
 * An edit addressed to a named document.
 */
export type TargetedEdit = Readonly<{
  unitName: string;
  edit: RefactorEdit;
}>;
