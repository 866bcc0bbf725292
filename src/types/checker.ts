import type { types } from 'estree-toolkit';
import type { RefactorEdit } from './edit';
import type { MatchContext, NodeKind, NodeOfKind } from './matcher';

/**
 * Outcome of a handler that did not flag the node.
 */
export type NoMatch = Readonly<{ matched: false }>;

/**
 * Outcome of a handler that flagged the node.
 *
 * `edit: null` means "matched, but no fix is available". That is a valid,
 * reportable result and is not an error.
 */
export type MatchFound = Readonly<{
  matched: true;

  /**
   * Name of the checker that produced the match.
   */
  checkerName: string;

  /**
   * The flagged node.
   */
  node: types.Node;

  /**
   * Human-readable description of the finding.
   */
  message: string;

  /**
   * The single suggested edit, if any.
   */
  edit: RefactorEdit | null;
}>;

export type MatchDescription = NoMatch | MatchFound;

/**
 * Handler invoked once per visited node of kind `K`.
 */
export type CheckerHandler<K extends NodeKind> = (
  node: NodeOfKind<K>,
  context: MatchContext
) => MatchDescription;

/**
 * Kind-to-handler dispatch table.
 *
 * @example
 * ```ts
 * const visitors: CheckerVisitors = {
 *   ReturnStatement(node, context) { ... }
 * };
 * ```
 */
export type CheckerVisitors = { [K in NodeKind]?: CheckerHandler<K> };

/**
 * A named detection rule with optional fix.
 */
export type Checker = Readonly<{
  /**
   * Stable identifier used in reports (e.g. `"EagerAssertionMessage"`).
   */
  name: string;

  /**
   * One-line description used as the default match message.
   */
  summary: string;

  visitors: CheckerVisitors;
}>;
