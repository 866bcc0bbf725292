import type { types } from 'estree-toolkit';

import type {
  Checker,
  MatchFound,
  NoMatch,
  RefactorEdit
} from '../types';

/**
 * Shared "did not match" result.
 */
export const NO_MATCH: NoMatch = Object.freeze({ matched: false });

/**
 * Identity helper that types a checker definition.
 *
 * Usage:
 * ```ts
 * export const returnNull: Checker = defineChecker({
 *   name: 'ReturnNull',
 *   summary: 'Returns null instead of nothing',
 *   visitors: {
 *     ReturnStatement(node) {
 *       return node.argument
 *         ? NO_MATCH
 *         : describeMatch(returnNull, node, { edit: replaceNode(node, 'return null;') });
 *     }
 *   }
 * });
 * ```
 */
export function defineChecker(checker: Checker): Checker {
  return checker;
}

type DescribeMatchOptions = {
  /**
   * Suggested fix. Omit (or pass `null`) for a match without a fix.
   */
  edit?: RefactorEdit | null;

  /**
   * Overrides the checker's `summary` as the finding's message.
   */
  message?: string;
};

/**
 * Builds the result of a handler that flagged `node`.
 */
export function describeMatch(
  checker: Pick<Checker, 'name' | 'summary'>,
  node: types.Node,
  options: DescribeMatchOptions = {}
): MatchFound {
  return {
    matched: true,
    checkerName: checker.name,
    node,
    message: options.message ?? checker.summary,
    edit: options.edit ?? null
  };
}
