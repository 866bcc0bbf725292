import type { types } from 'estree-toolkit';

import { logger } from '../lib/logger';
import type {
  Checker,
  CheckerVisitors,
  MatchContext,
  MatchDescription,
  MatchFound,
  NodeKind,
  NodeOfKind
} from '../types';
import { walkTree } from './walker';

const log = logger.child('[scan]');

/**
 * Looks up and calls the handler registered for `kind`.
 *
 * `kind` and `node` are correlated through `K`, so the handler receives
 * the node shape it was declared for.
 */
function invokeVisitor<K extends NodeKind>(
  visitors: CheckerVisitors,
  kind: K,
  node: NodeOfKind<K>,
  context: MatchContext
): MatchDescription | null {
  const handler = visitors[kind];
  return handler ? handler(node, context) : null;
}

/**
 * Runs a checker over one parsed unit.
 *
 * @returns
 *   Every match in visit order (pre-order, source order among siblings).
 */
export function scanUnit(
  checker: Checker,
  program: types.Program,
  context: MatchContext
): MatchFound[] {
  const found: MatchFound[] = [];

  walkTree(program, node => {
    const description = invokeVisitor(
      checker.visitors,
      node.type,
      node,
      context
    );
    if (description?.matched) found.push(description);
  });

  log.debug(
    `${checker.name}: ${found.length} match(es) in ${context.unitName}.`
  );

  for (const match of found) {
    if (match.edit === null) {
      log.info(`${context.unitName}: ${match.message} (no fix available)`);
    }
  }

  return found;
}
