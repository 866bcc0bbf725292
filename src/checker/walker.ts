import type { types } from 'estree-toolkit';

import { isArray, isNodeLike } from '../guards';

/**
 * Position metadata; never holds child nodes.
 */
const SKIPPED_KEYS = new Set(['loc', 'range', 'start', 'end']);

function collectChildren(node: types.Node): types.Node[] {
  const children: types.Node[] = [];
  const entries: Array<[string, unknown]> = Object.entries(node);

  for (const [key, value] of entries) {
    if (SKIPPED_KEYS.has(key)) continue;

    if (isArray(value)) {
      for (const item of value) {
        if (isNodeLike(item)) children.push(item);
      }
    } else if (isNodeLike(value)) {
      children.push(value);
    }
  }

  return children;
}

/**
 * Visits every node of a tree once, parents before children, children in
 * field order.
 *
 * The walk is iterative, so deeply nested input does not exhaust the call
 * stack. `visit` must not mutate the tree.
 */
export function walkTree(
  root: types.Node,
  visit: (node: types.Node) => void
): void {
  const stack: types.Node[] = [root];

  for (let node = stack.pop(); node; node = stack.pop()) {
    visit(node);

    const children = collectChildren(node);
    for (let index = children.length - 1; index >= 0; index--) {
      const child = children[index];
      if (child) stack.push(child);
    }
  }
}
