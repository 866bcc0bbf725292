import type { types } from 'estree-toolkit';

import { isArray, readNumber } from '../guards';
import type { TextSpan } from '../types';

/**
 * Reads the source span of a node.
 *
 * Prefers `range: [start, end]` and falls back to the `start` / `end`
 * fields. Nodes created by hand carry neither.
 *
 * @returns The span, or `null` when the node has no offsets.
 */
export function getNodeSpan(node: types.Node): TextSpan | null {
  const range: unknown = node.range;

  if (isArray(range) && range.length === 2) {
    const [start, end] = range;
    if (typeof start === 'number' && typeof end === 'number') {
      return { start, end };
    }
  }

  const start = readNumber(node, 'start');
  const end = readNumber(node, 'end');
  return start !== undefined && end !== undefined ? { start, end } : null;
}

/**
 * Source text a node was parsed from.
 */
export function sliceNodeText(text: string, node: types.Node): string | null {
  const span = getNodeSpan(node);
  return span ? text.slice(span.start, span.end) : null;
}
