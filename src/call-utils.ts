import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';

/**
 * ESTree nodes with a callee and an argument list.
 *
 * - `f(a)`      CallExpression
 * - `new F(a)`  NewExpression
 */
export type CallShapedNode = types.CallExpression | types.NewExpression;

/**
 * Type guard for call-shaped nodes.
 *
 * Optional calls (`a?.b()`) are `CallExpression` nodes wrapped in a
 * `ChainExpression`; the wrapper itself is not call-shaped.
 */
export function isCallShaped(
  node: types.Node | null | undefined
): node is CallShapedNode {
  return !!node && (is.callExpression(node) || is.newExpression(node));
}

/**
 * Returns the Nth argument of a call-shaped node.
 *
 * @param node
 *   Candidate node.
 * @param index
 *   Zero-based argument index.
 * @returns
 *   The argument node (an expression or a `SpreadElement`), or `null` if the
 *   node is not call-shaped, the index is negative or not an integer, or the
 *   argument does not exist.
 */
export function getCallArgument(
  node: types.Node,
  index: number
): types.Node | null {
  // Guard: only call-shaped nodes have an `arguments` list.
  if (!isCallShaped(node)) return null;

  // Guard: `.at()` would count negative indices from the end.
  if (!Number.isInteger(index) || index < 0) return null;

  return node.arguments[index] ?? null;
}
