import type { Matcher } from '../types';
import { getCallArgument, isCallShaped } from '../call-utils';

/**
 * Matches call-shaped nodes whose callee satisfies `inner`.
 *
 * - `f(x)`        → `inner` sees `f`
 * - `a.b.c(x)`    → `inner` sees `a.b.c`
 * - `new F(x)`    → `inner` sees `F`
 * - anything else → `false`, `inner` is not evaluated
 */
export function calleeOf(inner: Matcher): Matcher {
  return (node, context) => {
    if (!isCallShaped(node)) return false;
    return inner(node.callee, context);
  };
}

/**
 * Matches call-shaped nodes that have an argument at `index` satisfying
 * `inner`.
 *
 * A missing argument is a non-match, never an error:
 * `argumentAt(1, m)` on `f(a)` is `false` and `m` is not evaluated.
 *
 * Spread arguments are passed to `inner` as `SpreadElement` nodes; they do
 * not expand.
 */
export function argumentAt(index: number, inner: Matcher): Matcher {
  return (node, context) => {
    const argument = getCallArgument(node, index);
    if (!argument) return false;
    return inner(argument, context);
  };
}

/**
 * Matches calls whose callee resolves to exactly `(owner, member)`.
 *
 * Resolution is delegated to `context.resolveCall`. Unresolved callees
 * never match, and a member with the same name on a different owner never
 * matches.
 *
 * @example
 * ```ts
 * // import { format } from 'node:util';  format('x')       → owner 'node:util'
 * // import util from 'node:util';       util.format('x')  → owner 'node:util#default'
 * referencesStaticMember('node:util', 'format');
 * ```
 */
export function referencesStaticMember(owner: string, member: string): Matcher {
  return (node, context) => {
    if (!isCallShaped(node)) return false;

    const resolved = context.resolveCall(node);
    if (!resolved) return false;

    return resolved.owner === owner && resolved.member === member;
  };
}
