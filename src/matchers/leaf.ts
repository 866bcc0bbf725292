import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';

import type { Matcher, NodeKind } from '../types';

/**
 * Matches nodes whose kind tag equals `kind`.
 *
 * @example
 * ```ts
 * kindIs('CallExpression') // f(), a.b(), but not new F()
 * ```
 */
export function kindIs(kind: NodeKind): Matcher {
  return node => node.type === kind;
}

/**
 * Returns the textual value of a literal node.
 *
 * Accepted forms:
 * - `Literal`
 *   → the runtime value converted with `String(...)`:
 *     `'abc'` → `abc`, `42` → `42`, `null` → `null`, `/a+/g` → `/a+/g`
 * - `TemplateLiteral` without substitutions
 *   → the cooked text: `` `a\tb` `` → `a<TAB>b`
 *
 * @returns
 *   The literal text, or `null` for every other node shape (including
 *   templates with `${...}` parts and templates with invalid escapes).
 */
export function getLiteralText(node: types.Node): string | null {
  if (is.literal(node)) {
    return String(node.value);
  }

  if (is.templateLiteral(node) && node.expressions.length === 0) {
    const [quasi] = node.quasis;
    return quasi?.value.cooked ?? null;
  }

  return null;
}

/**
 * Rebuilds a pattern without the `g` and `y` flags.
 *
 * Both flags make `test()` read and write `lastIndex`, so the same regular
 * expression would answer differently on consecutive calls.
 */
function toStatelessPattern(pattern: string | RegExp): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern);
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Matches literal nodes whose text contains no match for `pattern`.
 *
 * Non-literal nodes never match, whatever the pattern.
 *
 * @param pattern
 *   A regular expression, or a string compiled with `new RegExp(pattern)`.
 *   Compiled once, here.
 *
 * @example
 * ```ts
 * const noPlaceholder = literalTextExcludes(/%[sdifjoOc%]/);
 * // 'value must be positive' → true
 * // 'expected %s, got %s'    → false
 * // someVariable             → false (not a literal)
 * ```
 */
export function literalTextExcludes(pattern: string | RegExp): Matcher {
  const compiled = toStatelessPattern(pattern);

  return node => {
    const text = getLiteralText(node);
    if (text === null) return false;
    return !compiled.test(text);
  };
}
