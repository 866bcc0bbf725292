import type { types } from 'estree-toolkit';
import type { MatcherTotality } from '../architecture';

/**
 * Every ESTree kind tag (`"CallExpression"`, `"ReturnStatement"`, ...).
 */
export type NodeKind = types.Node['type'];

/**
 * The node shape(s) carrying a given kind tag.
 *
 * @example
 * ```ts
 * // every ESTree literal shape: primitive, RegExp and bigint literals
 * type L = NodeOfKind<'Literal'>;
 * ```
 */
export type NodeOfKind<K extends NodeKind> = Extract<types.Node, { type: K }>;

/**
 * Result of resolving a callee to the declaration it names.
 *
 * Owner naming:
 * - `node:util`            namespace import of a module
 * - `node:util#default`    the default export of a module
 * - `guava#Preconditions`  a named export of a module
 * - `bar/Foo.js#Checks`    an export of another unit in the same compilation
 * - `globalThis#Math`      an undeclared (global) identifier
 */
export type QualifiedMember = Readonly<{
  owner: string;
  member: string;
}>;

/**
 * Per-unit resolution context handed to every matcher evaluation.
 *
 * The object is frozen and holds no mutable state: evaluating the same
 * matcher on the same node with the same context always gives the same
 * answer.
 */
export type MatchContext = Readonly<{
  /**
   * Logical name of the unit the visited node belongs to.
   */
  unitName: string;

  /**
   * Resolves the callee of a call-shaped node to `(owner, member)`.
   * Returns `null` for anything it cannot resolve (local variables,
   * shadowed imports, computed members, non-call nodes).
   */
  resolveCall(node: types.Node): QualifiedMember | null;

  /**
   * Original source text covered by a node, or `null` when the node
   * carries no offsets.
   */
  getSourceText(node: types.Node): string | null;
}>;

/**
 * A pure, total predicate over `(node, context)`.
 *
 * @see {@link MatcherTotality}
 */
export type Matcher = (node: types.Node, context: MatchContext) => boolean;
