/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * POLICY
 * 1. Matcher Totality
 * 2. Overlap Rejection
 *
 * DEFINITION
 * 3. Module-Level Resolution
 * 4. Equivalence Modes
 * 5. Failure Taxonomy
 *
 * STRATEGY
 * 6. Apply On Original Offsets
 * 7. Call-Order Pairing
 *
 * LIFECYCLE
 * 8. Verification Lifecycle
 *
 * Recommended reading flow:
 * DEFINITION (3) -> POLICY (1) -> STRATEGY (6) -> POLICY (2)
 *   -> STRATEGY (7) -> LIFECYCLE -> DEFINITION (4, 5)
 *
 * HEADER TAXONOMY
 *
 * - POLICY:     non-negotiable rule (`must` / `must not`) and its enforcement.
 * - STRATEGY:   implementation approach used to satisfy a policy.
 * - DEFINITION: formal meaning and scope of a term or boundary.
 * - LIFECYCLE:  step-by-step flow across phases.
 */

/**
 * ARCHITECTURAL POLICY (1)
 * Matcher Totality
 *
 * ---
 *
 * A matcher is a function `(node, context) => boolean`.
 *
 * 1. Total
 *    Every matcher returns a boolean for every ESTree node shape. Absent
 *    structure (a missing argument, a callee that is not a member access,
 *    a non-literal where a literal was expected) evaluates to `false`.
 *    Matchers never throw.
 *
 * 2. Pure
 *    Configuration (patterns, qualified names, inner matchers) is captured
 *    when the matcher is built and never changes afterwards. Regular
 *    expressions are rebuilt without the `g` and `y` flags, since those
 *    make `RegExp.prototype.test` depend on `lastIndex`.
 *
 * 3. Short-circuit
 *    - `allOf(m1, ..., mn)` stops at the first `false`.
 *    - `anyOf(m1, ..., mn)` stops at the first `true`.
 *    Evaluation order is left to right.
 *
 * 4. Closed under composition
 *    Combinators return matchers. Nesting depth is unbounded; cost per node
 *    is linear in the size of the matcher expression.
 */
export type MatcherTotality = never;

/**
 * ARCHITECTURAL POLICY (2)
 * Overlap Rejection
 *
 * ---
 *
 * Two edits for the same document overlap when:
 * - their spans intersect (`a.start < b.end && b.start < a.end`), or
 * - both are insertions (`start === end`) at the same offset.
 *
 * Overlap is a caller error. The applier raises `OverlappingEditsError`
 * naming both spans. It never merges the edits and never picks one.
 *
 * Touching spans (`a.end === b.start`) do not overlap. An insertion at the
 * boundary of a replacement is applied before the replacement.
 */
export type OverlapRejection = never;

/**
 * ARCHITECTURAL DEFINITION (3)
 * Module-Level Resolution
 *
 * ---
 *
 * The resolver answers one question for a call-shaped node: which
 * `(owner, member)` does its callee denote?
 *
 * 1. Roots
 *    The leftmost identifier of the callee is looked up in the unit's
 *    module scope:
 *    - import bindings (named, default, namespace),
 *    - top-level class and function declarations,
 *    - otherwise, when the unit declares the name nowhere, a global.
 *
 * 2. Member chains
 *    Non-computed members (`a.b.c`) and computed members with a string
 *    literal key (`a['b']`) extend the path. Anything else is unresolved.
 *
 * 3. Cross-unit
 *    A relative import that names another unit of the compilation resolves
 *    into that unit's exports. Re-exports (`export { X } from`,
 *    `export * from`, `import X; export { X }`) are followed until the
 *    declaring unit or an external module is reached.
 *
 * 4. Shadowing
 *    A name that is also declared in a nested scope (parameter, block
 *    binding, inner function, catch clause) is never resolved. The
 *    resolver does not track scopes; it answers "unresolved" instead.
 *
 * Naming scheme:
 *   `<module>`                  namespace of a module
 *   `<module>#<export path>`    binding inside a module
 *   `globalThis#<name>`         global
 */
export type ModuleLevelResolution = never;

/**
 * ARCHITECTURAL DEFINITION (4)
 * Equivalence Modes
 *
 * ---
 *
 * - `TEXT_MATCH`
 *   Exact string equality. Whitespace, quotes, semicolons and comments are
 *   all significant.
 *
 * - `AST_MATCH` (default)
 *   Both texts are parsed with the same parser options, and the trees are
 *   compared field by field with these keys ignored:
 *   `start`, `end`, `range`, `loc`, `raw`.
 *   Comments are not part of the tree. Literal values compare by value
 *   (`'a'` equals `"a"`); regular expressions compare by source and flags.
 */
export type EquivalenceModes = never;

/**
 * ARCHITECTURAL DEFINITION (5)
 * Failure Taxonomy
 *
 * ---
 *
 * | Failure        | Raised by | When                                        |
 * | -------------- | --------- | ------------------------------------------- |
 * | usage-error    | harness   | malformed pairing, before anything runs     |
 * | compile-error  | front end | an input (or AST expectation) fails to parse |
 * |                |           | or imports something that does not exist    |
 * | mismatch       | harness   | produced output differs from expectation    |
 * | overlapping    | applier   | two edits in one document intersect         |
 *
 * An input fixture that fails to compile is always a compile-error and
 * never a mismatch. A transform whose output fails to re-parse under
 * `AST_MATCH` is a mismatch: the fixture was fine, the output is not.
 */
export type FailureTaxonomy = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Apply On Original Offsets
 *
 * ---
 *
 * All edit spans refer to the original text of their unit.
 *
 * 1. Edits are grouped per unit.
 * 2. Each group is sorted by `(start, end)` and checked for overlap.
 * 3. The output is built in one pass: unedited slice, replacement,
 *    unedited slice, replacement, ... in offset order.
 *
 * No replacement shifts the offsets of another, so the result does not
 * depend on the order edits were produced in.
 */
export type ApplyOnOriginalOffsets = never;

/**
 * ARCHITECTURAL STRATEGY (7)
 * Call-Order Pairing
 *
 * ---
 *
 * Inputs and expectations are paired by the order of builder calls, not by
 * unit name:
 *
 *   addInputLines('a.js', ...)      // input #1
 *   addOutputLines('out/a.js', ...) // pairs with #1
 *   addInputLines('b.js', ...)      // input #2
 *   expectUnchanged()               // pairs with #2
 *
 * An expectation pairs with the most recently added input that has none
 * yet. The builder records calls as they happen; the pairing is checked
 * once, when the run starts, and every problem becomes a usage-error.
 */
export type CallOrderPairing = never;

/**
 * ARCHITECTURAL LIFECYCLE (8)
 * Verification Lifecycle
 *
 * ---
 *
 *   building -> executing -> comparing -> verdict
 *
 * 1. building
 *    Builder calls record inputs and expectations.
 *
 * 2. executing
 *    - Finalize pairing (usage-error on failure).
 *    - Compile every input together (compile-error on failure).
 *    - Walk each tree with the checker, collect edits, apply them.
 *
 * 3. comparing
 *    Each `(actual, expected)` pair is compared under the chosen mode.
 *    The first differing pair yields a mismatch.
 *
 * 4. verdict
 *    Terminal. The helper accepts no further builder calls or runs.
 */
export type VerificationLifecycle = never;
