import type { EquivalenceModes } from '../architecture';
import { isArray, isNodeLike, isRecord } from '../guards';

/**
 * Keys that carry formatting or position only.
 */
export const IGNORED_AST_KEYS: ReadonlySet<string> = new Set([
  'start',
  'end',
  'range',
  'loc',
  'raw'
]);

export type AstPathSegment = string | number;

/**
 * First structural difference between two trees.
 *
 * - `changed`: both sides have a value at `path` and they differ
 * - `missing`: the expected tree has `path`, the actual tree does not
 * - `added`:   the actual tree has `path`, the expected tree does not
 */
export type AstDifference = Readonly<{
  kind: 'changed' | 'missing' | 'added';
  path: readonly AstPathSegment[];
  expected: unknown;
  actual: unknown;
}>;

function prependPath(
  segment: AstPathSegment,
  difference: AstDifference
): AstDifference {
  return { ...difference, path: [segment, ...difference.path] };
}

/**
 * Compares the children of two containers of the same shape.
 *
 * Execution flow (depth-first, bottom-up):
 * the walk descends until it meets the first differing leaf, then builds
 * the path while unwinding. Paths are only allocated for the one
 * difference that is reported.
 *
 * Arrays are compared index by index: the shorter side reports the first
 * index it lacks. Objects are compared over the expected side's keys
 * first, then over keys only the actual side has.
 */
function compareChildren(
  expected: Record<string, unknown> | unknown[],
  actual: Record<string, unknown> | unknown[]
): AstDifference | null {
  if (isArray(expected) && isArray(actual)) {
    const length = Math.max(expected.length, actual.length);

    for (let index = 0; index < length; index++) {
      if (index >= actual.length) {
        return {
          kind: 'missing',
          path: [index],
          expected: expected[index],
          actual: undefined
        };
      }
      if (index >= expected.length) {
        return {
          kind: 'added',
          path: [index],
          expected: undefined,
          actual: actual[index]
        };
      }

      const difference = compareValues(expected[index], actual[index]);
      if (difference) return prependPath(index, difference);
    }
    return null;
  }

  if (isArray(expected) || isArray(actual)) {
    return { kind: 'changed', path: [], expected, actual };
  }

  // Phase 1: keys of the expected tree
  for (const key of Object.keys(expected)) {
    if (IGNORED_AST_KEYS.has(key)) continue;

    if (!(key in actual)) {
      return {
        kind: 'missing',
        path: [key],
        expected: expected[key],
        actual: undefined
      };
    }

    const difference = compareValues(expected[key], actual[key]);
    if (difference) return prependPath(key, difference);
  }

  // Phase 2: keys only the actual tree has
  for (const key of Object.keys(actual)) {
    if (IGNORED_AST_KEYS.has(key) || key in expected) continue;
    return {
      kind: 'added',
      path: [key],
      expected: undefined,
      actual: actual[key]
    };
  }

  return null;
}

function compareValues(expected: unknown, actual: unknown): AstDifference | null {
  // Regular expression literal values compare by source and flags.
  if (expected instanceof RegExp || actual instanceof RegExp) {
    return String(expected) === String(actual)
      ? null
      : { kind: 'changed', path: [], expected, actual };
  }

  if (isRecord(expected) && isRecord(actual)) {
    return compareChildren(expected, actual);
  }

  return Object.is(expected, actual)
    ? null
    : { kind: 'changed', path: [], expected, actual };
}

/**
 * Finds the first difference between two ESTree trees.
 *
 * Position and formatting keys (`start`, `end`, `range`, `loc`, `raw`)
 * are ignored at every depth.
 *
 * @returns `null` when the trees are structurally equal.
 *
 * @see {@link EquivalenceModes}
 */
export function findFirstAstDifference(
  expected: unknown,
  actual: unknown
): AstDifference | null {
  return compareValues(expected, actual);
}

/**
 * Renders a tree path: `['body', 0, 'argument']` → `body[0].argument`.
 */
export function formatAstPath(path: readonly AstPathSegment[]): string {
  let rendered = '';
  for (const segment of path) {
    rendered +=
      typeof segment === 'number'
        ? `[${segment}]`
        : rendered === ''
          ? segment
          : `.${segment}`;
  }
  return rendered === '' ? '<root>' : rendered;
}

/**
 * Short description of a tree value for reports.
 *
 * - node          → `ReturnStatement node`
 * - array         → `array(2)`
 * - missing       → `nothing`
 * - anything else → its JSON form (`"a"`, `null`, `42`)
 */
export function describeAstValue(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (isNodeLike(value)) return `${value.type} node`;
  if (isArray(value)) return `array(${value.length})`;
  if (value instanceof RegExp || typeof value === 'bigint') return String(value);
  return JSON.stringify(value) ?? String(value);
}
