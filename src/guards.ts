import type { types } from 'estree-toolkit';

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript type guard
 * (`value is T[]`). `T` is not validated at runtime.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Checks that the value is a non-null object so properties can be read
 * without runtime errors and without type assertions.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether a runtime value is node-like enough to be treated as an
 * ESTree node by `estree-toolkit` type guards and by the tree walker.
 *
 * Shallow bridge guard:
 * - the value is an object (not null)
 * - it is not an array
 * - it carries a string `type` discriminator
 *
 * @returns
 *   `true` if `value` has the minimal shape of an ESTree node. When `true`,
 *   TypeScript narrows `value` to `types.Node`.
 */
export function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

/**
 * Reads a numeric field from an arbitrary value.
 *
 * @returns The number stored at `value[key]`, or `undefined` when `value`
 *          is not an object or the field is not a number.
 */
export function readNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === 'number' ? field : undefined;
}
