import { posix } from 'node:path';

import type { SourceUnit } from './types';

/**
 * Builds a source unit from a logical name and its lines.
 *
 * Lines are joined with `\n`; no trailing newline is added.
 *
 * @example
 * ```ts
 * createSourceUnit('in/Test.js', ['export class Test {', '}']);
 * // { name: 'in/Test.js', text: 'export class Test {\n}' }
 * ```
 */
export function createSourceUnit(
  name: string,
  lines: readonly string[]
): SourceUnit {
  return Object.freeze({ name, text: lines.join('\n') });
}

/**
 * Splits a unit's text back into lines (`\n` and `\r\n` aware).
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Canonical form of a logical unit name, used as its module id.
 *
 * - `./foo/Bar.js`  → `foo/Bar.js`
 * - `foo//Bar.js`   → `foo/Bar.js`
 * - `a/../Bar.js`   → `Bar.js`
 */
export function normalizeUnitName(name: string): string {
  return posix.normalize(name.replace(/\\/g, '/'));
}
