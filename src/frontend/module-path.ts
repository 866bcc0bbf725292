import { posix } from 'node:path';

import { normalizeUnitName } from '../source-unit';

/**
 * Suffixes tried, in order, after the exact name.
 */
const EXTENSION_CANDIDATES = ['.js', '.mjs', '.cjs', '.jsx'] as const;

const INDEX_CANDIDATE = 'index.js';

export function isRelativeSpecifier(specifier: string): boolean {
  return (
    specifier === '.' ||
    specifier === '..' ||
    specifier.startsWith('./') ||
    specifier.startsWith('../')
  );
}

/**
 * Resolves a relative specifier against the importing unit's name.
 *
 * Candidates, first registered one wins:
 * 1. the exact joined name
 * 2. the name with `.js`, `.mjs`, `.cjs`, `.jsx` appended
 * 3. `<name>/index.js`
 *
 * @param importer
 *   Normalized name of the importing unit.
 * @param specifier
 *   A relative specifier (`./Foo.js`, `../bar`).
 * @param unitNames
 *   Normalized names of every unit in the compilation.
 * @returns
 *   The matching unit name, or `null` when none is registered.
 */
export function resolveRelativeUnit(
  importer: string,
  specifier: string,
  unitNames: ReadonlySet<string>
): string | null {
  const base = normalizeUnitName(
    posix.join(posix.dirname(importer), specifier)
  );

  const candidates = [
    base,
    ...EXTENSION_CANDIDATES.map(extension => `${base}${extension}`),
    posix.join(base, INDEX_CANDIDATE)
  ];

  return candidates.find(candidate => unitNames.has(candidate)) ?? null;
}
