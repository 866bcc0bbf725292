import { type types, is } from 'estree-toolkit';

import type { ModuleLevelResolution } from '../architecture';
import { isCallShaped } from '../call-utils';
import type { QualifiedMember } from '../types';
import type { ImportBinding, ModuleScope } from './module-scope';
import { isRelativeSpecifier, resolveRelativeUnit } from './module-path';

/**
 * Module id used for identifiers the compilation declares nowhere.
 */
export const GLOBAL_MODULE = 'globalThis';

/**
 * A resolved entity: a module plus a property path inside it.
 *
 * `{ module: 'node:util', path: [] }` is the module namespace itself,
 * `{ module: 'bar/Foo.js', path: ['Checks', 'remove'] }` a member of an
 * exported binding.
 */
export type EntityRef = Readonly<{
  module: string;
  path: readonly string[];
}>;

/**
 * Cross-unit export lookup over every module scope of a compilation.
 *
 * @see {@link ModuleLevelResolution}
 */
export type ModuleGraph = Readonly<{
  /**
   * Module id a specifier denotes from inside `importer`: the registered
   * unit for a relative specifier, the specifier itself for a bare one.
   * `null` for a relative specifier naming no unit.
   */
  resolveModuleId(importer: string, source: string): string | null;

  /**
   * Follows an export of a registered unit to the entity it provides.
   */
  lookupExport(module: string, exportName: string): EntityRef | null;

  /**
   * Whether importing `exportName` from the unit can succeed.
   * A star re-export of an external module counts as "may export anything".
   */
  hasExport(module: string, exportName: string): boolean;

  /**
   * Whether `module` is a unit of the compilation.
   */
  isUnit(module: string): boolean;

  /**
   * Entity an import binding of `importer` finally denotes, re-exports
   * followed.
   */
  resolveImport(importer: string, binding: ImportBinding): EntityRef | null;
}>;

/**
 * Renders an entity as an owner name.
 *
 * - `{ node:util, [] }`             → `node:util`
 * - `{ bar/Foo.js, [Checks] }`      → `bar/Foo.js#Checks`
 * - `{ guava, [Base, Strings] }`    → `guava#Base.Strings`
 */
export function formatEntity(entity: EntityRef): string {
  return entity.path.length === 0
    ? entity.module
    : `${entity.module}#${entity.path.join('.')}`;
}

export function createModuleGraph(
  scopes: ReadonlyMap<string, ModuleScope>
): ModuleGraph {
  const unitNames = new Set(scopes.keys());

  const resolveModuleId = (importer: string, source: string): string | null =>
    isRelativeSpecifier(source)
      ? resolveRelativeUnit(importer, source, unitNames)
      : source;

  /**
   * Resolves `ref` until it no longer points into an export of a
   * registered unit.
   */
  const canonicalize = (
    ref: EntityRef,
    seen: Set<string>
  ): EntityRef | null => {
    const [head, ...rest] = ref.path;
    if (head === undefined || !scopes.has(ref.module)) return ref;

    const target = lookup(ref.module, head, seen);
    return target && { module: target.module, path: [...target.path, ...rest] };
  };

  const importTarget = (
    importer: string,
    binding: ImportBinding
  ): EntityRef | null => {
    const module = resolveModuleId(importer, binding.source);
    if (module === null) return null;
    return {
      module,
      path: binding.kind === 'namespace' ? [] : [binding.imported]
    };
  };

  const lookup = (
    module: string,
    exportName: string,
    seen: Set<string>
  ): EntityRef | null => {
    const key = `${module}#${exportName}`;
    if (seen.has(key)) return null;
    seen.add(key);

    const scope = scopes.get(module);
    if (!scope) return null;

    const entry = scope.exports.get(exportName);

    if (entry?.kind === 'local') {
      if (entry.localName === null) return { module, path: ['default'] };

      const binding = scope.imports.get(entry.localName);
      if (!binding) {
        // Top-level variables stay unresolved from every unit.
        if (scope.declarations.get(entry.localName) === 'variable') {
          return null;
        }
        return { module, path: [entry.localName] };
      }

      const target = importTarget(module, binding);
      return target && canonicalize(target, seen);
    }

    if (entry?.kind === 'reexport') {
      const source = resolveModuleId(module, entry.source);
      if (source === null) return null;
      return canonicalize({ module: source, path: [entry.imported] }, seen);
    }

    if (entry?.kind === 'namespace') {
      const source = resolveModuleId(module, entry.source);
      return source === null ? null : { module: source, path: [] };
    }

    // `export *` never forwards `default`.
    if (exportName === 'default') return null;

    for (const star of scope.starExports) {
      const source = resolveModuleId(module, star);
      if (source === null || !scopes.has(source)) continue;

      const found = lookup(source, exportName, seen);
      if (found) return found;
    }

    return null;
  };

  const exists = (
    module: string,
    exportName: string,
    seen: Set<string>
  ): boolean => {
    const key = `${module}#${exportName}`;
    if (seen.has(key)) return false;
    seen.add(key);

    const scope = scopes.get(module);
    if (!scope) return true;
    if (scope.exports.has(exportName)) return true;
    if (exportName === 'default') return false;

    return scope.starExports.some(star => {
      const source = resolveModuleId(module, star);
      return source !== null && exists(source, exportName, seen);
    });
  };

  return {
    resolveModuleId,
    lookupExport: (module, exportName) => lookup(module, exportName, new Set()),
    hasExport: (module, exportName) => exists(module, exportName, new Set()),
    isUnit: module => scopes.has(module),
    resolveImport: (importer, binding) => {
      const target = importTarget(importer, binding);
      return target && canonicalize(target, new Set());
    }
  };
}

/**
 * Static name of a member access: `a.b` → `b`, `a['b']` → `b`.
 * `null` for computed keys that are not string literals and for
 * private names.
 */
function readMemberName(node: types.MemberExpression): string | null {
  const property = node.property;

  if (!node.computed) {
    return is.identifier(property) ? property.name : null;
  }
  return is.literal(property) && typeof property.value === 'string'
    ? property.value
    : null;
}

/**
 * Creates the `resolveCall` function of one unit's match context.
 *
 * Steps:
 * 1. Take the callee of a call-shaped node.
 * 2. Peel member accesses down to the root identifier, collecting names.
 * 3. Resolve the root in the module scope:
 *    - shadowed name            → unresolved
 *    - import binding           → the imported entity, re-exports followed
 *    - top-level class/function → `<unit>#<name>`
 *    - top-level variable       → unresolved
 *    - undeclared               → `globalThis#<name>`
 * 4. Split the full path into `(owner, member)` at its last segment.
 *
 * @see {@link ModuleLevelResolution}
 */
export function createCallResolver(
  graph: ModuleGraph,
  scope: ModuleScope
): (node: types.Node) => QualifiedMember | null {
  const resolveRoot = (name: string): EntityRef | null => {
    if (scope.shadowed.has(name)) return null;

    const binding = scope.imports.get(name);
    if (binding) return graph.resolveImport(scope.unitName, binding);

    const declaration = scope.declarations.get(name);
    if (declaration === 'variable') return null;
    if (declaration) return { module: scope.unitName, path: [name] };

    return { module: GLOBAL_MODULE, path: [name] };
  };

  return node => {
    if (!isCallShaped(node)) return null;

    // 1-2. Member chain, innermost first after reversal
    const members: string[] = [];
    let cursor: types.Node = node.callee;

    while (is.memberExpression(cursor)) {
      const name = readMemberName(cursor);
      if (name === null) return null;
      members.push(name);
      cursor = cursor.object;
    }

    if (!is.identifier(cursor)) return null;

    // 3. Root
    const root = resolveRoot(cursor.name);
    if (!root) return null;

    // 4. Split
    const path = [...root.path, ...members.reverse()];
    const member = path.pop();
    if (member === undefined) return null;

    return {
      owner: formatEntity({ module: root.module, path }),
      member
    };
  };
}
