import type { types } from 'estree-toolkit';

import type { ParserOptions } from '../config';
import { sliceNodeText } from '../edits/span';
import { logger } from '../lib/logger';
import { normalizeUnitName } from '../source-unit';
import type { MatchContext, SourceUnit } from '../types';
import { isRelativeSpecifier } from './module-path';
import { type ModuleScope, buildModuleScope } from './module-scope';
import { type ParseFailure, parseUnit } from './parser';
import {
  type ModuleGraph,
  createCallResolver,
  createModuleGraph
} from './symbol-resolver';

const log = logger.child('[compile]');

/**
 * One input unit after parsing and scope analysis.
 */
export type CompiledUnit = Readonly<{
  unit: SourceUnit;

  /**
   * Normalized unit name, used as the unit's module id in owner names.
   */
  moduleId: string;

  program: types.Program;
  scope: ModuleScope;

  /**
   * Frozen context handed to every matcher evaluated on this unit.
   */
  context: MatchContext;
}>;

export type Compilation = Readonly<{
  units: readonly CompiledUnit[];
  graph: ModuleGraph;
}>;

export type CompileFailure = ParseFailure;

export type CompileResult =
  | { success: true; compilation: Compilation }
  | { success: false; failure: CompileFailure };

/**
 * Finds the first module request of any unit that cannot be satisfied.
 *
 * - a relative specifier that names no unit of the compilation
 * - a named or default import (or re-export) that the target unit
 *   does not export
 *
 * Bare specifiers (`node:util`, `lodash`) are outside the compilation and
 * are never checked.
 */
function findUnresolvedRequest(
  compiled: readonly CompiledUnit[],
  graph: ModuleGraph
): CompileFailure | null {
  for (const { unit, moduleId, scope } of compiled) {
    for (const request of scope.requests) {
      if (!isRelativeSpecifier(request.source)) continue;

      const position = { line: request.line, column: request.column };

      const target = graph.resolveModuleId(moduleId, request.source);
      if (target === null) {
        return {
          unitName: unit.name,
          ...position,
          message: `Cannot find module '${request.source}'.`
        };
      }

      if (
        request.imported !== null &&
        !graph.hasExport(target, request.imported)
      ) {
        return {
          unitName: unit.name,
          ...position,
          message:
            request.imported === 'default'
              ? `Module '${target}' has no default export.`
              : `Module '${target}' has no exported member '${request.imported}'.`
        };
      }
    }
  }

  return null;
}

/**
 * Compiles a set of units together.
 *
 * Steps:
 * 1. Parse every unit; the first parse failure ends compilation.
 * 2. Build each unit's module scope.
 * 3. Link the scopes into a module graph and check that every relative
 *    import and re-export resolves.
 * 4. Create a frozen match context per unit.
 *
 * @returns
 *   `{ success: true, compilation }` with units in input order, or
 *   `{ success: false, failure }` describing the first problem found.
 */
export function compileUnits(
  units: readonly SourceUnit[],
  options: ParserOptions
): CompileResult {
  const scopes = new Map<string, ModuleScope>();
  const parsed: Array<{
    unit: SourceUnit;
    moduleId: string;
    program: types.Program;
    scope: ModuleScope;
  }> = [];

  // 1-2. Parse and analyze
  for (const unit of units) {
    const moduleId = normalizeUnitName(unit.name);
    if (scopes.has(moduleId)) {
      return {
        success: false,
        failure: {
          unitName: unit.name,
          message: `Duplicate unit name '${moduleId}'.`
        }
      };
    }

    const result = parseUnit(unit, options);
    if (!result.success) {
      log.debug(`${unit.name} failed to parse: ${result.failure.message}`);
      return result;
    }

    const scope = buildModuleScope(moduleId, result.program);
    scopes.set(moduleId, scope);
    parsed.push({ unit, moduleId, program: result.program, scope });
  }

  // 3. Link
  const graph = createModuleGraph(scopes);

  // 4. Contexts
  const compiled: CompiledUnit[] = parsed.map(entry => ({
    ...entry,
    context: Object.freeze({
      unitName: entry.unit.name,
      resolveCall: createCallResolver(graph, entry.scope),
      getSourceText: (node: types.Node) => sliceNodeText(entry.unit.text, node)
    })
  }));

  const failure = findUnresolvedRequest(compiled, graph);
  if (failure) {
    log.debug(`${failure.unitName}: ${failure.message}`);
    return { success: false, failure };
  }

  log.debug(`Compiled ${compiled.length} unit(s).`);
  return { success: true, compilation: { units: compiled, graph } };
}
