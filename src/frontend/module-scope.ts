import { type Visitors, type types, is, traverse } from 'estree-toolkit';

import type { ModuleLevelResolution } from '../architecture';
import { isNodeLike } from '../guards';

/**
 * What a local import binding refers to.
 *
 * - `binding`:   `import { a as b } from 's'` (imported `a`),
 *                `import b from 's'` (imported `default`)
 * - `namespace`: `import * as b from 's'`
 */
export type ImportBinding =
  | Readonly<{ kind: 'binding'; source: string; imported: string }>
  | Readonly<{ kind: 'namespace'; source: string }>;

/**
 * How an exported name is provided.
 *
 * - `local`:     `export { a }`, `export class A {}`, `export default ...`
 *                (`localName: null` for an anonymous default export)
 * - `reexport`:  `export { a as b } from 's'`
 * - `namespace`: `export * as ns from 's'`
 */
export type ExportEntry =
  | Readonly<{ kind: 'local'; localName: string | null }>
  | Readonly<{ kind: 'reexport'; source: string; imported: string }>
  | Readonly<{ kind: 'namespace'; source: string }>;

export type DeclarationKind = 'class' | 'function' | 'variable';

/**
 * One module reference that must exist for the unit to compile.
 *
 * `imported: null` means only the module itself is required
 * (namespace import, side-effect import, `export *`).
 */
export type ModuleRequest = Readonly<{
  source: string;
  imported: string | null;
  line?: number;
  column?: number;
}>;

/**
 * Module-level view of one unit.
 *
 * @see {@link ModuleLevelResolution}
 */
export type ModuleScope = Readonly<{
  unitName: string;
  imports: ReadonlyMap<string, ImportBinding>;
  declarations: ReadonlyMap<string, DeclarationKind>;
  exports: ReadonlyMap<string, ExportEntry>;

  /**
   * Sources of `export * from '...'`, in source order.
   */
  starExports: readonly string[];

  requests: readonly ModuleRequest[];

  /**
   * Names bound somewhere below the top level (parameters, block
   * bindings, inner functions, catch clauses). These never resolve.
   */
  shadowed: ReadonlySet<string>;
}>;

/**
 * Reads an `Identifier` or string `Literal` used as a module export name
 * (`export { a as "b-c" }`).
 */
function readModuleExportName(node: types.Node): string {
  if (is.identifier(node)) return node.name;
  if (is.literal(node)) return String(node.value);
  return '';
}

function readSource(node: types.Literal): string {
  return String(node.value);
}

/**
 * Collects every identifier bound by a declaration pattern.
 *
 * `const { a, b: [c, ...d] = [], ...e } = x` binds `a`, `c`, `d`, `e`.
 */
export function collectPatternNames(
  pattern: types.Node | null | undefined,
  names: string[] = []
): string[] {
  if (!pattern) return names;

  if (is.identifier(pattern)) {
    names.push(pattern.name);
  } else if (is.objectPattern(pattern)) {
    for (const property of pattern.properties) {
      if (is.restElement(property)) collectPatternNames(property.argument, names);
      else collectPatternNames(property.value, names);
    }
  } else if (is.arrayPattern(pattern)) {
    for (const element of pattern.elements) collectPatternNames(element, names);
  } else if (is.restElement(pattern)) {
    collectPatternNames(pattern.argument, names);
  } else if (is.assignmentPattern(pattern)) {
    collectPatternNames(pattern.left, names);
  }

  return names;
}

function requestAt(
  node: types.Node,
  source: string,
  imported: string | null
): ModuleRequest {
  return {
    source,
    imported,
    line: node.loc?.start.line,
    column: node.loc?.start.column
  };
}

type DeclarationCountState = {
  /** Declarations of a name anywhere in the tree, top level included. */
  counts: Map<string, number>;
  /** Names that can only be bound below the top level. */
  nested: Set<string>;
};

function count(state: DeclarationCountState, names: readonly string[]): void {
  for (const name of names) {
    state.counts.set(name, (state.counts.get(name) ?? 0) + 1);
  }
}

function markNested(
  state: DeclarationCountState,
  patterns: readonly types.Node[]
): void {
  for (const pattern of patterns) {
    for (const name of collectPatternNames(pattern)) state.nested.add(name);
  }
}

function createDeclarationCountVisitors(): Visitors<DeclarationCountState> {
  return {
    VariableDeclarator(path, state) {
      if (path.node) count(state, collectPatternNames(path.node.id));
    },

    FunctionDeclaration(path, state) {
      const node = path.node;
      if (!node) return;
      if (node.id) count(state, [node.id.name]);
      markNested(state, node.params);
    },

    FunctionExpression(path, state) {
      const node = path.node;
      if (!node) return;
      if (node.id) state.nested.add(node.id.name);
      markNested(state, node.params);
    },

    ArrowFunctionExpression(path, state) {
      if (path.node) markNested(state, path.node.params);
    },

    ClassDeclaration(path, state) {
      const id = path.node?.id;
      if (id) count(state, [id.name]);
    },

    ClassExpression(path, state) {
      const id = path.node?.id;
      if (id) state.nested.add(id.name);
    },

    CatchClause(path, state) {
      const param = path.node?.param;
      if (param) markNested(state, [param]);
    }
  };
}

/**
 * Builds the module scope of one parsed unit.
 *
 * Steps:
 * 1. Walk the top-level statements once and record imports, declarations,
 *    exports and the module requests that have to resolve.
 * 2. Traverse the whole tree counting declarations per name. A name
 *    declared more often than at top level, or bound by a parameter, an
 *    inner function/class expression name or a catch clause, is shadowed.
 */
export function buildModuleScope(
  unitName: string,
  program: types.Program
): ModuleScope {
  const imports = new Map<string, ImportBinding>();
  const declarations = new Map<string, DeclarationKind>();
  const exports = new Map<string, ExportEntry>();
  const starExports: string[] = [];
  const requests: ModuleRequest[] = [];
  const topLevelCounts = new Map<string, number>();

  const declare = (name: string, kind: DeclarationKind): void => {
    declarations.set(name, kind);
    topLevelCounts.set(name, (topLevelCounts.get(name) ?? 0) + 1);
  };

  /**
   * Registers a declaration statement and returns the names it binds.
   */
  const declareStatement = (statement: types.Node): string[] => {
    if (is.variableDeclaration(statement)) {
      const names: string[] = [];
      for (const declarator of statement.declarations) {
        collectPatternNames(declarator.id, names);
      }
      for (const name of names) declare(name, 'variable');
      return names;
    }
    if (is.functionDeclaration(statement) && statement.id) {
      declare(statement.id.name, 'function');
      return [statement.id.name];
    }
    if (is.classDeclaration(statement) && statement.id) {
      declare(statement.id.name, 'class');
      return [statement.id.name];
    }
    return [];
  };

  // 1. Top level
  for (const statement of program.body) {
    if (is.importDeclaration(statement)) {
      const source = readSource(statement.source);

      if (statement.specifiers.length === 0) {
        requests.push(requestAt(statement, source, null));
      }

      for (const specifier of statement.specifiers) {
        if (is.importNamespaceSpecifier(specifier)) {
          imports.set(specifier.local.name, { kind: 'namespace', source });
          requests.push(requestAt(specifier, source, null));
        } else if (is.importDefaultSpecifier(specifier)) {
          imports.set(specifier.local.name, {
            kind: 'binding',
            source,
            imported: 'default'
          });
          requests.push(requestAt(specifier, source, 'default'));
        } else {
          const imported = readModuleExportName(specifier.imported);
          imports.set(specifier.local.name, {
            kind: 'binding',
            source,
            imported
          });
          requests.push(requestAt(specifier, source, imported));
        }
      }
      continue;
    }

    if (is.exportNamedDeclaration(statement)) {
      if (statement.declaration) {
        for (const name of declareStatement(statement.declaration)) {
          exports.set(name, { kind: 'local', localName: name });
        }
        continue;
      }

      const source = statement.source ? readSource(statement.source) : null;
      for (const specifier of statement.specifiers) {
        const local = readModuleExportName(specifier.local);
        const exported = readModuleExportName(specifier.exported);

        if (source === null) {
          exports.set(exported, { kind: 'local', localName: local });
        } else {
          exports.set(exported, { kind: 'reexport', source, imported: local });
          requests.push(requestAt(specifier, source, local));
        }
      }
      continue;
    }

    if (is.exportDefaultDeclaration(statement)) {
      const declaration: unknown = statement.declaration;
      let localName: string | null = null;

      if (isNodeLike(declaration)) {
        if (is.identifier(declaration)) localName = declaration.name;
        else [localName = null] = declareStatement(declaration);
      }
      exports.set('default', { kind: 'local', localName });
      continue;
    }

    if (is.exportAllDeclaration(statement)) {
      const source = readSource(statement.source);
      requests.push(requestAt(statement, source, null));

      if (statement.exported) {
        exports.set(readModuleExportName(statement.exported), {
          kind: 'namespace',
          source
        });
      } else {
        starExports.push(source);
      }
      continue;
    }

    declareStatement(statement);
  }

  // 2. Nested bindings
  const state: DeclarationCountState = { counts: new Map(), nested: new Set() };
  traverse(program, createDeclarationCountVisitors(), state);

  const shadowed = new Set(state.nested);
  for (const [name, total] of state.counts) {
    if (total > (topLevelCounts.get(name) ?? 0)) shadowed.add(name);
  }
  // Import bindings are top-level too, but are not counted as declarations.
  for (const name of imports.keys()) {
    if ((state.counts.get(name) ?? 0) > 0) shadowed.add(name);
  }

  return {
    unitName,
    imports,
    declarations,
    exports,
    starExports,
    requests,
    shadowed
  };
}
