export { parseUnit } from './parser';
export type { ParseFailure, ParseResult } from './parser';
export { compileUnits } from './compile';
export type {
  Compilation,
  CompiledUnit,
  CompileFailure,
  CompileResult
} from './compile';
export { buildModuleScope, collectPatternNames } from './module-scope';
export type {
  ModuleScope,
  ImportBinding,
  ExportEntry,
  DeclarationKind,
  ModuleRequest
} from './module-scope';
export {
  GLOBAL_MODULE,
  createModuleGraph,
  createCallResolver,
  formatEntity
} from './symbol-resolver';
export type { EntityRef, ModuleGraph } from './symbol-resolver';
export { isRelativeSpecifier, resolveRelativeUnit } from './module-path';
