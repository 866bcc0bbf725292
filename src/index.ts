export * from './matchers';
export {
  NO_MATCH,
  defineChecker,
  describeMatch,
  scanUnit,
  walkTree
} from './checker';
export {
  applyEdits,
  applyTargetedEdits,
  deleteNode,
  getNodeSpan,
  postfixWith,
  prefixWith,
  replaceNode,
  replaceSpan
} from './edits';
export { compileUnits, parseUnit } from './frontend';
export type {
  Compilation,
  CompiledUnit,
  CompileFailure,
  CompileResult,
  ParseFailure,
  ParseResult
} from './frontend';
export {
  RefactoringTestHelper,
  createRefactoringTestHelper
} from './harness';
export { eagerAssertionMessage } from './checkers';
export {
  DEFAULT_PARSER_OPTIONS,
  LOG_LEVEL_ENV,
  resolveHarnessOptions
} from './config';
export type {
  HarnessOptions,
  ParserOptions,
  ResolvedHarnessOptions
} from './config';
export { createSourceUnit } from './source-unit';
export {
  CompileError,
  ConfigError,
  InvalidEditError,
  MismatchError,
  OverlappingEditsError,
  RefactorKitError,
  UsageError
} from './lib/errors';
export { Logger, logger } from './lib/logger';
export type { LogLevel } from './lib/logger';
export * from './types';
