export {
  RefactoringTestHelper,
  createRefactoringTestHelper
} from './helper';
export { compareOutput } from './compare';
export type { ComparisonResult, CompareOptions } from './compare';
export {
  IGNORED_AST_KEYS,
  findFirstAstDifference,
  formatAstPath
} from './ast-compare';
export type { AstDifference, AstPathSegment } from './ast-compare';
export { formatMismatchReport } from './report';
