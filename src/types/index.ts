export type { SourceUnit, SourceLocation } from './source';
export type { TextSpan, RefactorEdit, TargetedEdit } from './edit';
export type {
  NodeKind,
  NodeOfKind,
  QualifiedMember,
  MatchContext,
  Matcher
} from './matcher';
export type {
  NoMatch,
  MatchFound,
  MatchDescription,
  CheckerHandler,
  CheckerVisitors,
  Checker
} from './checker';
export { TestMode } from './verdict';
export type {
  PassVerdict,
  MismatchVerdict,
  CompileErrorVerdict,
  UsageErrorVerdict,
  Verdict
} from './verdict';
export type { Simplify } from './types-helper';
