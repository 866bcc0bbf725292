import type { EquivalenceModes } from '../architecture';
import type { SourceLocation } from './source';
import type { Simplify } from './types-helper';

/**
 * How produced output is compared with the expectation.
 *
 * @see {@link EquivalenceModes}
 */
export const TestMode = {
  /**
   * Exact, whitespace-sensitive string equality.
   */
  TEXT_MATCH: 'TEXT_MATCH',

  /**
   * Structural equality of the re-parsed trees; formatting is ignored.
   */
  AST_MATCH: 'AST_MATCH'
} as const;

export type TestMode = (typeof TestMode)[keyof typeof TestMode];

type VerdictOf<Kind extends string, Payload = {}> = Simplify<
  { kind: Kind } & Readonly<Payload>
>;

export type PassVerdict = VerdictOf<'pass'>;

export type MismatchVerdict = VerdictOf<
  'mismatch',
  {
    /**
     * Name of the input unit whose output differs.
     */
    unitName: string;
    mode: TestMode;
    expected: string;
    actual: string;

    /**
     * Rendered description of the first difference.
     */
    report: string;
  }
>;

export type CompileErrorVerdict = VerdictOf<
  'compile-error',
  {
    location: SourceLocation;
    message: string;
  }
>;

export type UsageErrorVerdict = VerdictOf<
  'usage-error',
  {
    reason: string;
  }
>;

/**
 * Terminal result of one harness run.
 */
export type Verdict =
  | PassVerdict
  | MismatchVerdict
  | CompileErrorVerdict
  | UsageErrorVerdict;
