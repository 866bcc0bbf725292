import type { EquivalenceModes, FailureTaxonomy } from '../architecture';
import type { ParserOptions } from '../config';
import { type ParseFailure, parseUnit } from '../frontend/parser';
import { type SourceUnit, TestMode } from '../types';
import { findFirstAstDifference } from './ast-compare';
import { formatMismatchReport } from './report';

export type ComparisonResult =
  | { kind: 'equal' }
  | { kind: 'different'; report: string }

  /**
   * The expectation itself does not parse: a broken fixture.
   */
  | { kind: 'invalid-expectation'; failure: ParseFailure };

export type CompareOptions = {
  /**
   * Name of the input unit the output was produced from.
   */
  unitName: string;

  /**
   * Expected text, named after the fixture it came from.
   */
  expected: SourceUnit;

  actual: string;
  mode: TestMode;
  parser: ParserOptions;
  maxPreviewLines: number;
};

/**
 * Compares produced output with its expectation under one mode.
 *
 * - `TEXT_MATCH`: exact string equality.
 * - `AST_MATCH`: both texts are parsed with the same options and the trees
 *   compared. An expectation that fails to parse is reported as
 *   `invalid-expectation`; output that fails to parse is `different`.
 *
 * @see {@link EquivalenceModes}
 * @see {@link FailureTaxonomy}
 */
export function compareOutput(options: CompareOptions): ComparisonResult {
  const { unitName, expected, actual, mode, maxPreviewLines } = options;
  const report = {
    unitName,
    mode,
    expected: expected.text,
    actual,
    maxPreviewLines
  };

  if (mode === TestMode.TEXT_MATCH) {
    return expected.text === actual
      ? { kind: 'equal' }
      : { kind: 'different', report: formatMismatchReport(report) };
  }

  const expectedTree = parseUnit(expected, options.parser);
  if (!expectedTree.success) {
    return { kind: 'invalid-expectation', failure: expectedTree.failure };
  }

  const actualTree = parseUnit({ name: unitName, text: actual }, options.parser);
  if (!actualTree.success) {
    return {
      kind: 'different',
      report: formatMismatchReport({
        ...report,
        actualParseError: actualTree.failure.message
      })
    };
  }

  const astDifference = findFirstAstDifference(
    expectedTree.program,
    actualTree.program
  );

  return astDifference
    ? {
        kind: 'different',
        report: formatMismatchReport({ ...report, astDifference })
      }
    : { kind: 'equal' };
}
