import { splitLines } from '../source-unit';
import { TestMode } from '../types';
import {
  type AstDifference,
  describeAstValue,
  formatAstPath
} from './ast-compare';

export type MismatchReportOptions = {
  unitName: string;
  mode: TestMode;
  expected: string;
  actual: string;

  /**
   * First tree difference, when the comparison was structural.
   */
  astDifference?: AstDifference;

  /**
   * Why the actual output could not be re-parsed, if it could not.
   */
  actualParseError?: string;

  /**
   * Lines shown on each side of the first differing line.
   * @default 3
   */
  maxPreviewLines?: number;
};

/**
 * Index of the first line that differs, or `null` when every line matches
 * (a difference in line endings only).
 */
export function findFirstDifferingLine(
  expectedLines: readonly string[],
  actualLines: readonly string[]
): number | null {
  const length = Math.max(expectedLines.length, actualLines.length);
  for (let index = 0; index < length; index++) {
    if (expectedLines[index] !== actualLines[index]) return index;
  }
  return null;
}

/**
 * Renders a window of lines around `focus` with 1-based line numbers; the
 * focused line is marked with `>`.
 */
function formatPreview(
  label: string,
  lines: readonly string[],
  focus: number,
  radius: number
): string {
  const from = Math.max(0, focus - radius);
  const to = Math.min(lines.length, focus + radius + 1);
  const width = String(to).length;

  const rendered = lines.slice(from, to).map((line, offset) => {
    const lineNumber = from + offset;
    const marker = lineNumber === focus ? '>' : ' ';
    return `${marker} ${String(lineNumber + 1).padStart(width)} | ${line}`;
  });

  if (focus >= lines.length) {
    rendered.push(`> ${' '.repeat(width)} | <end of text>`);
  }

  return [`${label}:`, ...rendered].join('\n');
}

/**
 * Formats the description carried by a mismatch.
 *
 * Layout:
 * 1. Header naming the unit and mode
 * 2. For structural comparison: the first differing tree path, or the
 *    parse error of the actual output
 * 3. The first differing line, with a preview window from both texts
 *
 * @returns
 *   Multi-line report, e.g.
 *   ```
 *   Output of in/Test.js does not match the expectation (AST_MATCH).
 *   First tree difference at body[0].body.body[0].argument: expected Literal node, got nothing
 *   First differing line: 3
 *   expected:
 *   ...
 *   ```
 */
export function formatMismatchReport(options: MismatchReportOptions): string {
  const radius = options.maxPreviewLines ?? 3;
  const parts = [
    `Output of ${options.unitName} does not match the expectation (${options.mode}).`
  ];

  if (options.actualParseError !== undefined) {
    parts.push(`Output does not parse: ${options.actualParseError}`);
  }

  if (options.astDifference) {
    const { path, expected, actual } = options.astDifference;
    parts.push(
      `First tree difference at ${formatAstPath(path)}: expected ${describeAstValue(expected)}, got ${describeAstValue(actual)}`
    );
  }

  const expectedLines = splitLines(options.expected);
  const actualLines = splitLines(options.actual);
  const line = findFirstDifferingLine(expectedLines, actualLines);

  if (line === null) {
    if (options.mode === TestMode.TEXT_MATCH) {
      parts.push('Texts differ in line endings only.');
    }
    return parts.join('\n');
  }

  parts.push(`First differing line: ${line + 1}`);
  parts.push(formatPreview('expected', expectedLines, line, radius));
  parts.push(formatPreview('actual', actualLines, line, radius));

  return parts.join('\n');
}
