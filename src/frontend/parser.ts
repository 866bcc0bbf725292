import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';
import { parse } from 'meriyah';

import type { ParserOptions } from '../config';
import { isNodeLike, isRecord, readNumber } from '../guards';
import type { SourceUnit } from '../types';

/**
 * Why a unit could not be turned into a tree.
 */
export type ParseFailure = Readonly<{
  unitName: string;
  /** 1-based */
  line?: number;
  /** 0-based */
  column?: number;
  message: string;
}>;

export type ParseResult =
  | { success: true; program: types.Program }
  | { success: false; failure: ParseFailure };

/**
 * Extracts position and description from whatever the parser threw.
 *
 * Parser errors carry their position either as `loc.start.{line,column}`
 * or as top-level `line` / `column` fields, and a bare `description`
 * besides the position-prefixed `message`. Both layouts are read; anything
 * else falls back to the error message alone.
 */
function describeParseError(error: unknown, unitName: string): ParseFailure {
  const loc = isRecord(error) && isRecord(error.loc) ? error.loc : undefined;
  const start = loc && isRecord(loc.start) ? loc.start : error;

  const description =
    isRecord(error) && typeof error.description === 'string'
      ? error.description
      : error instanceof Error
        ? error.message
        : String(error);

  return {
    unitName,
    line: readNumber(start, 'line'),
    column: readNumber(start, 'column'),
    message: description
  };
}

/**
 * Parses one source unit into an ESTree `Program`.
 *
 * Offsets (`range`, `start`, `end`) and line/column locations (`loc`) are
 * always recorded: edits anchor on the former, reports on the latter.
 *
 * @param unit
 *   Logical name and source text.
 * @param options
 *   Parser configuration (module/script, JSX, stage-3 syntax).
 * @returns
 *   `{ success: true, program }`, or `{ success: false, failure }` when the
 *   text does not parse. Never throws for bad input.
 */
export function parseUnit(
  unit: SourceUnit,
  options: ParserOptions
): ParseResult {
  const { name: unitName, text } = unit;
  let ast: unknown;

  try {
    ast = parse(text, {
      module: options.sourceType === 'module',
      next: options.next,
      jsx: options.jsx,
      ranges: true,
      loc: true
    });
  } catch (error) {
    return { success: false, failure: describeParseError(error, unitName) };
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    return {
      success: false,
      failure: { unitName, message: 'Parser output is not an ESTree Program.' }
    };
  }

  return { success: true, program: ast };
}
