import type { TextSpan } from '../types';

/**
 * Prefix shared by every message this package raises.
 */
export const MESSAGE_PREFIX = '[refactor-testkit]';

/**
 * Base error class for all testkit errors.
 */
export class RefactorKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(`${MESSAGE_PREFIX} ${message}`);
    this.name = 'RefactorKitError';
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or reporters
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Malformed test construction: unpaired inputs, orphan expectations,
 * duplicate unit names, reuse of a finished helper.
 *
 * Detected before the pipeline runs.
 */
export class UsageError extends RefactorKitError {
  constructor(
    public readonly reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Invalid test setup: ${reason}`, 'USAGE_ERROR', context);
    this.name = 'UsageError';
  }
}

/**
 * A fixture that does not parse or whose imports cannot be resolved.
 *
 * Kept apart from {@link MismatchError} so that a broken fixture is never
 * read as a broken transform.
 */
export class CompileError extends RefactorKitError {
  constructor(
    public readonly detail: string,
    public readonly unitName: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    const position = line != null ? `:${line}:${column ?? 0}` : '';
    super(`${unitName}${position}: ${detail}`, 'COMPILE_ERROR', {
      unitName,
      line,
      column
    });
    this.name = 'CompileError';
  }
}

/**
 * Transformed output differs from the expectation.
 *
 * `expected` and `actual` are exposed under the names test runners read
 * when rendering a diff.
 */
export class MismatchError extends RefactorKitError {
  readonly showDiff = true;

  constructor(
    report: string,
    public readonly unitName: string,
    public readonly expected: string,
    public readonly actual: string,
    public readonly mode: string
  ) {
    super(report, 'MISMATCH', { unitName, mode });
    this.name = 'MismatchError';
  }
}

/**
 * Two edits for the same document claim overlapping text.
 */
export class OverlappingEditsError extends RefactorKitError {
  constructor(
    public readonly unitName: string,
    public readonly first: TextSpan,
    public readonly second: TextSpan
  ) {
    super(
      `Overlapping edits in ${unitName}: [${first.start}, ${first.end}) and [${second.start}, ${second.end}).`,
      'OVERLAPPING_EDITS',
      { unitName, first, second }
    );
    this.name = 'OverlappingEditsError';
  }
}

/**
 * An edit that cannot be anchored: a span outside the document, an
 * inverted span, a node without source offsets, an unknown target unit.
 */
export class InvalidEditError extends RefactorKitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_EDIT', context);
    this.name = 'InvalidEditError';
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends RefactorKitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}
