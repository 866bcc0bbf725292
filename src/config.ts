import { ConfigError } from './lib/errors';
import { isLogLevel, type LogLevel } from './lib/logger';

/**
 * Environment variable that sets the log level when no explicit
 * `logLevel` option is given.
 */
export const LOG_LEVEL_ENV = 'REFACTOR_TESTKIT_LOG_LEVEL';

export type ParserOptions = {
  /**
   * Parse units as ES modules or as classic scripts.
   *
   * Scripts cannot contain `import` / `export`, so cross-unit resolution
   * only happens in module mode.
   *
   * @default 'module'
   */
  sourceType: 'module' | 'script';

  /**
   * Accept JSX syntax.
   *
   * @default false
   */
  jsx: boolean;

  /**
   * Accept stage-3 syntax (decorators, import attributes, ...).
   *
   * @default true
   */
  next: boolean;
};

export type HarnessOptions = {
  /**
   * Parser configuration shared by inputs, outputs and re-parsed results.
   */
  parser?: Partial<ParserOptions>;

  /**
   * Level of the shared logger while this helper runs. The previous level
   * is restored afterwards.
   *
   * Falls back to `REFACTOR_TESTKIT_LOG_LEVEL`, then to the logger's own
   * level.
   */
  logLevel?: LogLevel;

  /**
   * Lines of context shown around the first differing line of a mismatch.
   *
   * @default 3
   */
  maxPreviewLines?: number;
};

export type ResolvedHarnessOptions = Readonly<{
  parser: Readonly<ParserOptions>;
  logLevel: LogLevel | undefined;
  maxPreviewLines: number;
}>;

export const DEFAULT_PARSER_OPTIONS: Readonly<ParserOptions> = Object.freeze({
  sourceType: 'module',
  jsx: false,
  next: true
});

const DEFAULT_MAX_PREVIEW_LINES = 3;

function readEnvLogLevel(
  env: Readonly<Record<string, string | undefined>>
): LogLevel | undefined {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw) return undefined;

  if (!isLogLevel(raw)) {
    throw new ConfigError(
      `Invalid ${LOG_LEVEL_ENV} "${raw}". Expected one of debug, info, warn, error, silent.`,
      { variable: LOG_LEVEL_ENV, value: raw }
    );
  }
  return raw;
}

/**
 * Merges harness options over the defaults.
 *
 * Precedence (lowest to highest):
 * 1. built-in defaults
 * 2. `REFACTOR_TESTKIT_LOG_LEVEL` from `env`
 * 3. explicit `options`
 *
 * @throws {ConfigError}
 *   When the environment names an unknown log level, an explicit
 *   `logLevel` is not a level, or `maxPreviewLines` is not a non-negative
 *   integer.
 */
export function resolveHarnessOptions(
  options: HarnessOptions = {},
  env: Readonly<Record<string, string | undefined>> = process.env
): ResolvedHarnessOptions {
  const envLevel = readEnvLogLevel(env);

  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    throw new ConfigError(`Invalid logLevel "${String(options.logLevel)}".`, {
      option: 'logLevel'
    });
  }

  const maxPreviewLines = options.maxPreviewLines ?? DEFAULT_MAX_PREVIEW_LINES;
  if (!Number.isInteger(maxPreviewLines) || maxPreviewLines < 0) {
    throw new ConfigError(
      `maxPreviewLines must be a non-negative integer, received ${maxPreviewLines}.`,
      { option: 'maxPreviewLines' }
    );
  }

  return Object.freeze({
    parser: Object.freeze({ ...DEFAULT_PARSER_OPTIONS, ...options.parser }),
    logLevel: options.logLevel ?? envLevel,
    maxPreviewLines
  });
}
