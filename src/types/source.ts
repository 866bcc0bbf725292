/**
 * One named logical source file.
 *
 * `name` is the logical unit name used for reporting and for resolving
 * relative imports between units (e.g. `"foo/Bar.js"`).
 */
export type SourceUnit = Readonly<{
  name: string;
  text: string;
}>;

/**
 * A position inside a named unit (1-based line, 0-based column).
 */
export type SourceLocation = Readonly<{
  unitName: string;
  line?: number;
  column?: number;
}>;
