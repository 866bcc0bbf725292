import type {
  CallOrderPairing,
  FailureTaxonomy,
  VerificationLifecycle
} from '../architecture';
import { scanUnit } from '../checker/scan';
import {
  type HarnessOptions,
  type ResolvedHarnessOptions,
  resolveHarnessOptions
} from '../config';
import { applyEdits } from '../edits/applier';
import { compileUnits } from '../frontend/compile';
import { CompileError, MismatchError, UsageError } from '../lib/errors';
import { logger } from '../lib/logger';
import { createSourceUnit, normalizeUnitName } from '../source-unit';
import {
  type Checker,
  type RefactorEdit,
  type SourceUnit,
  TestMode,
  type Verdict
} from '../types';
import { compareOutput } from './compare';

const log = logger.child('[harness]');

type HarnessState = 'building' | 'executing' | 'comparing' | 'verdict';

type Expectation =
  | { kind: 'output'; unit: SourceUnit }
  | { kind: 'unchanged' };

type TestInput = {
  unit: SourceUnit;
  expectation: Expectation | null;
};

/**
 * Verifies a checker's refactoring on in-memory units.
 *
 * Usage:
 * ```ts
 * createRefactoringTestHelper(returnNull)
 *   .addInputLines('in/Test.js', 'export function f() {', '  return;', '}')
 *   .addOutputLines('out/Test.js', 'export function f() {', '  return null;', '}')
 *   .doTest();
 * ```
 *
 * A helper produces one verdict. Create a new helper per test case.
 *
 * @see {@link CallOrderPairing}
 * @see {@link VerificationLifecycle}
 */
export class RefactoringTestHelper {
  private state: HarnessState = 'building';
  private readonly inputs: TestInput[] = [];

  /**
   * Builder misuse recorded as it happens, reported when the run starts.
   */
  private readonly problems: string[] = [];

  private readonly options: ResolvedHarnessOptions;

  constructor(
    private readonly checker: Checker,
    options: HarnessOptions = {}
  ) {
    this.options = resolveHarnessOptions(options);
  }

  /**
   * Applies the `logLevel` option for the duration of `task` only.
   */
  private withLogLevel<T>(task: () => T): T {
    const level = this.options.logLevel;
    if (!level) return task();

    const previous = logger.level;
    logger.configure({ level });
    try {
      return task();
    } finally {
      logger.configure({ level: previous });
    }
  }

  /**
   * Adds an input unit. Lines are joined with `\n`.
   */
  addInputLines(name: string, ...lines: string[]): this {
    this.recordAfterVerdict('addInputLines');
    this.inputs.push({
      unit: createSourceUnit(name, lines),
      expectation: null
    });
    return this;
  }

  /**
   * Sets the expected output of the most recently added input that has no
   * expectation yet. `name` only labels the fixture.
   */
  addOutputLines(name: string, ...lines: string[]): this {
    this.recordAfterVerdict('addOutputLines');
    this.pair(`addOutputLines("${name}")`, {
      kind: 'output',
      unit: createSourceUnit(name, lines)
    });
    return this;
  }

  /**
   * Expects the most recently added unpaired input to come out unchanged.
   */
  expectUnchanged(): this {
    this.recordAfterVerdict('expectUnchanged');
    this.pair('expectUnchanged()', { kind: 'unchanged' });
    return this;
  }

  /**
   * Runs the checker and returns the verdict without throwing for
   * mismatches, compile errors or usage errors.
   *
   * Edit application failures (`OverlappingEditsError`,
   * `InvalidEditError`) are raised: they are defects of the checker.
   *
   * @see {@link FailureTaxonomy}
   */
  run(mode: TestMode = TestMode.AST_MATCH): Verdict {
    if (this.state !== 'building') {
      return {
        kind: 'usage-error',
        reason: 'This helper already ran; create a new helper per test case.'
      };
    }

    this.state = 'executing';
    try {
      return this.withLogLevel(() => {
        const verdict = this.execute(mode);
        log.debug(`${this.checker.name}: verdict ${verdict.kind}.`);
        return verdict;
      });
    } finally {
      this.state = 'verdict';
    }
  }

  /**
   * Runs the checker and throws unless the outputs match.
   *
   * @throws {UsageError} The builder calls do not form valid pairs.
   * @throws {CompileError} An input or expectation does not compile.
   * @throws {MismatchError} An output differs from its expectation.
   */
  doTest(mode: TestMode = TestMode.AST_MATCH): void {
    this.withLogLevel(() => this.report(this.run(mode)));
  }

  private report(verdict: Verdict): void {
    switch (verdict.kind) {
      case 'pass':
        log.success(`${this.checker.name}: all outputs match.`);
        return;

      case 'usage-error':
        throw new UsageError(verdict.reason);

      case 'compile-error':
        throw new CompileError(
          verdict.message,
          verdict.location.unitName,
          verdict.location.line,
          verdict.location.column
        );

      case 'mismatch':
        throw new MismatchError(
          verdict.report,
          verdict.unitName,
          verdict.expected,
          verdict.actual,
          verdict.mode
        );
    }
  }

  private recordAfterVerdict(call: string): void {
    if (this.state !== 'building') {
      this.problems.push(`${call} was called after the helper ran.`);
    }
  }

  private pair(call: string, expectation: Expectation): void {
    for (let index = this.inputs.length - 1; index >= 0; index--) {
      const input = this.inputs[index];
      if (input && input.expectation === null) {
        input.expectation = expectation;
        return;
      }
    }
    this.problems.push(`${call} has no unpaired input to attach to.`);
  }

  /**
   * Final pairing check.
   *
   * @returns The first problem, or `null` when every input has exactly one
   *          expectation and names are unique.
   */
  private findUsageProblem(): string | null {
    const [problem] = this.problems;
    if (problem !== undefined) return problem;

    if (this.inputs.length === 0) {
      return 'No input units were added; call addInputLines() first.';
    }

    const seen = new Set<string>();
    for (const { unit, expectation } of this.inputs) {
      const moduleId = normalizeUnitName(unit.name);
      if (seen.has(moduleId)) {
        return `Input "${unit.name}" was added more than once.`;
      }
      seen.add(moduleId);

      if (expectation === null) {
        return `Input "${unit.name}" has no expectation; call addOutputLines() or expectUnchanged().`;
      }
    }

    return null;
  }

  private execute(mode: TestMode): Verdict {
    // 1. Pairing
    const problem = this.findUsageProblem();
    if (problem !== null) return { kind: 'usage-error', reason: problem };

    // 2. Compile
    const { parser, maxPreviewLines } = this.options;
    const compiled = compileUnits(
      this.inputs.map(input => input.unit),
      parser
    );

    if (!compiled.success) {
      const { unitName, line, column, message } = compiled.failure;
      return {
        kind: 'compile-error',
        location: { unitName, line, column },
        message
      };
    }

    // 3. Match and apply
    const outputs = compiled.compilation.units.map(({ unit, program, context }) => {
      const edits: RefactorEdit[] = [];
      for (const match of scanUnit(this.checker, program, context)) {
        if (match.edit) edits.push(match.edit);
      }
      return applyEdits(unit, edits);
    });

    // 4. Compare
    this.state = 'comparing';

    for (const [index, input] of this.inputs.entries()) {
      const actual = outputs[index];
      if (!actual || !input.expectation) continue;

      const expected =
        input.expectation.kind === 'output'
          ? input.expectation.unit
          : input.unit;

      const comparison = compareOutput({
        unitName: input.unit.name,
        expected,
        actual: actual.text,
        mode,
        parser,
        maxPreviewLines
      });

      if (comparison.kind === 'invalid-expectation') {
        const { unitName, line, column, message } = comparison.failure;
        return {
          kind: 'compile-error',
          location: { unitName, line, column },
          message
        };
      }

      if (comparison.kind === 'different') {
        return {
          kind: 'mismatch',
          unitName: input.unit.name,
          mode,
          expected: expected.text,
          actual: actual.text,
          report: comparison.report
        };
      }
    }

    return { kind: 'pass' };
  }
}

/**
 * Creates a {@link RefactoringTestHelper} for one test case.
 */
export function createRefactoringTestHelper(
  checker: Checker,
  options?: HarnessOptions
): RefactoringTestHelper {
  return new RefactoringTestHelper(checker, options);
}
