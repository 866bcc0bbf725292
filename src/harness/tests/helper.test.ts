import { describe, expect, it } from 'vitest';

import { createRefactoringTestHelper } from '..';
import { NO_MATCH, defineChecker } from '../../checker';
import {
  CompileError,
  MismatchError,
  OverlappingEditsError,
  UsageError
} from '../../lib/errors';
import { logger, type LogLevel } from '../../lib/logger';
import { TestMode } from '../../types';
import { conflicting, identity, removeBarCalls, returnNull } from './checkers';

/**
 * Test suite: refactoring verification harness.
 *
 * Coverage:
 * - Structural and textual equivalence.
 * - Compile errors in inputs, imports and expectations.
 * - Cross-unit refactoring.
 * - Call-order pairing and usage errors.
 * - Log level scoped to one helper.
 */
describe('Refactoring Test Helper', () => {
  const returnNullInput = ['export function f() {', '  return;', '}'] as const;

  describe('AST_MATCH', () => {
    it('passes when the output matches structurally', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines('out/Test.js', 'export function f() {', '  return null;', '}')
        .run();

      expect(verdict).toEqual({ kind: 'pass' });
    });

    it('ignores formatting differences', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines('out/Test.js', 'export function f() { return null }')
        .run(TestMode.AST_MATCH);

      expect(verdict.kind).toBe('pass');
    });

    it('reports the first differing tree path', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines(
          'out/Test.js',
          'export function f() {',
          '  return undefined;',
          '}'
        )
        .run();

      expect(verdict).toMatchObject({
        kind: 'mismatch',
        unitName: 'in/Test.js',
        mode: 'AST_MATCH',
        actual: 'export function f() {\n  return null;\n}'
      });
      if (verdict.kind !== 'mismatch') return;

      expect(verdict.report.split('\n').slice(0, 3)).toEqual([
        'Output of in/Test.js does not match the expectation (AST_MATCH).',
        'First tree difference at body[0].declaration.body.body[0].argument.type: expected "Identifier", got "Literal"',
        'First differing line: 2'
      ]);
    });

    it('treats an expectation that does not parse as a compile error', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines('out/Test.js', 'export function f() {', '  return null;')
        .run();

      expect(verdict).toMatchObject({
        kind: 'compile-error',
        location: { unitName: 'out/Test.js' }
      });
    });
  });

  describe('TEXT_MATCH', () => {
    it('passes on identical text', () => {
      createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines('out/Test.js', 'export function f() {', '  return null;', '}')
        .doTest(TestMode.TEXT_MATCH);
    });

    it('fails on formatting differences that AST_MATCH accepts', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines('out/Test.js', 'export function f() { return null }')
        .run(TestMode.TEXT_MATCH);

      expect(verdict.kind).toBe('mismatch');
    });

    it('renders the first differing line with context', () => {
      const verdict = createRefactoringTestHelper(returnNull)
        .addInputLines('in/Test.js', ...returnNullInput)
        .addOutputLines(
          'out/Test.js',
          'export function f() {',
          '  return undefined;',
          '}'
        )
        .run(TestMode.TEXT_MATCH);

      if (verdict.kind !== 'mismatch') {
        throw new Error(`Expected a mismatch, got ${verdict.kind}.`);
      }

      expect(verdict.report).toBe(
        [
          'Output of in/Test.js does not match the expectation (TEXT_MATCH).',
          'First differing line: 2',
          'expected:',
          '  1 | export function f() {',
          '> 2 |   return undefined;',
          '  3 | }',
          'actual:',
          '  1 | export function f() {',
          '> 2 |   return null;',
          '  3 | }'
        ].join('\n')
      );
    });

    it('throws a MismatchError carrying both texts', () => {
      const caught = (() => {
        try {
          createRefactoringTestHelper(returnNull)
            .addInputLines('in/Test.js', ...returnNullInput)
            .expectUnchanged()
            .doTest(TestMode.TEXT_MATCH);
        } catch (error) {
          return error;
        }
        return undefined;
      })();

      expect(caught).toBeInstanceOf(MismatchError);
      expect(caught).toMatchObject({
        unitName: 'in/Test.js',
        expected: 'export function f() {\n  return;\n}',
        actual: 'export function f() {\n  return null;\n}',
        mode: 'TEXT_MATCH'
      });
    });
  });

  describe('Compile Errors', () => {
    it('reports an input that does not parse', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('in/Bad.js', 'export clazz Bar {', '  ! this should fail', '}')
        .expectUnchanged()
        .run();

      expect(verdict).toMatchObject({
        kind: 'compile-error',
        location: { unitName: 'in/Bad.js', line: 1 }
      });
    });

    it('throws CompileError from doTest', () => {
      expect(() =>
        createRefactoringTestHelper(identity)
          .addInputLines('in/Bad.js', 'export clazz Bar {}')
          .expectUnchanged()
          .doTest()
      ).toThrow(CompileError);
    });

    it('reports an import of a unit that was not added', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('Test.js', "import { Foo } from './bar/Foo.js';", 'Foo.log();')
        .expectUnchanged()
        .run();

      expect(verdict).toEqual({
        kind: 'compile-error',
        location: { unitName: 'Test.js', line: 1, column: 9 },
        message: "Cannot find module './bar/Foo.js'."
      });
    });
  });

  describe('Cross-Unit Refactoring', () => {
    it('removes calls owned by another unit', () => {
      createRefactoringTestHelper(removeBarCalls)
        .addInputLines('bar/Foo.js', 'export class Foo {', '  static log() {}', '}')
        .expectUnchanged()
        .addInputLines(
          'Test.js',
          "import { Foo } from './bar/Foo.js';",
          'export function run() {',
          '  Foo.log();',
          "  console.log('kept');",
          '}'
        )
        .addOutputLines(
          'Test.js',
          "import { Foo } from './bar/Foo.js';",
          'export function run() {',
          '  ',
          "  console.log('kept');",
          '}'
        )
        .doTest(TestMode.TEXT_MATCH);
    });
  });

  describe('Pairing', () => {
    it('pairs each expectation with the most recent unpaired input', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'const a = 1;')
        .addInputLines('b.js', 'const b = 2;')
        .addOutputLines('out/b.js', 'const b = 2;')
        .addOutputLines('out/a.js', 'const a = 1;')
        .run(TestMode.TEXT_MATCH);

      expect(verdict).toEqual({ kind: 'pass' });
    });

    it('does not pair by name', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'const a = 1;')
        .addInputLines('b.js', 'const b = 2;')
        .addOutputLines('out/a.js', 'const a = 1;')
        .addOutputLines('out/b.js', 'const b = 2;')
        .run(TestMode.TEXT_MATCH);

      expect(verdict).toMatchObject({
        kind: 'mismatch',
        unitName: 'a.js',
        expected: 'const b = 2;',
        actual: 'const a = 1;'
      });
    });
  });

  describe('Usage Errors', () => {
    it('rejects a run without inputs', () => {
      expect(createRefactoringTestHelper(identity).run()).toEqual({
        kind: 'usage-error',
        reason: 'No input units were added; call addInputLines() first.'
      });
    });

    it('rejects an input without expectation', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'x;')
        .run();

      expect(verdict).toEqual({
        kind: 'usage-error',
        reason:
          'Input "a.js" has no expectation; call addOutputLines() or expectUnchanged().'
      });
    });

    it('rejects an expectation without input', () => {
      const verdict = createRefactoringTestHelper(identity)
        .expectUnchanged()
        .addInputLines('a.js', 'x;')
        .expectUnchanged()
        .run();

      expect(verdict).toEqual({
        kind: 'usage-error',
        reason: 'expectUnchanged() has no unpaired input to attach to.'
      });
    });

    it('rejects a second expectation for the same input', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'x;')
        .expectUnchanged()
        .addOutputLines('out/a.js', 'x;')
        .run();

      expect(verdict).toEqual({
        kind: 'usage-error',
        reason: 'addOutputLines("out/a.js") has no unpaired input to attach to.'
      });
    });

    it('rejects duplicate input names', () => {
      const verdict = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'x;')
        .expectUnchanged()
        .addInputLines('a.js', 'y;')
        .expectUnchanged()
        .run();

      expect(verdict).toEqual({
        kind: 'usage-error',
        reason: 'Input "a.js" was added more than once.'
      });
    });

    it('rejects reuse after a verdict', () => {
      const helper = createRefactoringTestHelper(identity)
        .addInputLines('a.js', 'x;')
        .expectUnchanged();

      expect(helper.run()).toEqual({ kind: 'pass' });
      expect(helper.run()).toEqual({
        kind: 'usage-error',
        reason: 'This helper already ran; create a new helper per test case.'
      });
    });

    it('throws UsageError from doTest', () => {
      expect(() => createRefactoringTestHelper(identity).doTest()).toThrow(
        '[refactor-testkit] Invalid test setup: No input units were added; call addInputLines() first.'
      );
      expect(() => createRefactoringTestHelper(identity).doTest()).toThrow(
        UsageError
      );
    });
  });

  describe('Edit Conflicts', () => {
    it('raises overlapping edits produced by the checker', () => {
      expect(() =>
        createRefactoringTestHelper(conflicting)
          .addInputLines('a.js', 'x;')
          .expectUnchanged()
          .run()
      ).toThrow(OverlappingEditsError);
    });
  });

  describe('Log Level', () => {
    it('applies the logLevel option only while the helper runs', () => {
      const before = logger.level;
      const observed: LogLevel[] = [];
      const observeLevel = defineChecker({
        name: 'ObserveLevel',
        summary: 'Records the active log level',
        visitors: {
          CallExpression() {
            observed.push(logger.level);
            return NO_MATCH;
          }
        }
      });

      createRefactoringTestHelper(observeLevel, { logLevel: 'silent' })
        .addInputLines('a.js', 'f();')
        .expectUnchanged()
        .doTest();

      expect(observed).toEqual(['silent']);
      expect(logger.level).toBe(before);
    });
  });
});
