import { describe, expect, it } from 'vitest';

import { eagerAssertionMessage } from '..';
import { scanUnit } from '../../checker';
import { compileSource } from '../../frontend/tests/estree-utils';
import { createRefactoringTestHelper } from '../../harness';
import { TestMode } from '../../types';

/**
 * Test suite: eagerly formatted assertion messages.
 *
 * Coverage:
 * - Fix for single-argument `format` calls on each assertion function.
 * - Match without fix when `format` receives extra arguments.
 * - No match for format directives or unrelated `format` functions.
 */
describe('EagerAssertionMessage', () => {
  const input = [
    "import assert from 'node:assert';",
    "import * as util from 'node:util';",
    'export function check(ready, count) {',
    "  assert.ok(ready, util.format('service is not ready'));",
    "  assert.strictEqual(count, 3, util.format('expected three'));",
    "  assert.notStrictEqual(count, 1, util.format('50% done'));",
    "  assert.equal(count, 3, util.format('count is %d', count));",
    "  assert.notEqual(count, 0, util.format('nonzero', count));",
    '}'
  ];

  it('inlines constant messages', () => {
    createRefactoringTestHelper(eagerAssertionMessage)
      .addInputLines('check.js', ...input)
      .addOutputLines(
        'check.js',
        "import assert from 'node:assert';",
        "import * as util from 'node:util';",
        'export function check(ready, count) {',
        "  assert.ok(ready, 'service is not ready');",
        "  assert.strictEqual(count, 3, 'expected three');",
        "  assert.notStrictEqual(count, 1, '50% done');",
        "  assert.equal(count, 3, util.format('count is %d', count));",
        "  assert.notEqual(count, 0, util.format('nonzero', count));",
        '}'
      )
      .doTest(TestMode.TEXT_MATCH);
  });

  it('reports a format call with extra arguments without a fix', () => {
    const { program, context } = compileSource(input, 'check.js');
    const matches = scanUnit(eagerAssertionMessage, program, context);

    expect(
      matches.map(match => ({
        call: context.resolveCall(match.node),
        fixed: match.edit !== null
      }))
    ).toEqual([
      { call: { owner: 'node:assert#default', member: 'ok' }, fixed: true },
      {
        call: { owner: 'node:assert#default', member: 'strictEqual' },
        fixed: true
      },
      {
        call: { owner: 'node:assert#default', member: 'notStrictEqual' },
        fixed: true
      },
      {
        call: { owner: 'node:assert#default', member: 'notEqual' },
        fixed: false
      }
    ]);
  });

  it('recognizes named imports', () => {
    createRefactoringTestHelper(eagerAssertionMessage)
      .addInputLines(
        'named.js',
        "import { ok } from 'node:assert';",
        "import { format } from 'node:util';",
        "ok(value, format(`plain`));"
      )
      .addOutputLines(
        'named.js',
        "import { ok } from 'node:assert';",
        "import { format } from 'node:util';",
        'ok(value, `plain`);'
      )
      .doTest(TestMode.TEXT_MATCH);
  });

  it('ignores a local helper named like util', () => {
    createRefactoringTestHelper(eagerAssertionMessage)
      .addInputLines(
        'local.js',
        "import assert from 'node:assert';",
        'const util = { format: s => s };',
        "assert.ok(true, util.format('local helper'));"
      )
      .expectUnchanged()
      .doTest();
  });

  it('ignores a message at the wrong position', () => {
    createRefactoringTestHelper(eagerAssertionMessage)
      .addInputLines(
        'position.js',
        "import assert from 'node:assert';",
        "import util from 'node:util';",
        "assert.strictEqual(util.format('a'), 'a');"
      )
      .expectUnchanged()
      .doTest();
  });
});
