import { describe, expect, it, test } from 'vitest';

import {
  anything,
  argumentAt,
  calleeOf,
  kindIs,
  referencesStaticMember
} from '..';
import {
  collectCallNodes,
  compileSource,
  getExpressionNode
} from '../../frontend/tests/estree-utils';
import type { TestScenario } from '../../frontend/tests/types';
import type { Matcher } from '../../types';

/**
 * Test suite: structural matchers.
 *
 * Coverage:
 * - Callee and argument access on call-shaped nodes.
 * - Absent structure degrades to `false` without evaluating inner matchers.
 * - Exact `(owner, member)` reference matching across import styles.
 */
describe('Structural Matchers', () => {
  describe('calleeOf', () => {
    const scenarios: TestScenario<boolean>[] = [
      {
        id: 'Member Callee',
        description: 'Method call has a MemberExpression callee',
        code: 'a.b()',
        expected: true
      },
      {
        id: 'Identifier Callee',
        description: 'Plain call has an Identifier callee',
        code: 'f()',
        expected: false
      },
      {
        id: 'Constructor',
        description: 'new-expressions are call-shaped',
        code: 'new a.B()',
        expected: true
      },
      {
        id: 'Not A Call',
        description: 'A member access alone has no callee',
        code: 'a.b',
        expected: false
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      const { node, context } = getExpressionNode(code);
      expect(calleeOf(kindIs('MemberExpression'))(node, context)).toBe(
        expected
      );
    });
  });

  describe('argumentAt', () => {
    /**
     * Helper: matcher that records whether it was evaluated.
     */
    const createProbe = () => {
      const probe = { evaluated: 0 };
      const matcher: Matcher = () => {
        probe.evaluated++;
        return true;
      };
      return { probe, matcher };
    };

    it('evaluates the inner matcher on an existing argument', () => {
      const { node, context } = getExpressionNode('new F(x)');
      expect(argumentAt(0, kindIs('Identifier'))(node, context)).toBe(true);
    });

    it('returns false for a missing argument without evaluating the inner matcher', () => {
      const { probe, matcher } = createProbe();
      const { node, context } = getExpressionNode('f(a)');

      expect(argumentAt(1, matcher)(node, context)).toBe(false);
      expect(probe.evaluated).toBe(0);
    });

    it('returns false for negative and fractional indices', () => {
      const { node, context } = getExpressionNode('f(a, b)');

      expect(argumentAt(-1, anything)(node, context)).toBe(false);
      expect(argumentAt(0.5, anything)(node, context)).toBe(false);
    });

    it('returns false for nodes that are not call-shaped', () => {
      const { node, context } = getExpressionNode('[a, b]');
      expect(argumentAt(0, anything)(node, context)).toBe(false);
    });

    it('passes spread arguments through as SpreadElement nodes', () => {
      const { node, context } = getExpressionNode('f(...rest)');
      expect(argumentAt(0, kindIs('SpreadElement'))(node, context)).toBe(true);
    });
  });

  describe('referencesStaticMember', () => {
    const { program, context } = compileSource([
      "import * as util from 'node:util';",
      "import { format } from 'node:util';",
      "import def from 'node:util';",
      "util.format('a');",
      "format('b');",
      "def.format('c');",
      "util.inspect('d');",
      "other.format('e');"
    ]);
    const calls = collectCallNodes(program);

    it('resolves each callee to its qualified owner', () => {
      expect(calls.map(call => context.resolveCall(call))).toEqual([
        { owner: 'node:util', member: 'format' },
        { owner: 'node:util', member: 'format' },
        { owner: 'node:util#default', member: 'format' },
        { owner: 'node:util', member: 'inspect' },
        { owner: 'globalThis#other', member: 'format' }
      ]);
    });

    it('matches only the exact owner and member', () => {
      const matcher = referencesStaticMember('node:util', 'format');
      expect(calls.map(call => matcher(call, context))).toEqual([
        true,
        true,
        false,
        false,
        false
      ]);
    });

    it('never matches a node that is not call-shaped', () => {
      const { node, context: expressionContext } =
        getExpressionNode('util.format');
      expect(
        referencesStaticMember('node:util', 'format')(node, expressionContext)
      ).toBe(false);
    });
  });
});
