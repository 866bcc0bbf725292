import { describe, expect, it } from 'vitest';

import {
  allOf,
  anyOf,
  anything,
  argumentAt,
  calleeOf,
  kindIs,
  literalTextExcludes,
  not,
  nothing,
  referencesStaticMember
} from '..';
import {
  collectNodes,
  compileSource,
  getExpressionNode
} from '../../frontend/tests/estree-utils';
import type { Matcher } from '../../types';

/**
 * Test suite: matcher composition.
 *
 * Coverage:
 * - Short-circuit evaluation order.
 * - Identity elements of the empty conjunction and disjunction.
 * - Totality over every node of a varied program.
 */
describe('Matcher Combinators', () => {
  /**
   * Helper: matcher returning a fixed answer and logging its label.
   */
  const createRecorder = () => {
    const evaluated: string[] = [];
    const probe =
      (label: string, result: boolean): Matcher =>
      () => {
        evaluated.push(label);
        return result;
      };
    return { evaluated, probe };
  };

  const { node, context } = getExpressionNode('f(1)');

  describe('Short-Circuit', () => {
    it('allOf stops at the first false', () => {
      const { evaluated, probe } = createRecorder();
      const matcher = allOf(probe('a', true), probe('b', false), probe('c', true));

      expect(matcher(node, context)).toBe(false);
      expect(evaluated).toEqual(['a', 'b']);
    });

    it('anyOf stops at the first true', () => {
      const { evaluated, probe } = createRecorder();
      const matcher = anyOf(probe('a', false), probe('b', true), probe('c', false));

      expect(matcher(node, context)).toBe(true);
      expect(evaluated).toEqual(['a', 'b']);
    });

    it('allOf evaluates every matcher when all hold', () => {
      const { evaluated, probe } = createRecorder();

      expect(allOf(probe('a', true), probe('b', true))(node, context)).toBe(true);
      expect(evaluated).toEqual(['a', 'b']);
    });
  });

  describe('Identity Elements', () => {
    it('allOf() matches everything', () => {
      expect(allOf()(node, context)).toBe(true);
    });

    it('anyOf() matches nothing', () => {
      expect(anyOf()(node, context)).toBe(false);
    });

    it('not inverts its operand', () => {
      expect(not(anything)(node, context)).toBe(false);
      expect(not(nothing)(node, context)).toBe(true);
    });
  });

  describe('Totality', () => {
    const { program, context: unitContext } = compileSource([
      "import * as util from 'node:util';",
      'export class Box extends Base {',
      '  #secret = 1;',
      '  static of(...items) { return new Box(items); }',
      '  get size() { return this.#secret ?? 0; }',
      '}',
      'const pattern = /a+/g;',
      'const big = 10n;',
      'const tpl = `x${pattern.source}y`;',
      'const pick = ({ a, b: [c] = [] }) => a?.[c];',
      "util.format(`plain`, ...[1, 2]);",
      'label: for (const k in {}) { continue label; }',
      'try { throw new Error(tpl); } catch { void 0; }'
    ]);

    const matchers: Matcher[] = [
      kindIs('Literal'),
      literalTextExcludes(/%s/g),
      calleeOf(anything),
      argumentAt(0, anything),
      argumentAt(5, anything),
      referencesStaticMember('node:util', 'format'),
      allOf(calleeOf(kindIs('MemberExpression')), argumentAt(1, anything)),
      anyOf(),
      not(nothing)
    ];

    it('every matcher returns a boolean for every node', () => {
      const nodes = collectNodes(program);
      expect(nodes.length).toBeGreaterThan(50);

      for (const candidate of nodes) {
        for (const matcher of matchers) {
          expect(typeof matcher(candidate, unitContext)).toBe('boolean');
        }
      }
    });
  });
});
