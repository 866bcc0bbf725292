import { getCallArgument, isCallShaped } from '../call-utils';
import { NO_MATCH, defineChecker, describeMatch } from '../checker/define';
import { replaceNode } from '../edits/fix-builders';
import {
  allOf,
  anyOf,
  argumentAt,
  literalTextExcludes,
  referencesStaticMember
} from '../matchers';
import type { Checker, Matcher } from '../types';

/**
 * A `util.format` directive: `%s %d %i %f %j %o %O %c %%`.
 */
const FORMAT_DIRECTIVE = /%[sdifjoOc%]/;

/**
 * Owners the assertion module's functions resolve to, per import style:
 * `import * as assert`, `import assert`, and the unprefixed specifier.
 */
const ASSERT_OWNERS = [
  'node:assert',
  'node:assert#default',
  'assert',
  'assert#default'
] as const;

const UTIL_OWNERS = [
  'node:util',
  'node:util#default',
  'util',
  'util#default'
] as const;

/**
 * Assertion functions and the index of their message argument.
 */
const MESSAGE_INDEX_BY_ASSERTION: ReadonlyMap<string, number> = new Map([
  ['ok', 1],
  ['strictEqual', 2],
  ['notStrictEqual', 2],
  ['equal', 2],
  ['notEqual', 2]
]);

function memberOfAny(owners: readonly string[], member: string): Matcher {
  return anyOf(...owners.map(owner => referencesStaticMember(owner, member)));
}

/**
 * `util.format(<literal without directives>, ...)`
 */
const isConstantFormatCall = allOf(
  memberOfAny(UTIL_OWNERS, 'format'),
  argumentAt(0, literalTextExcludes(FORMAT_DIRECTIVE))
);

const isEagerlyFormattedAssertion = anyOf(
  ...Array.from(MESSAGE_INDEX_BY_ASSERTION, ([assertion, index]) =>
    allOf(
      memberOfAny(ASSERT_OWNERS, assertion),
      argumentAt(index, isConstantFormatCall)
    )
  )
);

/**
 * Flags assertion messages built with `util.format` from a constant
 * string, which formats on every call even when the assertion holds.
 *
 * ```js
 * assert.ok(ready, util.format('service is not ready'));
 * // fixed to
 * assert.ok(ready, 'service is not ready');
 * ```
 *
 * The fix is only offered when `format` receives the literal alone; extra
 * arguments would be appended to the output, so those calls are reported
 * without a fix.
 */
export const eagerAssertionMessage: Checker = defineChecker({
  name: 'EagerAssertionMessage',
  summary: 'Assertion message is formatted eagerly from a constant string',
  visitors: {
    CallExpression(node, context) {
      if (!isEagerlyFormattedAssertion(node, context)) return NO_MATCH;

      const assertion = context.resolveCall(node)?.member ?? '';
      const index = MESSAGE_INDEX_BY_ASSERTION.get(assertion);
      if (index === undefined) return NO_MATCH;

      const formatCall = getCallArgument(node, index);
      if (!isCallShaped(formatCall)) return NO_MATCH;

      const [literal] = formatCall.arguments;
      const literalText = literal ? context.getSourceText(literal) : null;

      if (formatCall.arguments.length !== 1 || literalText === null) {
        return describeMatch(eagerAssertionMessage, node);
      }

      return describeMatch(eagerAssertionMessage, node, {
        edit: replaceNode(formatCall, literalText)
      });
    }
  }
});
