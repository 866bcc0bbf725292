import type { Matcher } from '../types';
import type { MatcherTotality } from '../architecture';

/**
 * Short-circuit conjunction.
 *
 * Evaluates left to right and stops at the first `false`; later matchers
 * are not called. `allOf()` with no operands matches everything.
 *
 * @see {@link MatcherTotality}
 */
export function allOf(...matchers: readonly Matcher[]): Matcher {
  return (node, context) => {
    for (const matcher of matchers) {
      if (!matcher(node, context)) return false;
    }
    return true;
  };
}

/**
 * Short-circuit disjunction.
 *
 * Evaluates left to right and stops at the first `true`. `anyOf()` with no
 * operands matches nothing.
 */
export function anyOf(...matchers: readonly Matcher[]): Matcher {
  return (node, context) => {
    for (const matcher of matchers) {
      if (matcher(node, context)) return true;
    }
    return false;
  };
}

/**
 * Negation.
 */
export function not(matcher: Matcher): Matcher {
  return (node, context) => !matcher(node, context);
}

/** Matches every node. */
export const anything: Matcher = () => true;

/** Matches no node. */
export const nothing: Matcher = () => false;
