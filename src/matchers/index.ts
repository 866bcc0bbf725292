export { kindIs, literalTextExcludes, getLiteralText } from './leaf';
export { calleeOf, argumentAt, referencesStaticMember } from './structural';
export { allOf, anyOf, not, anything, nothing } from './combinators';
