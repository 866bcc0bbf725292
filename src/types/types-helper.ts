/**
 * Flattens an intersection into a single object type so editor tooltips
 * show the resolved members instead of `A & B`.
 *
 * @see https://github.com/sindresorhus/type-fest/blob/main/source/simplify.d.ts
 */
export type Simplify<T> = { [KeyType in keyof T]: T[KeyType] } & {};
