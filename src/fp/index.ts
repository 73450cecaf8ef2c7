/**
 * Functional programming utilities
 * Curried functions for array operations
 */

/**
 * Curried filter
 */
export const filter =
  <T>(predicate: (item: T) => boolean) =>
  (array: T[]): T[] =>
    array.filter(predicate);

/**
 * Curried map
 */
export const map =
  <T, U>(fn: (item: T) => U) =>
  (array: T[]): U[] =>
    array.map(fn);

/**
 * Curried reduce
 */
export const reduce =
  <T, U>(fn: (acc: U, item: T) => U, initial: U) =>
  (array: T[]): U =>
    array.reduce(fn, initial);

/**
 * Check if value is not null or undefined
 */
export const isDefined = <T>(value: T | null | undefined): value is T =>
  value !== null && value !== undefined;

/**
 * Remove null and undefined values from array
 */
export const compact = <T>(array: (T | null | undefined)[]): T[] =>
  array.filter(isDefined);

/**
 * Lazily created, resettable reference.
 * Returns [get, set]: get creates the value on first use,
 * set replaces it (null clears it so the next get recreates it).
 */
export const lazyRef = <T>(
  create: () => T,
): [() => T, (value: T | null) => void] => {
  let ref: T | null = null;
  const get = (): T => {
    if (ref === null) ref = create();
    return ref;
  };
  const set = (value: T | null): void => {
    ref = value;
  };
  return [get, set];
};
