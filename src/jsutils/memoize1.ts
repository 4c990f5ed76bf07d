/**
 * Memoizes the provided single-argument function, keyed weakly on its
 * argument so that dropped schemas and documents are collected.
 */
export function memoize1<A1 extends object, R>(
  fn: (a1: A1) => R,
): (a1: A1) => R {
  const cache = new WeakMap<A1, R>();

  return function memoized(a1) {
    const cached = cache.get(a1);
    if (cached !== undefined) {
      return cached;
    }

    const result = fn(a1);
    cache.set(a1, result);
    return result;
  };
}
