/**
 * Freezes a value and every plain object or array reachable from it
 */
export function deepFreeze<T extends object>(value: T): T {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Frozen deep copy. `Date` values are cloned, so `setTime()` on the copy leaves
 * the original alone.
 */
export function frozenCopy<T extends object>(value: T): T {
  return deepFreeze(structuredClone(value));
}
