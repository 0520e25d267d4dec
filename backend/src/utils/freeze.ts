/**
 * Recursively freezes plain objects and arrays. RegExp instances are left
 * alone: a frozen regex cannot update `lastIndex`.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value !== 'object' || value === null || value instanceof RegExp || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }

  return Object.freeze(value);
}
