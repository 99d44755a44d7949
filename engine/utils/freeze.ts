/**
 * Recursively freeze plain objects and arrays. Maps are left as-is; expose
 * them through ReadonlyMap instead.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }

  if (value instanceof Map) {
    for (const entry of value.values()) {
      deepFreeze(entry);
    }
    return value;
  }

  Object.freeze(value);
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}

/** structuredClone followed by deepFreeze. */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
