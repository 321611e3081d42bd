/**
 * Settings merge
 *
 * Plain objects merge key by key; arrays and scalars from the loaded side
 * replace the current value. `undefined` on the loaded side keeps the
 * current value. Neither input is mutated.
 */

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function deepMerge(current: PlainObject, loaded: PlainObject): PlainObject {
  const result: PlainObject = { ...current };

  for (const [key, value] of Object.entries(loaded)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

export type DeepReadonly<T> = T extends object
  ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
  : T;

/**
 * Freeze `value` and every object reachable from it
 */
export function deepFreeze<T extends object>(value: T): T {
  for (const entry of Object.values(value)) {
    if (typeof entry === 'object' && entry !== null && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
