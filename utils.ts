/**
 * Value helpers shared by the records, errors and the equatable containers.
 *
 * @module
 */

/**
 * A state that decides its own equality, the way a value type implements
 * `equals()` in most languages. {@link isEqual} defers to it.
 *
 * @example
 * ```ts
 * class Money implements EquatableState {
 *   constructor(readonly cents: number, readonly currency: string) {}
 *   equals(other: unknown) {
 *     return other instanceof Money && other.cents === this.cents && other.currency === this.currency;
 *   }
 * }
 * ```
 */
export interface EquatableState {
  equals(other: unknown): boolean;
}

function isEquatable(value: unknown): value is EquatableState {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "equals") === "function";
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Value equality for immutable state.
 *
 * - an {@link EquatableState} decides via `equals()`;
 * - primitives compare with `Object.is` (so `NaN` equals `NaN`);
 * - arrays, plain objects, `Date`, `Map` and `Set` compare structurally
 *   (`Map` keys by identity, `Set` members by value);
 * - any other object compares by identity.
 *
 * @example
 * ```ts
 * isEqual({ count: 1, tags: ["a"] }, { count: 1, tags: ["a"] }); // true
 * isEqual(new Date(0), new Date(0));                              // true
 * isEqual(new Map([["a", 1]]), new Map([["a", 2]]));              // false
 * ```
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (isEquatable(a)) return a.equals(b);
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => isEqual(item, b[i]));
  }

  if (a instanceof Date) {
    return b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Map) {
    if (!(b instanceof Map) || a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !isEqual(value, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Set) {
    if (!(b instanceof Set) || a.size !== b.size) return false;
    const unmatched = [...b];
    for (const value of a) {
      let index = unmatched.indexOf(value);
      if (index === -1) index = unmatched.findIndex(other => isEqual(value, other));
      if (index === -1) return false;
      unmatched.splice(index, 1);
    }
    return true;
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;

  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;

  return keys.every(key =>
    Object.prototype.hasOwnProperty.call(b, key) && isEqual(Reflect.get(a, key), Reflect.get(b, key))
  );
}

/**
 * Short human-readable rendering of a state or event for logs:
 * JSON for objects, `String()` for everything else.
 */
export function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value) ?? String(value);
    } catch {
      // circular structures
      return String(value);
    }
  }

  return String(value);
}
