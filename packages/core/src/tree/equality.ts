/**
 * Structural equality for property snapshots.
 *
 * Used by the default `changed()` policy. Primitives compare with Object.is,
 * functions and class instances by identity; arrays, plain objects, Maps, Sets
 * and Dates are compared by content. Map keys match by identity, Set members
 * structurally. Cycles compare by identity once revisited.
 */

function isPlainObject(v: object): boolean {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function equalInner(a: unknown, b: unknown, seen: Map<object, object>): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;

  const pairedWith = seen.get(a);
  if (pairedWith !== undefined) return pairedWith === b;
  seen.set(a, b);

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!equalInner(a[i], b[i], seen)) return false;
    }
    return true;
  }
  if (Array.isArray(b)) return false;

  if (a instanceof Date) {
    return b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Map) {
    if (!(b instanceof Map) || a.size !== b.size) return false;
    for (const [k, v] of a) {
      if (!b.has(k)) return false;
      if (!equalInner(v, b.get(k), seen)) return false;
    }
    return true;
  }

  if (a instanceof Set) {
    if (!(b instanceof Set) || a.size !== b.size) return false;
    // Each member of `a` claims one member of `b`, by identity first.
    const unclaimed = new Set<unknown>(b);
    for (const v of a) {
      if (unclaimed.delete(v)) continue;
      let claimed = false;
      for (const w of unclaimed) {
        if (equalInner(v, w, new Map(seen))) {
          unclaimed.delete(w);
          claimed = true;
          break;
        }
      }
      if (!claimed) return false;
    }
    return true;
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!equalInner(Reflect.get(a, key), Reflect.get(b, key), seen)) return false;
  }
  return true;
}

export function structuralEqual(a: unknown, b: unknown): boolean {
  return equalInner(a, b, new Map());
}
