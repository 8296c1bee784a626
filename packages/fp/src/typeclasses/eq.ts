/**
 * Eq Typeclass
 *
 * Equality comparison, used by law checks to decide whether two results are
 * "the same value".
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass
 */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create an Eq instance from an equality function
 */
export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

/**
 * Eq via `Object.is` (SameValue). Suitable for primitives.
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => Object.is(x, y) };
}

/**
 * Compare by a projection
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => E.eqv(f(x), f(y)) };
}

/**
 * Structural equality for plain data (objects, arrays, primitives).
 */
export function eqStructural<A>(): Eq<A> {
  return { eqv: (x, y) => deepEqual(x, y) };
}

function deepEqual(x: unknown, y: unknown): boolean {
  if (Object.is(x, y)) return true;
  if (typeof x !== "object" || typeof y !== "object" || x === null || y === null) {
    return false;
  }
  if (Array.isArray(x) || Array.isArray(y)) {
    if (!Array.isArray(x) || !Array.isArray(y) || x.length !== y.length) return false;
    return x.every((item, i) => deepEqual(item, y[i]));
  }
  const xKeys = Object.keys(x);
  const yKeys = Object.keys(y);
  if (xKeys.length !== yKeys.length) return false;
  return xKeys.every(
    (key) => Object.prototype.hasOwnProperty.call(y, key) && deepEqual(field(x, key), field(y, key)),
  );
}

function field(obj: object, key: string): unknown {
  return Reflect.get(obj, key);
}

// ============================================================================
// Instances
// ============================================================================

export const eqNumber: Eq<number> = eqStrict<number>();
export const eqString: Eq<string> = eqStrict<string>();
export const eqBoolean: Eq<boolean> = eqStrict<boolean>();
