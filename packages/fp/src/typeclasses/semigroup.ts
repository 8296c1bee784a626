/**
 * Semigroup and Monoid Typeclasses
 *
 * Semigroup: A type with an associative binary operation.
 * Monoid: A Semigroup with an identity element.
 *
 * Folds aggregate their foci through a Monoid: `empty` for "no focus",
 * `combine` to join several.
 *
 * Laws:
 *   - Semigroup Associativity: combine(combine(x, y), z) === combine(x, combine(y, z))
 *   - Monoid Left Identity: combine(empty, x) === x
 *   - Monoid Right Identity: combine(x, empty) === x
 */

import type { Option } from "../data/option.js";

// ============================================================================
// Semigroup
// ============================================================================

/**
 * Semigroup typeclass
 */
export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}

// ============================================================================
// Monoid
// ============================================================================

/**
 * Monoid typeclass - Semigroup with identity
 */
export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Combine all elements using the Monoid (returns empty for empty array)
 */
export function combineAllMonoid<A>(M: Monoid<A>): (as: readonly A[]) => A {
  return (as) => as.reduce((acc, a) => M.combine(acc, a), M.empty);
}

// ============================================================================
// Monoid Instances
// ============================================================================

/**
 * Addition
 */
export const monoidSum: Monoid<number> = {
  combine: (x, y) => x + y,
  empty: 0,
};

/**
 * Multiplication
 */
export const monoidProduct: Monoid<number> = {
  combine: (x, y) => x * y,
  empty: 1,
};

/**
 * String concatenation
 */
export const monoidString: Monoid<string> = {
  combine: (x, y) => x + y,
  empty: "",
};

/**
 * Conjunction
 */
export const monoidAll: Monoid<boolean> = {
  combine: (x, y) => x && y,
  empty: true,
};

/**
 * Disjunction
 */
export const monoidAny: Monoid<boolean> = {
  combine: (x, y) => x || y,
  empty: false,
};

/**
 * Array concatenation
 */
export function monoidArray<A>(): Monoid<A[]> {
  return {
    combine: (x, y) => [...x, ...y],
    empty: [],
  };
}

/**
 * Keep the first present value
 */
export function monoidFirst<A>(): Monoid<Option<A>> {
  return {
    combine: (x, y) => (x !== null ? x : y),
    empty: null,
  };
}
