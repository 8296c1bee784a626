/**
 * Fold
 *
 * Fold<S, A> reads zero or more A out of an S. It cannot write.
 *
 * The one primitive is `foldMap`: map every focus into a Monoid and combine.
 * Everything else (`getAll`, `headOption`, `exists`, ...) picks a Monoid.
 *
 * ```typescript
 * const evens = Fold.each<number>().composeFold(Fold.filtered((n) => n % 2 === 0));
 * evens.getAll([1, 2, 3, 4]); // [2, 4]
 * ```
 */

import type { Monoid, Option } from "@refract/fp";
import { Some, monoidAll, monoidAny, monoidArray, monoidFirst, monoidSum } from "@refract/fp";
import type { Getter } from "./getter.js";

// ============================================================================
// Fold
// ============================================================================

/**
 * Fold - a read-only view of zero or more foci
 */
export class Fold<S, A> {
  constructor(private readonly _foldMap: <M>(M: Monoid<M>, f: (a: A) => M, s: S) => M) {}

  /**
   * Map every focus into M and combine them, left to right.
   * `M.empty` when there is no focus.
   */
  foldMap<M>(M: Monoid<M>, f: (a: A) => M, s: S): M {
    return this._foldMap(M, f, s);
  }

  /**
   * All foci, in order
   */
  getAll(s: S): A[] {
    return this.foldMap(monoidArray<A>(), (a) => [a], s);
  }

  /**
   * The first focus, if any
   */
  headOption(s: S): Option<A> {
    return this.foldMap(monoidFirst<A>(), (a) => Some(a), s);
  }

  /**
   * Does any focus satisfy the predicate?
   */
  exists(s: S, p: (a: A) => boolean): boolean {
    return this.foldMap(monoidAny, p, s);
  }

  /**
   * Do all foci satisfy the predicate? (true when there are none)
   */
  all(s: S, p: (a: A) => boolean): boolean {
    return this.foldMap(monoidAll, p, s);
  }

  length(s: S): number {
    return this.foldMap(monoidSum, () => 1, s);
  }

  isEmpty(s: S): boolean {
    return !this.exists(s, () => true);
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  composeFold<C>(other: Fold<A, C>): Fold<S, C> {
    return new Fold<S, C>((M, f, s) => this.foldMap(M, (a) => other.foldMap(M, f, a), s));
  }

  composeGetter<C>(other: Getter<A, C>): Fold<S, C> {
    return this.composeFold(other.asFold());
  }
}

// ============================================================================
// Constructors
// ============================================================================

export namespace Fold {
  /**
   * Fold from a primitive foldMap
   */
  export function make<S, A>(foldMap: <M>(M: Monoid<M>, f: (a: A) => M, s: S) => M): Fold<S, A> {
    return new Fold<S, A>(foldMap);
  }

  /**
   * Fold over the elements of an array
   */
  export function each<A>(): Fold<readonly A[], A> {
    return new Fold<readonly A[], A>((M, f, as) =>
      as.reduce((acc, a) => M.combine(acc, f(a)), M.empty),
    );
  }

  /**
   * Zero-or-one fold: the value itself when it satisfies the predicate
   */
  export function filtered<A>(p: (a: A) => boolean): Fold<A, A> {
    return new Fold<A, A>((M, f, a) => (p(a) ? f(a) : M.empty));
  }
}
