/**
 * Traversal
 *
 * PTraversal<S, T, A, B> focuses on zero or more A inside an S and can
 * rewrite all of them at once, in any Applicative effect.
 *
 * The primitive is `modifyWithEffect`. A plain `modifyWith` runs it in Id, and
 * running it in Const collects the foci instead of rewriting them, which is
 * why every Traversal is also a Fold.
 *
 * ```typescript
 * const each = PTraversal.each<number, number>();
 *
 * each.modifyWith([1, 2, 3], (n) => n * 10);                    // [10, 20, 30]
 * each.modifyWithEffect(optionApplicative, [1, -2], positive); // None
 * ```
 */

import type { $, Applicative, TypeFunction } from "@refract/fp";
import { ApplicativeOps, constApplicative, idApplicative } from "@refract/fp";
import { Fold } from "./fold.js";
import { PSetter } from "./setter.js";

// ============================================================================
// Traversal
// ============================================================================

/**
 * The effectful modification every Traversal is built from
 */
export type ModifyWithEffect<S, T, A, B> = <F extends TypeFunction>(
  F: Applicative<F>,
  s: S,
  f: (a: A) => $<F, B>,
) => $<F, T>;

/**
 * PTraversal - a read-write view of zero or more foci
 */
export class PTraversal<S, T, A, B> {
  constructor(private readonly _modifyWithEffect: ModifyWithEffect<S, T, A, B>) {}

  /**
   * Rewrite every focus through an effectful function, sequencing the effects
   * left to right
   */
  modifyWithEffect<F extends TypeFunction>(F: Applicative<F>, s: S, f: (a: A) => $<F, B>): $<F, T> {
    return this._modifyWithEffect(F, s, f);
  }

  modifyWith(s: S, f: (a: A) => B): T {
    return this.modifyWithEffect(idApplicative, s, f);
  }

  setWith(s: S, b: B): T {
    return this.modifyWith(s, () => b);
  }

  modify(f: (a: A) => B): (s: S) => T {
    return (s) => this.modifyWith(s, f);
  }

  set(b: B): (s: S) => T {
    return (s) => this.setWith(s, b);
  }

  /**
   * Curried form of `modifyWithEffect`
   */
  modifyF<F extends TypeFunction>(F: Applicative<F>, f: (a: A) => $<F, B>): (s: S) => $<F, T> {
    return (s) => this.modifyWithEffect(F, s, f);
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  composeTraversal<C, D>(other: PTraversal<A, B, C, D>): PTraversal<S, T, C, D> {
    return new PTraversal<S, T, C, D>((F, s, f) =>
      this.modifyWithEffect(F, s, (a) => other.modifyWithEffect(F, a, f)),
    );
  }

  composeSetter<C, D>(other: PSetter<A, B, C, D>): PSetter<S, T, C, D> {
    return this.asSetter().composeSetter(other);
  }

  composeFold<C>(other: Fold<A, C>): Fold<S, C> {
    return this.asFold().composeFold(other);
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  asSetter(): PSetter<S, T, A, B> {
    return new PSetter<S, T, A, B>((s, f) => this.modifyWith(s, f));
  }

  asFold(): Fold<S, A> {
    return new Fold<S, A>((M, f, s) => this.modifyWithEffect(constApplicative(M), s, f));
  }
}

/**
 * Monomorphic Traversal
 */
export type Traversal<S, A> = PTraversal<S, S, A, A>;

// ============================================================================
// Constructors
// ============================================================================

export namespace PTraversal {
  export function make<S, T, A, B>(modifyWithEffect: ModifyWithEffect<S, T, A, B>): PTraversal<S, T, A, B> {
    return new PTraversal<S, T, A, B>(modifyWithEffect);
  }

  /**
   * Traversal over every element of an array
   */
  export function each<A, B>(): PTraversal<readonly A[], B[], A, B> {
    return new PTraversal<readonly A[], B[], A, B>((F, as, f) => {
      const sequenceF = ApplicativeOps.sequence(F);
      return sequenceF<B>(as.map((a) => f(a)));
    });
  }
}
