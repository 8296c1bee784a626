/**
 * Prism
 *
 * PPrism<S, T, A, B> selects one case A out of a sum-like source S. Matching
 * may fail; when it does, the source comes back re-typed as T. Going the other
 * way always succeeds: a B can be turned into a whole new T with no source at
 * all.
 *
 *   tryMatch:    S => Either<T, A>
 *   reconstruct: B => T
 *
 * Every other operation is derived from these two. `Prism<S, A>` fixes T = S
 * and B = A.
 *
 * ```typescript
 * type Json = { kind: "num"; value: number } | { kind: "str"; value: string };
 *
 * const num = Prism.fromOption<Json, number>(
 *   (j) => (j.kind === "num" ? j.value : null),
 *   (value) => ({ kind: "num", value }),
 * );
 *
 * num.matchOption({ kind: "num", value: 1 });           // 1
 * num.modifyWith({ kind: "str", value: "a" }, (n) => n + 1); // unchanged
 * num.reconstruct(7);                                      // { kind: "num", value: 7 }
 * ```
 *
 * ## Effects
 *
 * `modifyWithEffect` needs only `pure` and `map` (a Pointed functor): with no
 * match, the unchanged source is lifted with `pure` and `f` never runs.
 *
 * ## Option and nullable foci
 *
 * Option is `A | null`, so `matchOption` cannot tell "no match" apart from a
 * matched `null`. `tryMatch`, `isMatching` and the views keep the two apart;
 * use them when the focus or the result type may itself be null.
 */

import type { $, Either, Option, Pointed, TypeFunction } from "@refract/fp";
import { EitherOps, Left, None, Right, Some, isRight } from "@refract/fp";
import { Fold } from "./fold.js";
import { Getter } from "./getter.js";
import type { PIso } from "./iso.js";
import type { PLens } from "./lens.js";
import { POptional } from "./optional.js";
import { PSetter } from "./setter.js";
import { PTraversal } from "./traversal.js";

// ============================================================================
// Prism
// ============================================================================

/**
 * PPrism - a partial, invertible view of one case of a sum
 */
export class PPrism<S, T, A, B> {
  constructor(
    private readonly _tryMatch: (s: S) => Either<T, A>,
    private readonly _reconstruct: (b: B) => T,
    private readonly _matchOption: (s: S) => Option<A> = (s) => EitherOps.toOption(_tryMatch(s)),
  ) {}

  // ==========================================================================
  // Primitives
  // ==========================================================================

  /**
   * `Right(a)` when the source is in the selected case, otherwise
   * `Left(t)`: the source re-typed for the result side
   */
  tryMatch(s: S): Either<T, A> {
    return this._tryMatch(s);
  }

  /**
   * Build a whole result from a focus value. Needs no source.
   */
  reconstruct(b: B): T {
    return this._reconstruct(b);
  }

  // ==========================================================================
  // Derived Operations
  // ==========================================================================

  matchOption(s: S): Option<A> {
    return this._matchOption(s);
  }

  /**
   * Transform the focus if it matches; return the source re-typed otherwise.
   * `f` is not called when nothing matches.
   */
  modifyWith(s: S, f: (a: A) => B): T {
    const r = this.tryMatch(s);
    return isRight(r) ? this.reconstruct(f(r.right)) : r.left;
  }

  /**
   * Effectful `modifyWith`. With no match, the result is `F.pure` of the
   * re-typed source and `f` is not called.
   */
  modifyWithEffect<F extends TypeFunction>(F: Pointed<F>, s: S, f: (a: A) => $<F, B>): $<F, T> {
    const r = this.tryMatch(s);
    return isRight(r) ? F.map<B, T>(f(r.right), (b) => this.reconstruct(b)) : F.pure(r.left);
  }

  /**
   * `Some(modified)` when the source matches, `None` otherwise
   */
  modifyOptional(s: S, f: (a: A) => B): Option<T> {
    const r = this.tryMatch(s);
    return isRight(r) ? Some(this.reconstruct(f(r.right))) : None;
  }

  /**
   * Replace the focus if it matches; the source re-typed otherwise
   */
  setWith(s: S, b: B): T {
    return this.modifyWith(s, () => b);
  }

  setOptional(s: S, b: B): Option<T> {
    return this.modifyOptional(s, () => b);
  }

  isMatching(s: S): boolean {
    return isRight(this.tryMatch(s));
  }

  /**
   * The reconstruction direction as a read-only view
   */
  reversed(): Getter<B, T> {
    return new Getter<B, T>((b) => this.reconstruct(b));
  }

  // ==========================================================================
  // Curried Forms
  // ==========================================================================

  modify(f: (a: A) => B): (s: S) => T {
    return (s) => this.modifyWith(s, f);
  }

  set(b: B): (s: S) => T {
    return (s) => this.setWith(s, b);
  }

  modifyF<F extends TypeFunction>(F: Pointed<F>, f: (a: A) => $<F, B>): (s: S) => $<F, T> {
    return (s) => this.modifyWithEffect(F, s, f);
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  /**
   * Focus through this prism, then through `other`.
   *
   * If this prism fails, its failure is the result. If `other` fails, its
   * failure payload is carried back to T with this prism's `reconstruct`.
   */
  composePrism<C, D>(other: PPrism<A, B, C, D>): PPrism<S, T, C, D> {
    return new PPrism<S, T, C, D>(
      (s) => {
        const outer = this.tryMatch(s);
        if (!isRight(outer)) return outer;
        const inner = other.tryMatch(outer.right);
        return isRight(inner) ? inner : Left(this.reconstruct(inner.left));
      },
      (d) => this.reconstruct(other.reconstruct(d)),
    );
  }

  composeIso<C, D>(other: PIso<A, B, C, D>): PPrism<S, T, C, D> {
    return this.composePrism(other.asPrism());
  }

  composeLens<C, D>(other: PLens<A, B, C, D>): POptional<S, T, C, D> {
    return this.asOptional().composeOptional(other.asOptional());
  }

  composeOptional<C, D>(other: POptional<A, B, C, D>): POptional<S, T, C, D> {
    return this.asOptional().composeOptional(other);
  }

  composeTraversal<C, D>(other: PTraversal<A, B, C, D>): PTraversal<S, T, C, D> {
    return this.asTraversal().composeTraversal(other);
  }

  composeSetter<C, D>(other: PSetter<A, B, C, D>): PSetter<S, T, C, D> {
    return this.asSetter().composeSetter(other);
  }

  composeFold<C>(other: Fold<A, C>): Fold<S, C> {
    return this.asFold().composeFold(other);
  }

  composeGetter<C>(other: Getter<A, C>): Fold<S, C> {
    return this.asFold().composeGetter(other);
  }

  // ==========================================================================
  // Weaker Views
  // ==========================================================================

  /**
   * Zero-or-one Fold: the focus if it matches, `M.empty` otherwise
   */
  asFold(): Fold<S, A> {
    return new Fold<S, A>((M, f, s) => {
      const r = this.tryMatch(s);
      return isRight(r) ? f(r.right) : M.empty;
    });
  }

  asSetter(): PSetter<S, T, A, B> {
    return new PSetter<S, T, A, B>((s, f) => this.modifyWith(s, f));
  }

  asTraversal(): PTraversal<S, T, A, B> {
    return new PTraversal<S, T, A, B>((F, s, f) => this.modifyWithEffect(F, s, f));
  }

  asOptional(): POptional<S, T, A, B> {
    return new POptional<S, T, A, B>(
      (s) => this.tryMatch(s),
      (s, b) => this.setWith(s, b),
      (s) => this.matchOption(s),
      (s, f) => this.modifyWith(s, f),
    );
  }
}

/**
 * Monomorphic Prism
 */
export type Prism<S, A> = PPrism<S, S, A, A>;

// ============================================================================
// Constructors
// ============================================================================

export namespace PPrism {
  /**
   * Prism from its two primitives
   */
  export function make<S, T, A, B>(
    tryMatch: (s: S) => Either<T, A>,
    reconstruct: (b: B) => T,
  ): PPrism<S, T, A, B> {
    return new PPrism<S, T, A, B>(tryMatch, reconstruct);
  }
}

export const Prism = {
  /**
   * Monomorphic Prism from its two primitives
   */
  make<S, A>(tryMatch: (s: S) => Either<S, A>, reconstruct: (a: A) => S): Prism<S, A> {
    return new PPrism<S, S, A, A>(tryMatch, reconstruct);
  },

  /**
   * Prism from a partial match and a total reconstruction.
   * On no match the source itself is the failure value.
   */
  fromOption<S, A>(matchOption: (s: S) => Option<A>, reconstruct: (a: A) => S): Prism<S, A> {
    return new PPrism<S, S, A, A>(
      (s) => EitherOps.fromOption(matchOption(s), () => s),
      reconstruct,
      matchOption,
    );
  },

  /**
   * Prism selecting the values that satisfy a predicate
   */
  fromPredicate<A>(p: (a: A) => boolean): Prism<A, A> {
    return new PPrism<A, A, A, A>(
      (a) => (p(a) ? Right(a) : Left(a)),
      (a) => a,
    );
  },

  /**
   * Prism selecting a present Option: `Option<A>` to `A`
   */
  some<A>(): Prism<Option<A>, A> {
    return new PPrism<Option<A>, Option<A>, A, A>(
      (oa) => (oa !== null ? Right(oa) : Left(oa)),
      (a) => Some(a),
    );
  },

  /**
   * Identity prism: always matches, reconstructs unchanged
   */
  id<A>(): Prism<A, A> {
    return new PPrism<A, A, A, A>(
      (a) => Right(a),
      (a) => a,
    );
  },
};
