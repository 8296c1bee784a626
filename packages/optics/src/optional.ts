/**
 * Optional
 *
 * POptional<S, T, A, B> focuses on zero or one A inside an S and can write it
 * back in place. Unlike a Prism, writing needs the original S: an Optional
 * updates a part of a larger structure instead of building a whole new one.
 *
 * Polymorphic; `Optional<S, A>` fixes T = S, B = A.
 */

import type { $, Either, Option, Pointed, TypeFunction } from "@refract/fp";
import { EitherOps, Left, None, OptionOps, Right, Some, isRight } from "@refract/fp";
import { Fold } from "./fold.js";
import { PSetter } from "./setter.js";
import { PTraversal } from "./traversal.js";

// ============================================================================
// Optional
// ============================================================================

/**
 * POptional - a read-write view of zero or one focus
 */
export class POptional<S, T, A, B> {
  constructor(
    private readonly _tryMatch: (s: S) => Either<T, A>,
    private readonly _setWith: (s: S, b: B) => T,
    private readonly _matchOption: (s: S) => Option<A> = (s) => EitherOps.toOption(_tryMatch(s)),
    private readonly _modifyWith: (s: S, f: (a: A) => B) => T = (s, f) => {
      const r = _tryMatch(s);
      return isRight(r) ? _setWith(s, f(r.right)) : r.left;
    },
  ) {}

  /**
   * The focus, or the source re-typed as T when there is none
   */
  tryMatch(s: S): Either<T, A> {
    return this._tryMatch(s);
  }

  matchOption(s: S): Option<A> {
    return this._matchOption(s);
  }

  /**
   * Replace the focus, if any; otherwise return the source unchanged
   */
  setWith(s: S, b: B): T {
    return this._setWith(s, b);
  }

  modifyWith(s: S, f: (a: A) => B): T {
    return this._modifyWith(s, f);
  }

  modifyWithEffect<F extends TypeFunction>(F: Pointed<F>, s: S, f: (a: A) => $<F, B>): $<F, T> {
    const r = this.tryMatch(s);
    return isRight(r) ? F.map<B, T>(f(r.right), (b) => this.setWith(s, b)) : F.pure(r.left);
  }

  /**
   * `Some(modified)` when there is a focus, `None` otherwise
   */
  modifyOptional(s: S, f: (a: A) => B): Option<T> {
    const r = this.tryMatch(s);
    return isRight(r) ? Some(this.setWith(s, f(r.right))) : None;
  }

  setOptional(s: S, b: B): Option<T> {
    return this.modifyOptional(s, () => b);
  }

  isMatching(s: S): boolean {
    return isRight(this.tryMatch(s));
  }

  modify(f: (a: A) => B): (s: S) => T {
    return (s) => this.modifyWith(s, f);
  }

  set(b: B): (s: S) => T {
    return (s) => this.setWith(s, b);
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  composeOptional<C, D>(other: POptional<A, B, C, D>): POptional<S, T, C, D> {
    return new POptional<S, T, C, D>(
      (s) => {
        const outer = this.tryMatch(s);
        if (!isRight(outer)) return outer;
        const inner = other.tryMatch(outer.right);
        return isRight(inner) ? inner : Left(this.setWith(s, inner.left));
      },
      (s, d) => this.modifyWith(s, (a) => other.setWith(a, d)),
      undefined,
      (s, f) => this.modifyWith(s, (a) => other.modifyWith(a, f)),
    );
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

  // ==========================================================================
  // Views
  // ==========================================================================

  asTraversal(): PTraversal<S, T, A, B> {
    return new PTraversal<S, T, A, B>((F, s, f) => this.modifyWithEffect(F, s, f));
  }

  asSetter(): PSetter<S, T, A, B> {
    return new PSetter<S, T, A, B>((s, f) => this.modifyWith(s, f));
  }

  asFold(): Fold<S, A> {
    return new Fold<S, A>((M, f, s) => {
      const r = this.tryMatch(s);
      return isRight(r) ? f(r.right) : M.empty;
    });
  }
}

/**
 * Monomorphic Optional
 */
export type Optional<S, A> = POptional<S, S, A, A>;

// ============================================================================
// Constructors
// ============================================================================

export namespace POptional {
  export function make<S, T, A, B>(
    tryMatch: (s: S) => Either<T, A>,
    setWith: (s: S, b: B) => T,
  ): POptional<S, T, A, B> {
    return new POptional<S, T, A, B>(tryMatch, setWith);
  }
}

export const Optional = {
  /**
   * Optional from a partial getter and a setter
   */
  make<S, A>(matchOption: (s: S) => Option<A>, setWith: (s: S, a: A) => S): Optional<S, A> {
    return new POptional<S, S, A, A>(
      (s) => EitherOps.fromOption(matchOption(s), () => s),
      (s, a) => (OptionOps.isSome(matchOption(s)) ? setWith(s, a) : s),
      matchOption,
    );
  },

  /**
   * Optional on an array index; out of range means no focus
   */
  index<A>(i: number): Optional<readonly A[], A> {
    return new POptional<readonly A[], readonly A[], A, A>(
      (as) => (i >= 0 && i < as.length ? Right(as[i]) : Left(as)),
      (as, a) => (i >= 0 && i < as.length ? as.map((x, j) => (j === i ? a : x)) : as),
    );
  },
};
