/**
 * Lens
 *
 * PLens<S, T, A, B> focuses on exactly one A inside an S: it always reads,
 * and writing a B back turns the S into a T.
 *
 * ```typescript
 * const name = Lens.prop<User, "name">("name");
 * name.setWith(user, "Ada"); // { ...user, name: "Ada" }
 * ```
 */

import type { $, Functor, TypeFunction } from "@refract/fp";
import { Right } from "@refract/fp";
import { Getter } from "./getter.js";
import { POptional } from "./optional.js";

// ============================================================================
// Lens
// ============================================================================

/**
 * PLens - a total read-write view of one focus
 */
export class PLens<S, T, A, B> {
  constructor(
    private readonly _get: (s: S) => A,
    private readonly _setWith: (s: S, b: B) => T,
  ) {}

  get(s: S): A {
    return this._get(s);
  }

  setWith(s: S, b: B): T {
    return this._setWith(s, b);
  }

  modifyWith(s: S, f: (a: A) => B): T {
    return this.setWith(s, f(this.get(s)));
  }

  /**
   * A Lens always has its focus, so a Functor is enough
   */
  modifyWithEffect<F extends TypeFunction>(F: Functor<F>, s: S, f: (a: A) => $<F, B>): $<F, T> {
    return F.map<B, T>(f(this.get(s)), (b) => this.setWith(s, b));
  }

  modify(f: (a: A) => B): (s: S) => T {
    return (s) => this.modifyWith(s, f);
  }

  set(b: B): (s: S) => T {
    return (s) => this.setWith(s, b);
  }

  composeLens<C, D>(other: PLens<A, B, C, D>): PLens<S, T, C, D> {
    return new PLens<S, T, C, D>(
      (s) => other.get(this.get(s)),
      (s, d) => this.modifyWith(s, (a) => other.setWith(a, d)),
    );
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  asOptional(): POptional<S, T, A, B> {
    return new POptional<S, T, A, B>(
      (s) => Right(this.get(s)),
      (s, b) => this.setWith(s, b),
    );
  }

  asGetter(): Getter<S, A> {
    return new Getter<S, A>((s) => this.get(s));
  }
}

/**
 * Monomorphic Lens
 */
export type Lens<S, A> = PLens<S, S, A, A>;

// ============================================================================
// Constructors
// ============================================================================

export namespace PLens {
  export function make<S, T, A, B>(get: (s: S) => A, setWith: (s: S, b: B) => T): PLens<S, T, A, B> {
    return new PLens<S, T, A, B>(get, setWith);
  }
}

export const Lens = {
  make<S, A>(get: (s: S) => A, setWith: (s: S, a: A) => S): Lens<S, A> {
    return new PLens<S, S, A, A>(get, setWith);
  },

  /**
   * Lens on one property of an object, copying on write
   */
  prop<S extends object, K extends keyof S>(key: K): Lens<S, S[K]> {
    return new PLens<S, S, S[K], S[K]>(
      (s) => s[key],
      (s, a) => ({ ...s, [key]: a }),
    );
  },
};
