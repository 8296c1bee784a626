/**
 * Getter
 *
 * Getter<S, A> reads exactly one A out of an S. A Getter is a Fold with
 * exactly one focus.
 */

import type { Monoid } from "@refract/fp";
import { Fold } from "./fold.js";

/**
 * Getter - a total, read-only view
 */
export class Getter<S, A> {
  constructor(private readonly _get: (s: S) => A) {}

  get(s: S): A {
    return this._get(s);
  }

  asFold(): Fold<S, A> {
    return new Fold<S, A>(<M>(_M: Monoid<M>, f: (a: A) => M, s: S) => f(this.get(s)));
  }

  composeGetter<C>(other: Getter<A, C>): Getter<S, C> {
    return new Getter<S, C>((s) => other.get(this.get(s)));
  }

  composeFold<C>(other: Fold<A, C>): Fold<S, C> {
    return this.asFold().composeFold(other);
  }
}

export namespace Getter {
  export function make<S, A>(get: (s: S) => A): Getter<S, A> {
    return new Getter<S, A>(get);
  }
}
