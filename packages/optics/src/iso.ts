/**
 * Iso
 *
 * PIso<S, T, A, B> is a lossless two-way conversion: `get: S => A` and
 * `reverseGet: B => T`. It is a Prism that always matches and a Lens whose
 * setter ignores the old source.
 */

import { Right } from "@refract/fp";
import { PLens } from "./lens.js";
import { PPrism } from "./prism.js";

/**
 * PIso - an invertible conversion
 */
export class PIso<S, T, A, B> {
  constructor(
    private readonly _get: (s: S) => A,
    private readonly _reverseGet: (b: B) => T,
  ) {}

  get(s: S): A {
    return this._get(s);
  }

  reverseGet(b: B): T {
    return this._reverseGet(b);
  }

  modifyWith(s: S, f: (a: A) => B): T {
    return this.reverseGet(f(this.get(s)));
  }

  /**
   * The same conversion, the other way round
   */
  reverse(): PIso<B, A, T, S> {
    return new PIso<B, A, T, S>(
      (b) => this.reverseGet(b),
      (s) => this.get(s),
    );
  }

  composeIso<C, D>(other: PIso<A, B, C, D>): PIso<S, T, C, D> {
    return new PIso<S, T, C, D>(
      (s) => other.get(this.get(s)),
      (d) => this.reverseGet(other.reverseGet(d)),
    );
  }

  asPrism(): PPrism<S, T, A, B> {
    return new PPrism<S, T, A, B>(
      (s) => Right(this.get(s)),
      (b) => this.reverseGet(b),
    );
  }

  asLens(): PLens<S, T, A, B> {
    return new PLens<S, T, A, B>(
      (s) => this.get(s),
      (_, b) => this.reverseGet(b),
    );
  }
}

/**
 * Monomorphic Iso
 */
export type Iso<S, A> = PIso<S, S, A, A>;

export namespace PIso {
  export function make<S, T, A, B>(get: (s: S) => A, reverseGet: (b: B) => T): PIso<S, T, A, B> {
    return new PIso<S, T, A, B>(get, reverseGet);
  }
}

export const Iso = {
  make<S, A>(get: (s: S) => A, reverseGet: (a: A) => S): Iso<S, A> {
    return new PIso<S, S, A, A>(get, reverseGet);
  },

  id<A>(): Iso<A, A> {
    return new PIso<A, A, A, A>(
      (a) => a,
      (a) => a,
    );
  },
};
