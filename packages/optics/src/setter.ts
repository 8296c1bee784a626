/**
 * Setter
 *
 * PSetter<S, T, A, B> can only write: given a way to turn every A into a B,
 * it turns the S into a T. Polymorphic; `Setter<S, A>` fixes T = S, B = A.
 */

// ============================================================================
// Setter
// ============================================================================

/**
 * PSetter - a write-only optic
 */
export class PSetter<S, T, A, B> {
  constructor(private readonly _modifyWith: (s: S, f: (a: A) => B) => T) {}

  modifyWith(s: S, f: (a: A) => B): T {
    return this._modifyWith(s, f);
  }

  /**
   * Replace every focus with `b`
   */
  setWith(s: S, b: B): T {
    return this.modifyWith(s, () => b);
  }

  /**
   * Curried form of `modifyWith`
   */
  modify(f: (a: A) => B): (s: S) => T {
    return (s) => this.modifyWith(s, f);
  }

  /**
   * Curried form of `setWith`
   */
  set(b: B): (s: S) => T {
    return (s) => this.setWith(s, b);
  }

  composeSetter<C, D>(other: PSetter<A, B, C, D>): PSetter<S, T, C, D> {
    return new PSetter<S, T, C, D>((s, f) => this.modifyWith(s, (a) => other.modifyWith(a, f)));
  }
}

/**
 * Monomorphic Setter
 */
export type Setter<S, A> = PSetter<S, S, A, A>;

// ============================================================================
// Constructors
// ============================================================================

export namespace PSetter {
  export function make<S, T, A, B>(modifyWith: (s: S, f: (a: A) => B) => T): PSetter<S, T, A, B> {
    return new PSetter<S, T, A, B>(modifyWith);
  }

  /**
   * Setter over every element of an array
   */
  export function mapped<A, B>(): PSetter<readonly A[], B[], A, B> {
    return new PSetter<readonly A[], B[], A, B>((as, f) => as.map((a) => f(a)));
  }
}
