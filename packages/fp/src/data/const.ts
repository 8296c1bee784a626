/**
 * Const
 *
 * Const<M, A> ≅ M
 *
 * A type constructor that ignores its second parameter. Mapping over a Const
 * does nothing, and given a Monoid for M, combining two Consts combines the
 * carried values. Running a traversal in Const collects instead of updating,
 * which is how a traversal doubles as a fold.
 *
 * Zero-cost: a `Const<number, string>` is a number at runtime.
 */

/**
 * Const type - carries an M, phantom in A
 */
export type Const<M, _A> = M;

/**
 * Wrap a value in Const (no-op at runtime)
 */
export function Const<M, A = never>(m: M): Const<M, A> {
  return m;
}

/**
 * Extract the carried value (no-op at runtime)
 */
export function getConst<M, A>(c: Const<M, A>): M {
  return c;
}
