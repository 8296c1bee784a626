/**
 * Id (Identity)
 *
 * Id<A> ≅ A
 *
 * The identity type constructor. Like Option it is zero-cost: an `Id<number>`
 * is a plain number at runtime. It exists so that code written against a
 * `Functor` / `Applicative` dictionary can be run with "no effect", which is how
 * a traversal's pure `modifyWith` is derived from its effectful modify.
 */

/**
 * Identity type - the value itself
 */
export type Id<A> = A;

/**
 * Wrap a value in Id (no-op at runtime)
 */
export function Id<A>(a: A): Id<A> {
  return a;
}

/**
 * Extract the value from Id (no-op at runtime)
 */
export function runId<A>(ia: Id<A>): A {
  return ia;
}
