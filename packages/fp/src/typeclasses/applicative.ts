/**
 * Pointed, Apply and Applicative Typeclasses
 *
 * Pointed extends Functor with the ability to lift a value into a context.
 * Apply extends Functor with the ability to apply a function in a context.
 * Applicative is both.
 *
 * Pointed is the capability a Prism needs for `modifyWithEffect`: lift the
 * unchanged source when nothing matches, map the reconstruction over the
 * effect when something does. Traversals over several foci need `ap` as well.
 *
 * Laws:
 *   - Identity: pure(id).ap(v) === v
 *   - Homomorphism: pure(f).ap(pure(x)) === pure(f(x))
 *   - Interchange: u.ap(pure(y)) === pure(f => f(y)).ap(u)
 *   - Map consistency: map(fa, f) === pure(f).ap(fa)
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Pointed
// ============================================================================

/**
 * Pointed typeclass - a Functor with pure
 */
export interface Pointed<F extends TypeFunction> extends Functor<F> {
  readonly pure: <A>(a: A) => $<F, A>;
}

// ============================================================================
// Apply
// ============================================================================

/**
 * Apply typeclass - extends Functor with application
 */
export interface Apply<F extends TypeFunction> extends Functor<F> {
  readonly ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>;
}

// ============================================================================
// Applicative
// ============================================================================

/**
 * Applicative typeclass - Apply with pure
 */
export interface Applicative<F extends TypeFunction> extends Apply<F>, Pointed<F> {}

// ============================================================================
// Derived Operations from Apply
// ============================================================================

/**
 * Apply two functorial values and combine with a function
 */
export function map2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C) => $<F, C> {
  return <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C): $<F, C> =>
    F.ap<B, C>(
      F.map<A, (b: B) => C>(fa, (a) => (b) => f(a, b)),
      fb,
    );
}

/**
 * Run a list of effects and collect their results, left to right
 */
export function sequence<F extends TypeFunction>(
  F: Applicative<F>,
): <A>(fas: ReadonlyArray<$<F, A>>) => $<F, A[]> {
  const zip = map2(F);
  return <A>(fas: ReadonlyArray<$<F, A>>): $<F, A[]> =>
    fas.reduce<$<F, A[]>>(
      (acc, fa) => zip<A[], A, A[]>(acc, fa, (as, a) => [...as, a]),
      F.pure<A[]>([]),
    );
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Pointed instance
 */
export function makePointed<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Pointed<F> {
  return { map, pure };
}

/**
 * Create an Applicative instance
 */
export function makeApplicative<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
  ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Applicative<F> {
  return { map, ap, pure };
}
