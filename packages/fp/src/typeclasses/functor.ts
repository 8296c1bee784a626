/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over.
 * Instances must satisfy the following laws:
 *   - Identity: fa.map(a => a) === fa
 *   - Composition: fa.map(f).map(g) === fa.map(a => g(f(a)))
 *
 * All derived operations accept the typeclass dictionary as the first argument.
 */

import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Functor
// ============================================================================

/**
 * Functor typeclass interface.
 *
 * `_F` is never set at run time. `$<F, A>` cannot be read back to `F`, so
 * inference of `F` from a concrete dictionary goes through this member.
 */
export interface Functor<F extends TypeFunction> {
  readonly _F?: F;
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace all A values with a constant B value
 */
export function as<F extends TypeFunction>(F: Functor<F>): <A, B>(fa: $<F, A>, b: B) => $<F, B> {
  return (fa, b) => F.map(fa, () => b);
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return (f) => (fa) => F.map(fa, f);
}

// ============================================================================
// Instance Creators
// ============================================================================

/**
 * Create a Functor instance from a map function
 */
export function makeFunctor<F extends TypeFunction>(
  map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>,
): Functor<F> {
  return { map };
}
