/**
 * Typeclass Instances
 *
 * Concrete Functor / Pointed / Applicative dictionaries for the data types
 * optics run their effectful modifications in.
 *
 * ```typescript
 * import { optionApplicative } from "@refract/fp";
 *
 * // Validate-then-update through a Prism; None aborts the whole update
 * prism.modifyWithEffect(optionApplicative, s, (a) => (a > 0 ? a * 2 : null));
 * ```
 */

import type { IdF, ConstF, OptionF, EitherF, ArrayF, PromiseF } from "./hkt.js";
import type { Applicative } from "./typeclasses/applicative.js";
import type { Monoid } from "./typeclasses/semigroup.js";
import * as E from "./data/either.js";

// ============================================================================
// Id
// ============================================================================

/**
 * Applicative for Id - runs a computation with no effect at all
 */
export const idApplicative: Applicative<IdF> = {
  map: (fa, f) => f(fa),
  ap: (fab, fa) => fab(fa),
  pure: (a) => a,
};

// ============================================================================
// Const
// ============================================================================

/**
 * Applicative for Const<M, _> - accumulates with the Monoid, never maps
 */
export function constApplicative<M>(M: Monoid<M>): Applicative<ConstF<M>> {
  return {
    map: (fa) => fa,
    ap: (fab, fa) => M.combine(fab, fa),
    pure: () => M.empty,
  };
}

// ============================================================================
// Option
// ============================================================================

/**
 * Applicative for Option - None short-circuits
 */
export const optionApplicative: Applicative<OptionF> = {
  map: (fa, f) => (fa !== null ? f(fa) : null),
  ap: (fab, fa) => (fab !== null && fa !== null ? fab(fa) : null),
  pure: (a) => a,
};

// ============================================================================
// Either
// ============================================================================

/**
 * Applicative for Either<E, _> - the first Left short-circuits
 */
export function eitherApplicative<E>(): Applicative<EitherF<E>> {
  return {
    map: (fa, f) => E.map(fa, f),
    ap: (fab, fa) => (E.isRight(fab) ? E.map(fa, fab.right) : fab),
    pure: (a) => E.Right(a),
  };
}

// ============================================================================
// Array
// ============================================================================

/**
 * Applicative for Array - the cartesian product of alternatives
 */
export const arrayApplicative: Applicative<ArrayF> = {
  map: (fa, f) => fa.map((a) => f(a)),
  ap: (fab, fa) => fab.flatMap((f) => fa.map((a) => f(a))),
  pure: (a) => [a],
};

// ============================================================================
// Promise
// ============================================================================

/**
 * Applicative for Promise - effects are awaited left to right
 */
export const promiseApplicative: Applicative<PromiseF> = {
  map: (fa, f) => fa.then((a) => f(a)),
  ap: (fab, fa) => fab.then((f) => fa.then((a) => f(a))),
  pure: (a) => new Promise((resolve) => resolve(a)),
};
