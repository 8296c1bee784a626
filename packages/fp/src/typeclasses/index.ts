/**
 * Typeclasses
 *
 * Each typeclass module is exported as a namespace to avoid name collisions,
 * with the interfaces also exported directly for convenience.
 */

// Functor hierarchy
export * as FunctorOps from "./functor.js";
export type { Functor } from "./functor.js";

export * as ApplicativeOps from "./applicative.js";
export type { Pointed, Apply, Applicative } from "./applicative.js";

// Algebraic structures
export * as SemigroupOps from "./semigroup.js";
export type { Semigroup, Monoid } from "./semigroup.js";
export {
  monoidSum,
  monoidProduct,
  monoidString,
  monoidAll,
  monoidAny,
  monoidArray,
  monoidFirst,
} from "./semigroup.js";

export * as EqOps from "./eq.js";
export type { Eq } from "./eq.js";
export { eqNumber, eqString, eqBoolean, eqStrict, eqStructural } from "./eq.js";
