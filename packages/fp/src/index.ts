/**
 * @refract/fp: the functional substrate of @refract/optics
 *
 * - HKT encoding (`$<F, A>`) and type-level functions
 * - Data types: zero-cost Option, Id and Const, Either
 * - Typeclasses: Functor, Pointed, Applicative, Semigroup, Monoid, Eq
 * - Instances for Id, Const, Option, Either, Array, Promise
 * - Laws as data
 *
 * @example
 * ```typescript
 * import { EitherOps, Right, optionApplicative } from "@refract/fp";
 *
 * EitherOps.map(Right(41), (n) => n + 1);        // Right(42)
 * optionApplicative.map(Some(2), (n) => n * 3); // 6
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type {
  $,
  Kind,
  TypeFunction,
  IdF,
  ConstF,
  OptionF,
  EitherF,
  ArrayF,
  PromiseF,
} from "./hkt.js";

// ============================================================================
// Data Types
// ============================================================================

export * from "./data/index.js";

// ============================================================================
// Typeclasses
// ============================================================================

export * from "./typeclasses/index.js";

// ============================================================================
// Instances
// ============================================================================

export {
  idApplicative,
  constApplicative,
  optionApplicative,
  eitherApplicative,
  arrayApplicative,
  promiseApplicative,
} from "./instances.js";

// ============================================================================
// Laws
// ============================================================================

export * from "./laws/index.js";
