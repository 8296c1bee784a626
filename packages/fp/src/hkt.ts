/**
 * Higher-Kinded Types for @refract/fp
 *
 * TypeScript has no native way to abstract over a type constructor `F<_>`.
 * This module encodes one with type-level functions: an interface whose `_`
 * member is computed from a `__kind__` slot through the polymorphic `this`
 * type.
 *
 * ## How it works
 *
 * ```typescript
 * interface OptionF extends TypeFunction {
 *   readonly _: Option<this["__kind__"]>;
 * }
 *
 * type X = $<OptionF, number>; // → number | null
 * ```
 *
 * `$<F, A>` intersects `F` with `{ __kind__: A }` and reads back `_`, so the
 * concrete type is computed by the compiler itself. For a type parameter `F`
 * the application stays deferred, which is what typeclass signatures need:
 *
 * ```typescript
 * interface Functor<F extends TypeFunction> {
 *   readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
 * }
 * ```
 *
 * ## Multi-arity type constructors
 *
 * Fix all but the rightmost parameter:
 *
 * ```typescript
 * interface EitherF<E> extends TypeFunction { readonly _: Either<E, this["__kind__"]> }
 * // $<EitherF<string>, number> → Either<string, number>
 * ```
 */

import type { Option } from "./data/option.js";
import type { Either } from "./data/either.js";
import type { Id } from "./data/id.js";
import type { Const } from "./data/const.js";

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type-level function `F` to `A`.
 */
export type $<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Alias for `$<F, A>`.
 */
export type Kind<F extends TypeFunction, A> = $<F, A>;

// ============================================================================
// Type-Level Functions
// ============================================================================

/**
 * Type-level function for `Id<A>` (which is just `A`).
 */
export interface IdF extends TypeFunction {
  readonly _: Id<this["__kind__"]>;
}

/**
 * Type-level function for `Const<M, A>` with M fixed.
 */
export interface ConstF<M> extends TypeFunction {
  readonly _: Const<M, this["__kind__"]>;
}

/**
 * Type-level function for `Option<A>`.
 *
 * @example
 * ```typescript
 * type MaybeNumber = $<OptionF, number>; // → Option<number>
 * ```
 */
export interface OptionF extends TypeFunction {
  readonly _: Option<this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 */
export interface EitherF<E> extends TypeFunction {
  readonly _: Either<E, this["__kind__"]>;
}

/**
 * Type-level function for `Array<A>`.
 */
export interface ArrayF extends TypeFunction {
  readonly _: Array<this["__kind__"]>;
}

/**
 * Type-level function for `Promise<A>`.
 *
 * @example
 * ```typescript
 * type AsyncNumber = $<PromiseF, number>; // → Promise<number>
 * ```
 */
export interface PromiseF extends TypeFunction {
  readonly _: Promise<this["__kind__"]>;
}
