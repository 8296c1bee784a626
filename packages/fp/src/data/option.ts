/**
 * Option Data Type (Zero-Cost Implementation)
 *
 * Option represents an optional value: every Option<A> is either a value A or null.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * Option<number>  // At runtime: number | null
 * Some(42)        // At runtime: 42
 * None            // At runtime: null
 * ```
 *
 * Optics use Option for "zero or one focus": `matchOption`, `modifyOptional`,
 * `Fold.headOption`.
 */

import type { Eq } from "../typeclasses/eq.js";

// ============================================================================
// Option Type Definition (Zero-Cost)
// ============================================================================

/**
 * Defined<T> - Wrapper for values that may legitimately include null.
 *
 * Use it when a focus type admits null (`Option<Defined<string | null>>`),
 * otherwise `Some(null)` and `None` would be the same value.
 *
 * @example
 * ```ts
 * const present = defined(null);                // { value: null }
 * const absent: Option<Defined<null>> = None;   // null
 * ```
 */
export type Defined<T> = { readonly value: T };

/**
 * Wrap a value that may be null in a Defined wrapper.
 */
export function defined<T>(value: T): Defined<T> {
  return { value };
}

/**
 * Unwrap a Defined value to get the inner value.
 */
export function unwrapDefined<T>(d: Defined<T>): T {
  return d.value;
}

/**
 * Option data type - either a value A or null
 *
 * **Important**: A must not include null. If you need to represent nullable values
 * inside an Option, use `Option<Defined<YourType>>`.
 */
export type Option<A> = A | null;

/**
 * Some type - a present value. At runtime it's just A.
 */
export type Some<A> = A;

/**
 * None type - absence of a value. At runtime it's null.
 */
export type None = null;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Some value (just returns the value as-is)
 */
export function Some<A>(value: A): Option<A> {
  return value;
}

/**
 * The None value (null)
 */
export const None: Option<never> = null;

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === undefined ? null : value;
}

/**
 * Create an Option from a predicate
 */
export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? value : null;
}

/**
 * Create None
 */
export function none<A = never>(): Option<A> {
  return null;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Option is Some (has a value)
 */
export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

/**
 * Check if Option is None (is null)
 */
export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Option value
 */
export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt !== null ? f(opt) : null;
}

/**
 * FlatMap over the Option value
 */
export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt !== null ? f(opt) : null;
}

/**
 * Apply a function in Option to a value in Option
 */
export function ap<A, B>(optF: Option<(a: A) => B>, optA: Option<A>): Option<B> {
  return optF !== null && optA !== null ? optF(optA) : null;
}

/**
 * Fold over Option - provide handlers for both cases
 */
export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return opt !== null ? onSome(opt) : onNone();
}

/**
 * Get the value or a default
 */
export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return opt !== null ? opt : defaultValue();
}

/**
 * Return this Option if Some, otherwise the alternative
 */
export function orElse<A>(opt: Option<A>, alternative: () => Option<A>): Option<A> {
  return opt !== null ? opt : alternative();
}

/**
 * Check whether the value satisfies a predicate
 */
export function exists<A>(opt: Option<A>, predicate: (a: A) => boolean): boolean {
  return opt !== null && predicate(opt);
}

/**
 * Convert to an array of zero or one element
 */
export function toArray<A>(opt: Option<A>): A[] {
  return opt !== null ? [opt] : [];
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq for Option, given Eq for the element
 */
export function getEq<A>(E: Eq<A>): Eq<Option<A>> {
  return {
    eqv: (x, y) => (x === null || y === null ? x === y : E.eqv(x, y)),
  };
}
