/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> or Right<A>. By convention Right is the
 * "success" case.
 *
 * Prisms use Either for their canonical primitive: `tryMatch(s)` is `Right(a)`
 * when the focus exists and `Left(t)` (the unchanged source at the output
 * type) when it does not.
 */

import type { Option } from "./option.js";
import { Some, None } from "./option.js";
import type { Eq } from "../typeclasses/eq.js";

// ============================================================================
// Either Type Definition
// ============================================================================

/**
 * Either data type - either Left or Right
 */
export type Either<E, A> = Left<E> | Right<A>;

/**
 * Left variant
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * Create an Either from an Option
 */
export function fromOption<E, A>(opt: Option<A>, onNone: () => E): Either<E, A> {
  return opt !== null ? Right(opt) : Left(onNone());
}

/**
 * Create an Either from a predicate
 */
export function fromPredicate<E, A>(
  value: A,
  predicate: (a: A) => boolean,
  onFalse: (a: A) => E,
): Either<E, A> {
  return predicate(value) ? Right(value) : Left(onFalse(value));
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Either is Left
 */
export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

/**
 * Check if Either is Right
 */
export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Right value
 */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

/**
 * Map over the Left value
 */
export function mapLeft<E, A, E2>(either: Either<E, A>, f: (e: E) => E2): Either<E2, A> {
  return isLeft(either) ? Left(f(either.left)) : either;
}

/**
 * Map over both values
 */
export function bimap<E, A, E2, B>(
  either: Either<E, A>,
  f: (e: E) => E2,
  g: (a: A) => B,
): Either<E2, B> {
  return isLeft(either) ? Left(f(either.left)) : Right(g(either.right));
}

/**
 * FlatMap over the Right value
 */
export function flatMap<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => Either<E, B>,
): Either<E, B> {
  return isRight(either) ? f(either.right) : either;
}

/**
 * Fold over Either - provide handlers for both cases
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return isRight(either) ? onRight(either.right) : onLeft(either.left);
}

/**
 * Swap Left and Right
 */
export function swap<E, A>(either: Either<E, A>): Either<A, E> {
  return isRight(either) ? Left(either.right) : Right(either.left);
}

/**
 * Get the Right value or a default computed from the Left
 */
export function getOrElse<E, A>(either: Either<E, A>, defaultValue: (e: E) => A): A {
  return isRight(either) ? either.right : defaultValue(either.left);
}

/**
 * Convert Either to Option (discards the Left)
 */
export function toOption<E, A>(either: Either<E, A>): Option<A> {
  return isRight(either) ? Some(either.right) : None;
}

/**
 * Merge Left and Right into a single value
 */
export function merge<A>(either: Either<A, A>): A {
  return isRight(either) ? either.right : either.left;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq for Either, given Eq for both sides
 */
export function getEq<E, A>(EE: Eq<E>, EA: Eq<A>): Eq<Either<E, A>> {
  return {
    eqv: (x, y) => {
      if (isLeft(x)) return isLeft(y) && EE.eqv(x.left, y.left);
      return isRight(y) && EA.eqv(x.right, y.right);
    },
  };
}
