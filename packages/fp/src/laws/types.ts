/**
 * Law Definition Types
 *
 * Laws are data, not just comments. A law generator takes an instance (and the
 * Eq instances it needs to compare results) and returns a record of named
 * laws; each law is a predicate that must hold for every input.
 *
 * The record is keyed by law name and typed by the inputs each law takes, so a
 * verifier can pair every law with a generator of exactly those inputs.
 *
 * @example
 * ```typescript
 * function cacheLaws<K, V>(c: Cache<K, V>, eq: Eq<V>): LawSet<{ getAfterSet: [K, V] }> {
 *   return {
 *     getAfterSet: {
 *       name: "get after set",
 *       arity: 2,
 *       check: (k, v) => eq.eqv(c.set(k, v).get(k), v),
 *     },
 *   };
 * }
 * ```
 *
 * @module
 */

import type { $, TypeFunction } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";

// ============================================================================
// Proof Hints
// ============================================================================

/**
 * The algebraic shape of a law, used to group and filter laws.
 */
export type ProofHint =
  | "identity-left"
  | "identity-right"
  | "associativity"
  | "composition"
  | "homomorphism"
  | "idempotence"
  | "round-trip"
  | "consistency";

// ============================================================================
// Core Law Type
// ============================================================================

/**
 * A law definition.
 *
 * @template Args - The inputs the law is checked against
 */
export interface Law<Args extends readonly unknown[] = readonly unknown[]> {
  /**
   * Human-readable name of the law.
   * Used in error messages and test descriptions.
   * @example "associativity", "match round-trip"
   */
  readonly name: string;

  /**
   * The law predicate. Returns true if the law holds for the given inputs.
   */
  readonly check: (...args: Args) => boolean;

  /**
   * Number of inputs the law needs.
   */
  readonly arity: number;

  readonly proofHint?: ProofHint;

  /**
   * The law in plain English. Shown when verification fails.
   */
  readonly description?: string;
}

// ============================================================================
// Law Collections
// ============================================================================

/**
 * Inputs of every law in a set, keyed by law name.
 */
export type LawInputs = { readonly [name: string]: readonly unknown[] };

/**
 * A collection of laws keyed by name.
 * Returned by law generator functions like `monoidLaws`, `prismLaws`.
 */
export type LawSet<R extends LawInputs> = { readonly [K in keyof R]: Law<R[K]> };

/**
 * Eq for F-wrapped values, used by HKT law generators.
 */
export type EqFA<F extends TypeFunction, A> = Eq<$<F, A>>;

// ============================================================================
// Law Builder Utilities
// ============================================================================

/**
 * Create a law with type inference for the check function.
 *
 * @example
 * ```typescript
 * const law = defineLaw({
 *   name: "reflexivity",
 *   arity: 1,
 *   check: (a: number) => a === a,
 * });
 * ```
 */
export function defineLaw<Args extends readonly unknown[]>(law: Law<Args>): Law<Args> {
  return law;
}

/**
 * Names of the laws in a set.
 */
export function lawNames<R extends LawInputs>(laws: LawSet<R>): string[] {
  const names: string[] = [];
  for (const key in laws) {
    names.push(laws[key].name);
  }
  return names;
}
