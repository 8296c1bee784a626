/**
 * Semigroup and Monoid Laws
 *
 * Semigroup Laws:
 *   - Associativity: combine(combine(x, y), z) === combine(x, combine(y, z))
 *
 * Monoid Laws (extends Semigroup):
 *   - Left Identity: combine(empty, x) === x
 *   - Right Identity: combine(x, empty) === x
 *
 * Folds rely on these: aggregating zero-or-one prism foci into a larger fold
 * is only well defined when `empty` is a true identity.
 *
 * @module
 */

import type { Semigroup, Monoid } from "../typeclasses/semigroup.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

// ============================================================================
// Semigroup Laws
// ============================================================================

export type SemigroupLawInputs<A> = {
  readonly associativity: [A, A, A];
};

/**
 * Generate laws for a Semigroup instance.
 *
 * @param S - The Semigroup instance to verify
 * @param E - Eq instance for comparing results
 */
export function semigroupLaws<A>(S: Semigroup<A>, E: Eq<A>): LawSet<SemigroupLawInputs<A>> {
  return {
    associativity: {
      name: "associativity",
      arity: 3,
      proofHint: "associativity",
      description:
        "combine is associative: combine(combine(x, y), z) === combine(x, combine(y, z))",
      check: (x, y, z) =>
        E.eqv(S.combine(S.combine(x, y), z), S.combine(x, S.combine(y, z))),
    },
  };
}

// ============================================================================
// Monoid Laws
// ============================================================================

export type MonoidLawInputs<A> = SemigroupLawInputs<A> & {
  readonly leftIdentity: [A];
  readonly rightIdentity: [A];
};

/**
 * Generate laws for a Monoid instance.
 * Includes all Semigroup laws plus identity laws.
 */
export function monoidLaws<A>(M: Monoid<A>, E: Eq<A>): LawSet<MonoidLawInputs<A>> {
  return {
    ...semigroupLaws(M, E),
    leftIdentity: {
      name: "left identity",
      arity: 1,
      proofHint: "identity-left",
      description: "empty is a left identity: combine(empty, x) === x",
      check: (x) => E.eqv(M.combine(M.empty, x), x),
    },
    rightIdentity: {
      name: "right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "empty is a right identity: combine(x, empty) === x",
      check: (x) => E.eqv(M.combine(x, M.empty), x),
    },
  };
}
