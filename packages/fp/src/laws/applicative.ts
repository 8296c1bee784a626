/**
 * Applicative Laws
 *
 *   - Identity: F.ap(F.pure(a => a), fa) === fa
 *   - Homomorphism: F.ap(F.pure(f), F.pure(x)) === F.pure(f(x))
 *   - Interchange: F.ap(ff, F.pure(a)) === F.ap(F.pure(f => f(a)), ff)
 *   - Map consistency: F.map(fa, f) === F.ap(F.pure(f), fa)
 *
 * @module
 */

import type { Applicative } from "../typeclasses/applicative.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawSet, EqFA } from "./types.js";
import { functorLaws, type FunctorLawInputs } from "./functor.js";

export type ApplicativeLawInputs<F extends TypeFunction, A> = FunctorLawInputs<F, A> & {
  readonly applicativeIdentity: [$<F, A>];
  readonly homomorphism: [A, (a: A) => A];
  readonly interchange: [A, $<F, (a: A) => A>];
  readonly mapConsistency: [$<F, A>, (a: A) => A];
};

/**
 * Generate laws for an Applicative instance.
 * Includes the Functor laws.
 */
export function applicativeLaws<F extends TypeFunction, A>(
  Ap: Applicative<F>,
  EqFA: EqFA<F, A>,
): LawSet<ApplicativeLawInputs<F, A>> {
  return {
    ...functorLaws(Ap, EqFA),
    applicativeIdentity: {
      name: "applicative identity",
      arity: 1,
      proofHint: "identity-left",
      description: "pure identity is identity: F.ap(F.pure(a => a), fa) === fa",
      check: (fa) =>
        EqFA.eqv(
          Ap.ap<A, A>(
            Ap.pure((a: A) => a),
            fa,
          ),
          fa,
        ),
    },
    homomorphism: {
      name: "homomorphism",
      arity: 2,
      proofHint: "homomorphism",
      description: "pure distributes over ap: F.ap(F.pure(f), F.pure(a)) === F.pure(f(a))",
      check: (a, f) => EqFA.eqv(Ap.ap<A, A>(Ap.pure(f), Ap.pure(a)), Ap.pure(f(a))),
    },
    interchange: {
      name: "interchange",
      arity: 2,
      description: "interchange: F.ap(ff, F.pure(a)) === F.ap(F.pure(f => f(a)), ff)",
      check: (a, ff) =>
        EqFA.eqv(
          Ap.ap<A, A>(ff, Ap.pure(a)),
          Ap.ap<(a: A) => A, A>(
            Ap.pure((f: (a: A) => A) => f(a)),
            ff,
          ),
        ),
    },
    mapConsistency: {
      name: "map consistency",
      arity: 2,
      proofHint: "consistency",
      description: "map via ap: F.map(fa, f) === F.ap(F.pure(f), fa)",
      check: (fa, f) => EqFA.eqv(Ap.map<A, A>(fa, f), Ap.ap<A, A>(Ap.pure(f), fa)),
    },
  };
}
