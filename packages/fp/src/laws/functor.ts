/**
 * Functor Laws
 *
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 *
 * @module
 */

import type { Functor } from "../typeclasses/functor.js";
import type { $, TypeFunction } from "../hkt.js";
import type { LawSet, EqFA } from "./types.js";

export type FunctorLawInputs<F extends TypeFunction, A> = {
  readonly functorIdentity: [$<F, A>];
  readonly functorComposition: [$<F, A>, (a: A) => A, (a: A) => A];
};

/**
 * Generate laws for a Functor instance.
 *
 * @example
 * ```typescript
 * const laws = functorLaws(optionApplicative, getEq(eqNumber));
 * laws.functorIdentity.check(Some(1)); // true
 * ```
 */
export function functorLaws<F extends TypeFunction, A>(
  Fn: Functor<F>,
  EqFA: EqFA<F, A>,
): LawSet<FunctorLawInputs<F, A>> {
  return {
    functorIdentity: {
      name: "functor identity",
      arity: 1,
      proofHint: "identity-left",
      description: "Mapping identity preserves structure: F.map(fa, a => a) === fa",
      check: (fa) =>
        EqFA.eqv(
          Fn.map<A, A>(fa, (a) => a),
          fa,
        ),
    },
    functorComposition: {
      name: "functor composition",
      arity: 3,
      proofHint: "composition",
      description: "Mapping composes: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))",
      check: (fa, f, g) =>
        EqFA.eqv(
          Fn.map<A, A>(Fn.map<A, A>(fa, f), g),
          Fn.map<A, A>(fa, (a) => g(f(a))),
        ),
    },
  };
}
