/**
 * Prism Laws
 *
 * Laws for monomorphic prisms, as data. Every lawful prism satisfies:
 *
 *   - Match round-trip: tryMatch(s) = Right(a) ⇒ reconstruct(a) ≡ s,
 *     and tryMatch(s) = Left(t) ⇒ t ≡ s
 *   - Reconstruct round-trip: tryMatch(reconstruct(a)) = Right(a)
 *   - No-match is inert: tryMatch(s) = Left(t) ⇒ every update of s yields t
 *
 * The remaining laws check that the derived operations agree with each other
 * and with the weaker views. None of this is enforced when a prism is built;
 * run the laws against generated inputs with `@refract/testing`:
 *
 * ```typescript
 * assertLaws(prismLaws(left, eqSum, eqNumber), {
 *   matchRoundTrip: gen.tuple(genSum),
 *   ...
 * });
 * ```
 *
 * @module
 */

import type { Eq, LawSet } from "@refract/fp";
import { EitherOps, OptionOps, idApplicative, isRight, monoidArray, optionApplicative } from "@refract/fp";
import { prismCategory } from "./category.js";
import type { Prism } from "./prism.js";

// ============================================================================
// Core Laws
// ============================================================================

export type PrismLawInputs<S, A> = {
  readonly matchRoundTrip: [S];
  readonly reconstructRoundTrip: [A];
  readonly noMatchInert: [S, A];
  readonly modifyIdentity: [S];
  readonly composeModify: [S, (a: A) => A, (a: A) => A];
  readonly consistentSetModify: [S, A];
  readonly consistentMatchOption: [S];
  readonly consistentModifyOptional: [S, A];
};

/**
 * Generate laws for a Prism.
 *
 * @param prism - The prism to verify
 * @param eqS - Eq for sources
 * @param eqA - Eq for foci
 */
export function prismLaws<S, A>(prism: Prism<S, A>, eqS: Eq<S>, eqA: Eq<A>): LawSet<PrismLawInputs<S, A>> {
  const eqOptionA = OptionOps.getEq(eqA);

  return {
    matchRoundTrip: {
      name: "match round-trip",
      arity: 1,
      proofHint: "round-trip",
      description: "a source comes back unchanged: tryMatch(s) folded with reconstruct ≡ s",
      check: (s) =>
        eqS.eqv(
          EitherOps.fold(
            prism.tryMatch(s),
            (t) => t,
            (a) => prism.reconstruct(a),
          ),
          s,
        ),
    },
    reconstructRoundTrip: {
      name: "reconstruct round-trip",
      arity: 1,
      proofHint: "round-trip",
      description: "a reconstructed value matches its focus: tryMatch(reconstruct(a)) = Right(a)",
      check: (a) => {
        const r = prism.tryMatch(prism.reconstruct(a));
        return isRight(r) && eqA.eqv(r.right, a);
      },
    },
    noMatchInert: {
      name: "no-match is inert",
      arity: 2,
      description:
        "updates of an unmatched source return the Left payload: modifyWith, setWith, modifyOptional",
      check: (s, a) => {
        const r = prism.tryMatch(s);
        if (isRight(r)) return true;
        let called = false;
        const modified = prism.modifyWith(s, () => {
          called = true;
          return a;
        });
        return (
          !called &&
          eqS.eqv(modified, r.left) &&
          eqS.eqv(prism.setWith(s, a), r.left) &&
          OptionOps.isNone(prism.modifyOptional(s, () => a))
        );
      },
    },
    modifyIdentity: {
      name: "modify identity",
      arity: 1,
      proofHint: "identity-left",
      description: "modifying with the identity function changes nothing",
      check: (s) => eqS.eqv(prism.modifyWith(s, (a) => a), s),
    },
    composeModify: {
      name: "compose modify",
      arity: 3,
      proofHint: "composition",
      description: "modifyWith(modifyWith(s, f), g) ≡ modifyWith(s, a => g(f(a)))",
      check: (s, f, g) =>
        eqS.eqv(
          prism.modifyWith(prism.modifyWith(s, f), g),
          prism.modifyWith(s, (a) => g(f(a))),
        ),
    },
    consistentSetModify: {
      name: "consistent set modify",
      arity: 2,
      proofHint: "consistency",
      description: "setWith(s, a) ≡ modifyWith(s, () => a)",
      check: (s, a) => eqS.eqv(prism.setWith(s, a), prism.modifyWith(s, () => a)),
    },
    consistentMatchOption: {
      name: "consistent matchOption",
      arity: 1,
      proofHint: "consistency",
      description: "matchOption(s) is tryMatch(s) with the Left discarded",
      check: (s) => eqOptionA.eqv(prism.matchOption(s), EitherOps.toOption(prism.tryMatch(s))),
    },
    consistentModifyOptional: {
      name: "consistent modifyOptional",
      arity: 2,
      proofHint: "consistency",
      description: "modifyOptional(s, () => a) is Some(setWith(s, a)) exactly when s matches",
      check: (s, a) => {
        const result = prism.modifyOptional(s, () => a);
        if (!prism.isMatching(s)) return OptionOps.isNone(result);
        return OptionOps.isSome(result) && eqS.eqv(result, prism.setWith(s, a));
      },
    },
  };
}

// ============================================================================
// Composition Laws
// ============================================================================

export type PrismCompositionLawInputs<S, C> = {
  readonly associativityMatch: [S];
  readonly associativityReconstruct: [C];
  readonly associativitySet: [S, C];
};

/**
 * Generate associativity laws for three composable prisms:
 * (p ∘ q) ∘ r behaves exactly like p ∘ (q ∘ r).
 */
export function prismCompositionLaws<S, A, B, C>(
  p: Prism<S, A>,
  q: Prism<A, B>,
  r: Prism<B, C>,
  eqS: Eq<S>,
  eqC: Eq<C>,
): LawSet<PrismCompositionLawInputs<S, C>> {
  const left = p.composePrism(q).composePrism(r);
  const right = p.composePrism(q.composePrism(r));
  const eqResult = EitherOps.getEq(eqS, eqC);

  return {
    associativityMatch: {
      name: "associativity (tryMatch)",
      arity: 1,
      proofHint: "associativity",
      check: (s) => eqResult.eqv(left.tryMatch(s), right.tryMatch(s)),
    },
    associativityReconstruct: {
      name: "associativity (reconstruct)",
      arity: 1,
      proofHint: "associativity",
      check: (c) => eqS.eqv(left.reconstruct(c), right.reconstruct(c)),
    },
    associativitySet: {
      name: "associativity (setWith)",
      arity: 2,
      proofHint: "associativity",
      check: (s, c) => eqS.eqv(left.setWith(s, c), right.setWith(s, c)),
    },
  };
}

// ============================================================================
// Category Laws
// ============================================================================

export type PrismCategoryLawInputs<S, A> = {
  readonly leftIdentity: [S, A];
  readonly rightIdentity: [S, A];
};

/**
 * Generate identity laws: composing with the identity prism on either side
 * gives back a prism that behaves like the original.
 */
export function prismCategoryLaws<S, A>(
  p: Prism<S, A>,
  eqS: Eq<S>,
  eqA: Eq<A>,
): LawSet<PrismCategoryLawInputs<S, A>> {
  const eqResult = EitherOps.getEq(eqS, eqA);
  const sameAs = (other: Prism<S, A>, s: S, a: A): boolean =>
    eqResult.eqv(other.tryMatch(s), p.tryMatch(s)) && eqS.eqv(other.reconstruct(a), p.reconstruct(a));

  return {
    leftIdentity: {
      name: "left identity",
      arity: 2,
      proofHint: "identity-left",
      description: "compose(id, p) behaves like p",
      check: (s, a) => sameAs(prismCategory.compose(prismCategory.id<A>(), p), s, a),
    },
    rightIdentity: {
      name: "right identity",
      arity: 2,
      proofHint: "identity-right",
      description: "compose(p, id) behaves like p",
      check: (s, a) => sameAs(prismCategory.compose(p, prismCategory.id<S>()), s, a),
    },
  };
}

// ============================================================================
// View Laws
// ============================================================================

export type PrismViewLawInputs<S, A> = {
  readonly foldConsistency: [S];
  readonly setterConsistency: [S, (a: A) => A];
  readonly traversalConsistency: [S, (a: A) => A];
  readonly optionalConsistency: [S, A];
};

/**
 * Generate laws checking that the weaker views agree with the prism they
 * were taken from.
 */
export function prismViewLaws<S, A>(
  prism: Prism<S, A>,
  eqS: Eq<S>,
  eqA: Eq<A>,
): LawSet<PrismViewLawInputs<S, A>> {
  const eqOptionS = OptionOps.getEq(eqS);
  const eqOptionA = OptionOps.getEq(eqA);

  return {
    foldConsistency: {
      name: "fold view",
      arity: 1,
      proofHint: "consistency",
      description: "asFold().getAll(s) holds the match, if any, and nothing else",
      check: (s) => {
        const all = prism.asFold().foldMap(monoidArray<A>(), (a) => [a], s);
        const r = prism.tryMatch(s);
        return isRight(r) ? all.length === 1 && eqA.eqv(all[0], r.right) : all.length === 0;
      },
    },
    setterConsistency: {
      name: "setter view",
      arity: 2,
      proofHint: "consistency",
      description: "asSetter().modifyWith(s, f) ≡ modifyWith(s, f)",
      check: (s, f) => eqS.eqv(prism.asSetter().modifyWith(s, f), prism.modifyWith(s, f)),
    },
    traversalConsistency: {
      name: "traversal view",
      arity: 2,
      proofHint: "consistency",
      description: "asTraversal() agrees with modifyWithEffect in Id and in Option",
      check: (s, f) => {
        const traversal = prism.asTraversal();
        return (
          eqS.eqv(traversal.modifyWithEffect(idApplicative, s, f), prism.modifyWithEffect(idApplicative, s, f)) &&
          eqOptionS.eqv(
            traversal.modifyWithEffect(optionApplicative, s, f),
            prism.modifyWithEffect(optionApplicative, s, f),
          )
        );
      },
    },
    optionalConsistency: {
      name: "optional view",
      arity: 2,
      proofHint: "consistency",
      description: "asOptional() agrees on tryMatch, matchOption and setWith",
      check: (s, a) => {
        const optional = prism.asOptional();
        return (
          EitherOps.getEq(eqS, eqA).eqv(optional.tryMatch(s), prism.tryMatch(s)) &&
          eqOptionA.eqv(optional.matchOption(s), prism.matchOption(s)) &&
          eqS.eqv(optional.setWith(s, a), prism.setWith(s, a))
        );
      },
    },
  };
}
