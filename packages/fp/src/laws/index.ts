/**
 * @refract/fp Law Definitions
 *
 * Structured law definitions for the typeclasses the optics depend on.
 *
 * ```typescript
 * import { monoidLaws } from "@refract/fp";
 * import { assertLaws, gen } from "@refract/testing";
 *
 * assertLaws(monoidLaws(monoidSum, eqNumber), {
 *   associativity: gen.tuple(gen.int(), gen.int(), gen.int()),
 *   leftIdentity: gen.tuple(gen.int()),
 *   rightIdentity: gen.tuple(gen.int()),
 * });
 * ```
 *
 * @module
 */

export type { Law, LawSet, LawInputs, ProofHint, EqFA } from "./types.js";
export { defineLaw, lawNames } from "./types.js";

export { semigroupLaws, monoidLaws } from "./semigroup.js";
export type { SemigroupLawInputs, MonoidLawInputs } from "./semigroup.js";

export { functorLaws } from "./functor.js";
export type { FunctorLawInputs } from "./functor.js";

export { applicativeLaws } from "./applicative.js";
export type { ApplicativeLawInputs } from "./applicative.js";
