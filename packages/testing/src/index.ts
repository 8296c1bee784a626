/**
 * @refract/testing: property-based law verification
 *
 * - `gen`: seeded, replayable generators
 * - `forAll`: run a property over generated inputs
 * - `verifyLaws` / `assertLaws`: check a law set from `@refract/fp` or
 *   `@refract/optics`
 * - `config`: iteration count, base seed and debug logging
 *
 * @example
 * ```typescript
 * import { assertLaws, gen } from "@refract/testing";
 * import { prismLaws } from "@refract/optics";
 *
 * assertLaws(prismLaws(evenPrism, eqNumber, eqNumber), { ... });
 * ```
 */

export * as gen from "./gen.js";
export type { Gen } from "./gen.js";

export { forAll, describeInput } from "./property.js";

export { verifyLaw, verifyLaws, assertLaws } from "./laws.js";
export type {
  LawGenerators,
  VerifyOptions,
  LawVerificationResult,
  VerificationSummary,
} from "./laws.js";

export { config, defineConfig } from "./config.js";
export type { RefractConfig, RefractConfigInput, LawsConfig, ConfigPaths } from "./config.js";
