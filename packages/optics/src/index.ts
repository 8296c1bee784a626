/**
 * @refract/optics
 *
 * Composable, lawful optics centred on the Prism.
 *
 * | Optic     | Foci         | Reads  | Writes                 |
 * | --------- | ------------ | ------ | ---------------------- |
 * | Iso       | exactly one  | always | builds a new source    |
 * | Prism     | zero or one  | maybe  | builds a new source    |
 * | Lens      | exactly one  | always | updates the source     |
 * | Optional  | zero or one  | maybe  | updates the source     |
 * | Traversal | zero or more | all    | updates every focus    |
 * | Setter    | zero or more | no     | updates every focus    |
 * | Getter    | exactly one  | always | no                     |
 * | Fold      | zero or more | all    | no                     |
 *
 * Composing two optics gives the weaker of the two kinds: a Prism composed
 * with a Lens is an Optional, with a Fold a Fold.
 *
 * @example
 * ```typescript
 * import { Prism } from "@refract/optics";
 *
 * const positive = Prism.fromPredicate((n: number) => n > 0);
 * positive.modifyWith(3, (n) => n * 2);  // 6
 * positive.modifyWith(-3, (n) => n * 2); // -3
 * ```
 */

export { PPrism, Prism } from "./prism.js";
export { PIso, Iso } from "./iso.js";
export { PLens, Lens } from "./lens.js";
export { POptional, Optional } from "./optional.js";
export { PTraversal } from "./traversal.js";
export type { Traversal, ModifyWithEffect } from "./traversal.js";
export { PSetter } from "./setter.js";
export type { Setter } from "./setter.js";
export { Getter } from "./getter.js";
export { Fold } from "./fold.js";

export { prismCategory } from "./category.js";
export type { PrismCategory } from "./category.js";

export { prismLaws, prismCompositionLaws, prismCategoryLaws, prismViewLaws } from "./laws.js";
export type {
  PrismLawInputs,
  PrismCompositionLawInputs,
  PrismCategoryLawInputs,
  PrismViewLawInputs,
} from "./laws.js";
