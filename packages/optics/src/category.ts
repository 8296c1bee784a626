/**
 * Prism Category
 *
 * Monomorphic prisms form a category: objects are types, arrows are prisms,
 * `compose` is `composePrism` (right to left) and `id` is the prism that always
 * matches.
 *
 * ```typescript
 * // compose(f, g) runs g first, then f
 * prismCategory.compose(even, left); // left.composePrism(even)
 * ```
 */

import { Prism } from "./prism.js";

export interface PrismCategory {
  readonly id: <A>() => Prism<A, A>;
  readonly compose: <A, B, C>(f: Prism<B, C>, g: Prism<A, B>) => Prism<A, C>;
}

export const prismCategory: PrismCategory = {
  id: <A>() => Prism.id<A>(),
  compose: <A, B, C>(f: Prism<B, C>, g: Prism<A, B>): Prism<A, C> => g.composePrism(f),
};
