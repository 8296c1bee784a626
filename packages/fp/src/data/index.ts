/**
 * Data Types Index
 *
 * - Type: `Option<A>`, `Either<E, A>`, `Id<A>`, `Const<M, A>`
 * - Operations: `OptionOps.map(...)`, `EitherOps.flatMap(...)`
 * - Constructors: `Some(...)`, `None`, `Left(...)`, `Right(...)`
 */

// ============================================================================
// Option: Zero-cost optional values (null-based)
// ============================================================================

export * as OptionOps from "./option.js";
export { Some, None, isSome, isNone, defined, unwrapDefined } from "./option.js";
export type { Option, Defined } from "./option.js";

// ============================================================================
// Either: Disjoint union
// ============================================================================

export * as EitherOps from "./either.js";
export { Left, Right, isLeft, isRight } from "./either.js";
export type { Either } from "./either.js";

// ============================================================================
// Id: Zero-cost identity
// ============================================================================

export { Id, runId } from "./id.js";

// ============================================================================
// Const: Zero-cost phantom wrapper
// ============================================================================

export { Const, getConst } from "./const.js";
