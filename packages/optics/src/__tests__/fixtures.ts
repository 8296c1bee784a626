/**
 * Shared test fixtures: a two-case sum, a record sum, and prisms into them
 */

import type { Either, Eq } from "@refract/fp";
import { EitherOps, Left, None, Right, eqNumber, eqString, isLeft, isRight } from "@refract/fp";
import type { Gen } from "@refract/testing";
import { gen } from "@refract/testing";
import { Prism } from "../index.js";

// ============================================================================
// Left(Int) | Right(String)
// ============================================================================

export type Sum = Either<number, string>;

export const eqSum: Eq<Sum> = EitherOps.getEq(eqNumber, eqString);

/**
 * Prism on the Left case
 */
export const leftInt: Prism<Sum, number> = Prism.fromOption<Sum, number>(
  (s) => (isLeft(s) ? s.left : None),
  (n) => Left(n),
);

export const even: Prism<number, number> = Prism.fromPredicate((n: number) => n % 2 === 0);
export const positive: Prism<number, number> = Prism.fromPredicate((n: number) => n > 0);

export const genSum: Gen<Sum> = gen.oneOf<Sum>(
  gen.map(gen.int(), (n) => Left(n)),
  gen.map(gen.string(), (s) => Right(s)),
);

export const genEndo: Gen<(n: number) => number> = gen.elements<(n: number) => number>(
  (n) => n + 1,
  (n) => n * 2,
  (n) => -n,
);

// ============================================================================
// Either<string, number[]>
// ============================================================================

export type Payload = Either<string, number[]>;

export const rightList: Prism<Payload, number[]> = Prism.fromOption<Payload, number[]>(
  (p) => (isRight(p) ? p.right : None),
  (xs) => Right(xs),
);

// ============================================================================
// Shapes
// ============================================================================

export interface Circle {
  readonly kind: "circle";
  readonly radius: number;
}

export interface Rect {
  readonly kind: "rect";
  readonly width: number;
  readonly height: number;
}

export type Shape = Circle | Rect;

export const circle: Prism<Shape, Circle> = Prism.fromOption<Shape, Circle>(
  (s) => (s.kind === "circle" ? s : None),
  (c) => c,
);
