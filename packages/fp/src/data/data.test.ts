/**
 * Data Types Tests - Option, Either, Id, Const
 */
import { describe, it, expect } from "vitest";
import * as O from "./option.js";
import { Some, None, fromNullable, isSome, isNone, defined, unwrapDefined } from "./option.js";
import * as E from "./either.js";
import { Left, Right, isLeft, isRight } from "./either.js";
import { Id, runId } from "./id.js";
import { Const, getConst } from "./const.js";
import { eqNumber, eqString } from "../typeclasses/eq.js";

// ============================================================================
// Option Tests
// ============================================================================

describe("Option", () => {
  describe("constructors", () => {
    it("Some should wrap a value", () => {
      // Zero-cost: Some(42) = 42, no wrapper object
      const opt = Some(42);
      expect(opt).toBe(42);
      expect(isSome(opt)).toBe(true);
    });

    it("None should represent absence", () => {
      expect(None).toBe(null);
      expect(isNone(None)).toBe(true);
    });

    it("fromNullable should convert null and undefined to None", () => {
      expect(fromNullable(null)).toBe(null);
      expect(fromNullable(undefined)).toBe(null);
      expect(fromNullable(0)).toBe(0);
    });

    it("fromPredicate should keep only values that satisfy the predicate", () => {
      expect(O.fromPredicate(4, (n) => n % 2 === 0)).toBe(4);
      expect(O.fromPredicate(3, (n) => n % 2 === 0)).toBe(null);
    });

    it("Defined should keep a null focus distinguishable from None", () => {
      const present: O.Option<O.Defined<string | null>> = defined(null);
      expect(isSome(present)).toBe(true);
      expect(present !== null ? unwrapDefined(present) : "absent").toBe(null);
    });
  });

  describe("operations", () => {
    it("map and flatMap skip None", () => {
      expect(O.map(Some(2), (n) => n * 3)).toBe(6);
      expect(O.map(O.none<number>(), (n) => n * 3)).toBe(null);
      expect(O.flatMap(Some(2), (n) => (n > 1 ? Some(n) : None))).toBe(2);
      expect(O.flatMap(Some(0), (n) => (n > 1 ? Some(n) : None))).toBe(null);
    });

    it("ap applies only when both sides are present", () => {
      expect(O.ap(Some((n: number) => n + 1), Some(1))).toBe(2);
      expect(O.ap(Some((n: number) => n + 1), O.none<number>())).toBe(null);
    });

    it("fold, getOrElse and orElse pick the right branch", () => {
      expect(O.fold(Some(1), () => "none", (n) => `some ${n}`)).toBe("some 1");
      expect(O.fold(O.none<number>(), () => "none", (n) => `some ${n}`)).toBe("none");
      expect(O.getOrElse(O.none<number>(), () => 7)).toBe(7);
      expect(O.orElse(O.none<number>(), () => Some(8))).toBe(8);
    });

    it("exists and toArray", () => {
      expect(O.exists(Some(3), (n) => n > 2)).toBe(true);
      expect(O.exists(O.none<number>(), () => true)).toBe(false);
      expect(O.toArray(Some("a"))).toEqual(["a"]);
      expect(O.toArray(O.none<string>())).toEqual([]);
    });
  });

  describe("getEq", () => {
    const eq = O.getEq(eqNumber);

    it("compares present values with the element Eq", () => {
      expect(eq.eqv(Some(1), Some(1))).toBe(true);
      expect(eq.eqv(Some(1), Some(2))).toBe(false);
    });

    it("treats None as equal only to None", () => {
      expect(eq.eqv(None, None)).toBe(true);
      expect(eq.eqv(None, Some(0))).toBe(false);
    });
  });
});

// ============================================================================
// Either Tests
// ============================================================================

describe("Either", () => {
  it("constructors build tagged values", () => {
    expect(Left("boom")).toEqual({ _tag: "Left", left: "boom" });
    expect(Right(1)).toEqual({ _tag: "Right", right: 1 });
    expect(isLeft(Left("boom"))).toBe(true);
    expect(isRight(Right(1))).toBe(true);
  });

  it("fromOption uses the fallback for None", () => {
    expect(E.fromOption(Some(1), () => "missing")).toEqual(Right(1));
    expect(E.fromOption(O.none<number>(), () => "missing")).toEqual(Left("missing"));
  });

  it("fromPredicate", () => {
    expect(E.fromPredicate(5, (n) => n > 0, (n) => `${n} is not positive`)).toEqual(Right(5));
    expect(E.fromPredicate(-5, (n) => n > 0, (n) => `${n} is not positive`)).toEqual(
      Left("-5 is not positive"),
    );
  });

  it("map, mapLeft and bimap touch only their side", () => {
    const r: E.Either<string, number> = Right(2);
    const l: E.Either<string, number> = Left("e");
    expect(E.map(r, (n) => n + 1)).toEqual(Right(3));
    expect(E.map(l, (n) => n + 1)).toEqual(Left("e"));
    expect(E.mapLeft(l, (s) => s.toUpperCase())).toEqual(Left("E"));
    expect(E.bimap(r, (s) => s.length, (n) => n * 10)).toEqual(Right(20));
  });

  it("flatMap short-circuits on Left", () => {
    const half = (n: number): E.Either<string, number> => (n % 2 === 0 ? Right(n / 2) : Left(`${n} is odd`));
    expect(E.flatMap(Right(8), half)).toEqual(Right(4));
    expect(E.flatMap(Right(3), half)).toEqual(Left("3 is odd"));
    expect(E.flatMap(Left("earlier"), half)).toEqual(Left("earlier"));
  });

  it("fold, swap, getOrElse, merge", () => {
    expect(E.fold(Left<string, number>("e"), (s) => s.length, (n) => n)).toBe(1);
    expect(E.swap(Left<string, number>("e"))).toEqual(Right("e"));
    expect(E.getOrElse(Left<string, number>("abc"), (s) => s.length)).toBe(3);
    expect(E.merge(Right<number, number>(4))).toBe(4);
  });

  it("toOption discards the Left", () => {
    expect(E.toOption(Right(1))).toBe(1);
    expect(E.toOption(Left("e"))).toBe(null);
  });

  it("getEq compares tags and payloads", () => {
    const eq = E.getEq(eqString, eqNumber);
    expect(eq.eqv(Right(1), Right(1))).toBe(true);
    expect(eq.eqv(Left("a"), Left("a"))).toBe(true);
    expect(eq.eqv(Left("a"), Right(1))).toBe(false);
    expect(eq.eqv(Right(1), Right(2))).toBe(false);
  });
});

// ============================================================================
// Id and Const Tests
// ============================================================================

describe("Id", () => {
  it("is the value itself", () => {
    expect(Id(5)).toBe(5);
    expect(runId(Id("x"))).toBe("x");
  });
});

describe("Const", () => {
  it("carries its first parameter unchanged", () => {
    const c = Const<number, string>(3);
    expect(c).toBe(3);
    expect(getConst(c)).toBe(3);
  });
});
