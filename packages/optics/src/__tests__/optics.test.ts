/**
 * Sibling Optic Tests - Iso, Lens, Optional, Traversal, Setter, Getter, Fold
 */
import { describe, it, expect } from "vitest";
import { Left, None, Right, arrayApplicative, idApplicative, monoidString, optionApplicative } from "@refract/fp";
import { Fold, Getter, Iso, Lens, Optional, PIso, PLens, POptional, PSetter, PTraversal } from "../index.js";

interface Point {
  readonly x: number;
  readonly y: number;
}

interface Segment {
  readonly from: Point;
  readonly to: Point;
}

const x = Lens.prop<Point, "x">("x");
const from = Lens.prop<Segment, "from">("from");

// ============================================================================
// Iso
// ============================================================================

describe("Iso", () => {
  const celsius = Iso.make(
    (f: number) => ((f - 32) * 5) / 9,
    (c: number) => (c * 9) / 5 + 32,
  );

  it("converts both ways", () => {
    expect(celsius.get(212)).toBe(100);
    expect(celsius.reverseGet(0)).toBe(32);
    expect(celsius.modifyWith(32, (c) => c + 100)).toBe(212);
  });

  it("reverse swaps the directions", () => {
    expect(celsius.reverse().get(100)).toBe(212);
  });

  it("composeIso chains conversions", () => {
    const label = celsius.composeIso(Iso.make((c: number) => `${c}C`, (s: string) => Number(s.slice(0, -1))));
    expect(label.get(212)).toBe("100C");
    expect(label.reverseGet("0C")).toBe(32);
  });

  it("is a Prism that always matches and a Lens that ignores the source", () => {
    expect(celsius.asPrism().tryMatch(32)).toEqual(Right(0));
    expect(celsius.asLens().setWith(999, 100)).toBe(212);
    expect(Iso.id<string>().get("same")).toBe("same");
  });

  it("PIso.make can change types", () => {
    const toArray = PIso.make((s: string) => s.split(""), (cs: readonly string[]) => cs.length);
    expect(toArray.modifyWith("abc", (cs) => cs.slice(1))).toBe(2);
  });
});

// ============================================================================
// Lens
// ============================================================================

describe("Lens", () => {
  const p: Point = { x: 1, y: 2 };

  it("gets and sets one property without mutating", () => {
    expect(x.get(p)).toBe(1);
    expect(x.setWith(p, 5)).toEqual({ x: 5, y: 2 });
    expect(p).toEqual({ x: 1, y: 2 });
    expect(x.modify((n) => n + 1)(p)).toEqual({ x: 2, y: 2 });
  });

  it("composeLens focuses deeper", () => {
    const fromX = from.composeLens(x);
    const s: Segment = { from: { x: 1, y: 1 }, to: { x: 3, y: 3 } };
    expect(fromX.get(s)).toBe(1);
    expect(fromX.setWith(s, 0)).toEqual({ from: { x: 0, y: 1 }, to: { x: 3, y: 3 } });
  });

  it("modifyWithEffect needs only a Functor", () => {
    expect(x.modifyWithEffect(arrayApplicative, p, (n) => [n, -n])).toEqual([
      { x: 1, y: 2 },
      { x: -1, y: 2 },
    ]);
  });

  it("asOptional always matches and asGetter reads", () => {
    expect(x.asOptional().tryMatch(p)).toEqual(Right(1));
    expect(x.asGetter().get(p)).toBe(1);
  });

  it("PLens.make and Lens.make", () => {
    const first = PLens.make(
      (t: readonly [number, string]) => t[0],
      (t: readonly [number, string], b: boolean): [boolean, string] => [b, t[1]],
    );
    expect(first.setWith([1, "a"], true)).toEqual([true, "a"]);
    const y = Lens.make<Point, number>((pt) => pt.y, (pt, y) => ({ ...pt, y }));
    expect(y.set(9)(p)).toEqual({ x: 1, y: 9 });
  });
});

// ============================================================================
// Optional
// ============================================================================

describe("Optional", () => {
  const second = Optional.index<string>(1);

  it("index focuses an element when it exists", () => {
    expect(second.matchOption(["a", "b"])).toBe("b");
    expect(second.setWith(["a", "b"], "z")).toEqual(["a", "z"]);
    expect(second.setOptional(["a", "b"], "z")).toEqual(["a", "z"]);
  });

  it("index leaves short arrays alone", () => {
    const short = ["a"];
    expect(second.matchOption(short)).toBe(None);
    expect(second.setWith(short, "z")).toBe(short);
    expect(second.modifyOptional(short, (s) => s + s)).toBe(None);
    expect(second.isMatching(short)).toBe(false);
  });

  it("Optional.make builds from a partial getter", () => {
    const head = Optional.make<string, string>(
      (s) => (s.length > 0 ? s[0] : None),
      (s, c) => c + s.slice(1),
    );
    expect(head.matchOption("abc")).toBe("a");
    expect(head.setWith("abc", "X")).toBe("Xbc");
    expect(head.setWith("", "X")).toBe("");
  });

  it("composeOptional with a lens view", () => {
    const secondX = Optional.index<Point>(1).composeOptional(x.asOptional());
    const pts: readonly Point[] = [
      { x: 0, y: 0 },
      { x: 1, y: 1 },
    ];
    expect(secondX.matchOption(pts)).toBe(1);
    expect(secondX.modifyWith(pts, (n) => n * 10)).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 1 },
    ]);
    expect(secondX.tryMatch([])).toEqual(Left([]));
  });

  it("effects, views and POptional.make", () => {
    const positive = POptional.make<number, number, number, number>(
      (n) => (n > 0 ? Right(n) : Left(n)),
      (n, m) => (n > 0 ? m : n),
    );
    expect(positive.modifyWithEffect(optionApplicative, 3, () => None)).toBe(None);
    expect(positive.modifyWithEffect(optionApplicative, -3, () => None)).toBe(-3);
    expect(positive.asTraversal().modifyWith(4, (n) => n + 1)).toBe(5);
    expect(positive.asSetter().setWith(-1, 7)).toBe(-1);
    expect(positive.asFold().getAll(2)).toEqual([2]);
  });
});

// ============================================================================
// Traversal
// ============================================================================

describe("Traversal", () => {
  const each = PTraversal.each<number, number>();

  it("modifies every element", () => {
    expect(each.modifyWith([1, 2, 3], (n) => n * 2)).toEqual([2, 4, 6]);
    expect(each.setWith([1, 2], 0)).toEqual([0, 0]);
    expect(each.modify((n) => -n)([1])).toEqual([-1]);
  });

  it("sequences effects left to right", () => {
    const positive = (n: number) => (n > 0 ? n : None);
    expect(each.modifyWithEffect(optionApplicative, [1, 2], positive)).toEqual([1, 2]);
    expect(each.modifyF(optionApplicative, positive)([1, 0])).toBe(None);
    expect(each.modifyWithEffect(arrayApplicative, [1, 2], (n) => [n, 0])).toEqual([
      [1, 2],
      [1, 0],
      [0, 2],
      [0, 0],
    ]);
  });

  it("composeTraversal nests", () => {
    const grid = PTraversal.each<readonly number[], number[]>().composeTraversal(each);
    expect(grid.modifyWith([[1], [2, 3]], (n) => n + 1)).toEqual([[2], [3, 4]]);
  });

  it("is a Fold and a Setter", () => {
    expect(each.asFold().getAll([3, 1])).toEqual([3, 1]);
    expect(each.composeFold(Fold.filtered((n: number) => n > 1)).getAll([3, 1, 2])).toEqual([3, 2]);
    expect(each.composeSetter(PSetter.make<number, number, number, number>((n, f) => f(n))).setWith([1, 2], 5)).toEqual([5, 5]);
    expect(each.asSetter().modifyWith([1], (n) => n + 1)).toEqual([2]);
  });

  it("PTraversal.make", () => {
    const both = PTraversal.make<[number, number], [string, string], number, string>((F, [a, b], f) =>
      F.ap<string, [string, string]>(
        F.map<string, (b: string) => [string, string]>(f(a), (sa) => (sb) => [sa, sb]),
        f(b),
      ),
    );
    expect(both.modifyWith([1, 2], (n) => `${n}`)).toEqual(["1", "2"]);
    expect(both.modifyWithEffect(idApplicative, [3, 4], (n) => `#${n}`)).toEqual(["#3", "#4"]);
  });
});

// ============================================================================
// Setter, Getter, Fold
// ============================================================================

describe("Setter", () => {
  it("mapped rewrites every element and composes", () => {
    const nested = PSetter.mapped<readonly number[], number[]>().composeSetter(PSetter.mapped<number, number>());
    expect(nested.modifyWith([[1], [2]], (n) => n * 3)).toEqual([[3], [6]]);
    expect(PSetter.mapped<number, string>().set("z")([1, 2])).toEqual(["z", "z"]);
  });
});

describe("Getter", () => {
  it("reads and composes", () => {
    const length = Getter.make((s: string) => s.length);
    const isLong = length.composeGetter(Getter.make((n: number) => n > 3));
    expect(isLong.get("abcd")).toBe(true);
    expect(length.asFold().getAll("ab")).toEqual([2]);
    expect(Getter.make((s: string) => s.split(",")).composeFold(Fold.each<string>()).getAll("a,b")).toEqual([
      "a",
      "b",
    ]);
  });
});

describe("Fold", () => {
  const words = Fold.each<string>();

  it("derives its queries from foldMap", () => {
    expect(words.foldMap(monoidString, (w) => w.toUpperCase(), ["a", "b"])).toBe("AB");
    expect(words.headOption([])).toBe(None);
    expect(words.headOption(["x", "y"])).toBe("x");
    expect(words.length(["x", "y"])).toBe(2);
    expect(words.exists(["x", "yy"], (w) => w.length > 1)).toBe(true);
    expect(words.all(["x", "yy"], (w) => w.length > 1)).toBe(false);
    expect(words.isEmpty([])).toBe(true);
  });

  it("composeGetter and Fold.make", () => {
    const lengths = words.composeGetter(Getter.make((w: string) => w.length));
    expect(lengths.getAll(["a", "bcd"])).toEqual([1, 3]);
    const digits = Fold.make<number, number>((M, f, n) =>
      String(Math.abs(n))
        .split("")
        .reduce((acc, d) => M.combine(acc, f(Number(d))), M.empty),
    );
    expect(digits.getAll(-305)).toEqual([3, 0, 5]);
  });
});
