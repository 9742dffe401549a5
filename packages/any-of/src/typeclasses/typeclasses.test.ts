/**
 * Typeclass Tests - Eq, Show, Hash, Default, plus Couple instances
 */
import { describe, it, expect } from "vitest";
import {
  contramap,
  eqArray,
  eqBigInt,
  eqBoolean,
  eqNumber,
  eqStrict,
  eqString,
  eqStructural,
  neqv,
  structuralEquals,
} from "./eq.js";
import { showArray, showBigInt, showNumber, showString, showUnknown } from "./show.js";
import { combineHash, hashArray, hashBoolean, hashNumber, hashString } from "./hash.js";
import { defaultArray, defaultBigInt, defaultBoolean, defaultOf } from "./default.js";
import {
  bimapCouple,
  couple,
  eqCouple,
  fst,
  hashCouple,
  showCouple,
  snd,
  swapCouple,
} from "../data/couple.js";
import { eqOption, fromNullable } from "../data/option.js";

// ============================================================================
// Eq
// ============================================================================

describe("Eq", () => {
  it("eqNumber treats NaN as equal to itself", () => {
    expect(eqNumber.eqv(NaN, NaN)).toBe(true);
    expect(eqNumber.eqv(1, 2)).toBe(false);
  });

  it("eqStrict is SameValue", () => {
    const o = {};
    expect(eqStrict<object>().eqv(o, o)).toBe(true);
    expect(eqStrict<object>().eqv(o, {})).toBe(false);
    expect(eqStrict<number>().eqv(0, -0)).toBe(false);
  });

  it("primitive instances", () => {
    expect(eqString.eqv("a", "a")).toBe(true);
    expect(eqBoolean.eqv(true, false)).toBe(false);
    expect(eqBigInt.eqv(1n, 1n)).toBe(true);
  });

  it("neqv and contramap", () => {
    expect(neqv(eqString)("a", "b")).toBe(true);
    const byLength = contramap(eqNumber, (s: string) => s.length);
    expect(byLength.eqv("ab", "cd")).toBe(true);
  });

  it("eqArray compares element-wise", () => {
    const E = eqArray(eqNumber);
    expect(E.eqv([1, 2], [1, 2])).toBe(true);
    expect(E.eqv([1, 2], [1])).toBe(false);
  });

  it("eqOption", () => {
    const E = eqOption(eqNumber);
    expect(E.eqv(null, null)).toBe(true);
    expect(E.eqv(1, null)).toBe(false);
    expect(E.eqv(1, 1)).toBe(true);
  });

  it("structuralEquals recurses into arrays and equals methods", () => {
    const withEquals = { equals: (other: unknown) => other === "same" };
    expect(structuralEquals([1, [2, 3]], [1, [2, 3]])).toBe(true);
    expect(structuralEquals(withEquals, "same")).toBe(true);
    expect(structuralEquals({ a: 1 }, { a: 1 })).toBe(false);
    expect(eqStructural.eqv(NaN, NaN)).toBe(true);
  });
});

// ============================================================================
// Show
// ============================================================================

describe("Show", () => {
  it("primitive instances", () => {
    expect(showString.show("a")).toBe('"a"');
    expect(showNumber.show(1.5)).toBe("1.5");
    expect(showBigInt.show(10n)).toBe("10n");
    expect(showArray(showNumber).show([1, 2])).toBe("[1, 2]");
  });

  it("showUnknown renders any value", () => {
    function named() {
      return 0;
    }
    expect(showUnknown("x")).toBe('"x"');
    expect(showUnknown(null)).toBe("null");
    expect(showUnknown(undefined)).toBe("undefined");
    expect(showUnknown([1, "a"])).toBe('[1, "a"]');
    expect(showUnknown({ a: 1, b: "x" })).toBe('{ a: 1, b: "x" }');
    expect(showUnknown(named)).toBe("[Function named]");
  });

  it("showUnknown uses a custom toString", () => {
    class Tag {
      toString(): string {
        return "<tag>";
      }
    }
    expect(showUnknown(new Tag())).toBe("<tag>");
  });
});

// ============================================================================
// Hash
// ============================================================================

describe("Hash", () => {
  it("primitive instances", () => {
    expect(hashString.hash("")).toBe(5381);
    expect(hashNumber.hash(3)).toBe(3);
    expect(hashNumber.hash(-1)).toBe(4294967295);
    expect(hashNumber.hash(NaN)).toBe(hashNumber.hash(NaN));
    expect(hashBoolean.hash(true)).toBe(1);
  });

  it("combineHash is a djb2 step", () => {
    expect(combineHash(2, 1)).toBe(67);
    expect(combineHash(67, 2)).toBe(2209);
  });

  it("hashArray folds from the length", () => {
    expect(hashArray(hashNumber).hash([1, 2])).toBe(2209);
  });

  it("equal values hash equally", () => {
    expect(hashString.hash("any-of")).toBe(hashString.hash("any-" + "of"));
  });
});

// ============================================================================
// Default
// ============================================================================

describe("Default", () => {
  it("instances", () => {
    expect(defaultBoolean.empty()).toBe(false);
    expect(defaultBigInt.empty()).toBe(0n);
    expect(defaultOf("n/a").empty()).toBe("n/a");
  });

  it("defaultArray returns a fresh array each time", () => {
    const D = defaultArray<number>();
    const a = D.empty();
    a.push(1);
    expect(D.empty()).toEqual([]);
  });
});

// ============================================================================
// Couple & Option helpers
// ============================================================================

describe("Couple", () => {
  const c = couple(1, "a");

  it("accessors and transforms", () => {
    expect(fst(c)).toBe(1);
    expect(snd(c)).toBe("a");
    expect(swapCouple(c)).toEqual(["a", 1]);
    expect(bimapCouple(c, (n) => n + 1, (s) => s.length)).toEqual([2, 1]);
  });

  it("instances", () => {
    expect(eqCouple(eqNumber, eqString).eqv(c, [1, "a"])).toBe(true);
    expect(showCouple(showNumber, showString).show(c)).toBe('[1, "a"]');
    expect(hashCouple(hashNumber, hashNumber).hash([1, 2])).toBe(2209);
  });
});

describe("Option", () => {
  it("helpers treat null as absent", () => {
    expect(fromNullable(undefined)).toBe(null);
    expect(fromNullable(0)).toBe(0);
  });
});
