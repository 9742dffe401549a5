/**
 * BothOf Tests
 */
import { describe, it, expect } from "vitest";
import { BothOf, eqBothOf, hashBothOf, showBothOf } from "./both-of.js";
import { AnyOf } from "./any-of.js";
import { ExtractionError } from "../errors.js";
import { eqNumber, eqString } from "../typeclasses/eq.js";
import { hashNumber, hashString } from "../typeclasses/hash.js";
import { showNumber, showString } from "../typeclasses/show.js";
import { defaultNumber } from "../typeclasses/default.js";

describe("BothOf", () => {
  const both = BothOf.new(1, "a");

  describe("constructors", () => {
    it("new and fromCouple agree", () => {
      expect(BothOf.fromCouple([1, "a"]).equals(both)).toBe(true);
    });

    it("fromOpt2 needs both slots", () => {
      expect(BothOf.fromOpt2<number, string>([1, "a"]).equals(both)).toBe(true);
    });

    it("fromOpt2 names the missing slot", () => {
      expect(() => BothOf.fromOpt2([null, "a"])).toThrow("missing left value");
      expect(() => BothOf.fromOpt2([1, null])).toThrow("missing right value");
      expect(() => BothOf.fromOpt2([null, null])).toThrow(
        new ExtractionError("left", "missing left value")
      );
    });
  });

  describe("LeftOrRight", () => {
    it("always has both slots", () => {
      expect(both.left()).toBe(1);
      expect(both.right()).toBe("a");
      expect(both.isLeft()).toBe(true);
      expect(both.isRight()).toBe(true);
      expect(both.opt2()).toEqual([1, "a"]);
    });
  });

  describe("map / swap", () => {
    it("map runs both closures", () => {
      const mapped = both.map(
        (n) => n + 1,
        (s) => s + s
      );
      expect(mapped.toCouple()).toEqual([2, "aa"]);
    });

    it("mapLeft keeps the right value", () => {
      expect(both.mapLeft((n) => n * 3).toString()).toBe('BothOf(3, "a")');
    });

    it("swap exchanges the fields", () => {
      const swapped = both.swap();
      expect(swapped.left()).toBe("a");
      expect(swapped.right()).toBe(1);
      expect(swapped.swap().equals(both)).toBe(true);
    });
  });

  describe("Unwrap", () => {
    it("never calls a fallback", () => {
      let calls = 0;
      const fallback = () => {
        calls++;
        return 0;
      };
      expect(both.leftOrElse(fallback)).toBe(1);
      expect(both.leftOr(7)).toBe(1);
      expect(both.leftOrDefault(defaultNumber)).toBe(1);
      expect(calls).toBe(0);
    });

    it("unwrap and expect always succeed", () => {
      expect(both.unwrapLeft()).toBe(1);
      expect(both.unwrapRight()).toBe("a");
      expect(both.expectRight("unused")).toBe("a");
    });
  });

  describe("conversions", () => {
    it("intoLeft / intoRight keep one field", () => {
      expect(both.intoLeft().toString()).toBe("Left(1)");
      expect(both.intoRight().toString()).toBe('Right("a")');
    });

    it("toAnyOf is Both", () => {
      const any = both.toAnyOf();
      expect(any.isBoth()).toBe(true);
      expect(any.equals(AnyOf.newBoth(1, "a"))).toBe(true);
    });

    it("fold passes both values", () => {
      expect(both.fold((n, s) => `${s}${n}`)).toBe("a1");
    });

    it("equals compares both fields structurally", () => {
      expect(BothOf.new([1, 2], "x").equals(BothOf.new([1, 2], "x"))).toBe(true);
      expect(both.equals(BothOf.new(1, "b"))).toBe(false);
      expect(both.equals([1, "a"])).toBe(false);
    });
  });

  describe("typeclasses", () => {
    it("Eq / Show / Hash", () => {
      const E = eqBothOf(eqNumber, eqString);
      const S = showBothOf(showNumber, showString);
      const H = hashBothOf(hashNumber, hashString);
      expect(E.eqv(both, BothOf.new(1, "a"))).toBe(true);
      expect(E.eqv(both, BothOf.new(2, "a"))).toBe(false);
      expect(S.show(both)).toBe('BothOf(1, "a")');
      expect(H.hash(both)).toBe(H.hash(BothOf.new(1, "a")));
    });
  });
});
