/**
 * EitherOf Tests
 */
import { describe, it, expect } from "vitest";
import { EitherOf, eqEitherOf, hashEitherOf, showEitherOf } from "./either-of.js";
import { AnyOf } from "./any-of.js";
import { ExtractionError } from "../errors.js";
import { eqNumber, eqString } from "../typeclasses/eq.js";
import { hashNumber, hashString } from "../typeclasses/hash.js";
import { showNumber, showString } from "../typeclasses/show.js";
import { defaultNumber, defaultString } from "../typeclasses/default.js";

describe("EitherOf", () => {
  const left = EitherOf.newLeft<number, string>(1);
  const right = EitherOf.newRight<string, number>("a");

  describe("constructors", () => {
    it("newLeft holds only a left value", () => {
      expect(left.case).toBe("Left");
      expect(left.left()).toBe(1);
      expect(left.right()).toBe(null);
    });

    it("newRight holds only a right value", () => {
      expect(right.case).toBe("Right");
      expect(right.left()).toBe(null);
      expect(right.right()).toBe("a");
    });

    it("fromOpt2 accepts exactly one present slot", () => {
      expect(EitherOf.fromOpt2<number, string>([1, null]).equals(left)).toBe(true);
      expect(EitherOf.fromOpt2<number, string>([null, "a"]).equals(right)).toBe(true);
    });

    it("fromOpt2 rejects two present values", () => {
      expect(() => EitherOf.fromOpt2([1, "a"])).toThrow(
        "cannot build an EitherOf from two present values"
      );
    });

    it("fromOpt2 rejects two absent values", () => {
      expect(() => EitherOf.fromOpt2([null, null])).toThrow(ExtractionError);
      expect(() => EitherOf.fromOpt2([null, null])).toThrow(
        "cannot build an EitherOf from two absent values"
      );
    });
  });

  describe("LeftOrRight", () => {
    it("derives isLeft / isRight", () => {
      expect(left.isLeft()).toBe(true);
      expect(left.isRight()).toBe(false);
      expect(right.isLeft()).toBe(false);
      expect(right.isRight()).toBe(true);
    });

    it("opt2 mirrors the probes", () => {
      expect(left.opt2()).toEqual([1, null]);
      expect(right.opt2()).toEqual([null, "a"]);
    });
  });

  describe("map", () => {
    it("runs only the closure for the present side", () => {
      let rightCalls = 0;
      const mapped = left.map(
        (n) => n + 1,
        (s) => {
          rightCalls++;
          return s.length;
        }
      );
      expect(mapped.left()).toBe(2);
      expect(rightCalls).toBe(0);
    });

    it("mapLeft and mapRight leave the other side alone", () => {
      expect(left.mapLeft((n) => n * 10).toString()).toBe("Left(10)");
      expect(left.mapRight((s) => s.length).toString()).toBe("Left(1)");
      expect(right.mapRight((s) => s.toUpperCase()).toString()).toBe('Right("A")');
    });
  });

  describe("swap", () => {
    it("flips the case", () => {
      expect(left.swap().right()).toBe(1);
      expect(left.swap().case).toBe("Right");
      expect(right.swap().left()).toBe("a");
    });

    it("is an involution", () => {
      expect(left.swap().swap().equals(left)).toBe(true);
      expect(right.swap().swap().equals(right)).toBe(true);
    });
  });

  describe("Unwrap", () => {
    it("leftOr / rightOr fall back only when absent", () => {
      expect(left.leftOr(9)).toBe(1);
      expect(left.rightOr("z")).toBe("z");
      expect(right.leftOr(9)).toBe(9);
    });

    it("leftOrElse does not call the fallback when present", () => {
      let calls = 0;
      expect(
        left.leftOrElse(() => {
          calls++;
          return 0;
        })
      ).toBe(1);
      expect(calls).toBe(0);
    });

    it("*OrDefault uses the Default instance", () => {
      expect(right.leftOrDefault(defaultNumber)).toBe(0);
      expect(left.rightOrDefault(defaultString)).toBe("");
    });

    it("expectRight throws with exactly the given message", () => {
      expect(() => left.expectRight("need a name")).toThrow(
        new ExtractionError("right", "need a name")
      );
    });

    it("unwrapLeft throws on a right value", () => {
      expect(() => right.unwrapLeft()).toThrow("called `unwrapLeft` on a value with no left slot");
      expect(left.unwrapLeft()).toBe(1);
    });

    it("reports the requested slot", () => {
      try {
        right.unwrapLeft();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExtractionError);
        expect(error).toMatchObject({ name: "ExtractionError", slot: "left" });
      }
    });
  });

  describe("inspection", () => {
    it("match dispatches on the case", () => {
      const render = (e: EitherOf<number, string>) =>
        e.match({ Left: (n) => `n=${n}`, Right: (s) => `s=${s}` });
      expect(render(left)).toBe("n=1");
      expect(render(right.swap().swap())).toBe("s=a");
    });

    it("fold reduces both cases to one type", () => {
      expect(left.fold(String, (s) => s)).toBe("1");
    });

    it("toAnyOf keeps the case", () => {
      expect(left.toAnyOf().equals(AnyOf.newLeft(1))).toBe(true);
      expect(right.toAnyOf().isEither()).toBe(true);
    });

    it("equals compares case and payload", () => {
      expect(left.equals(EitherOf.newLeft(1))).toBe(true);
      expect(left.equals(EitherOf.newLeft(2))).toBe(false);
      expect(left.equals(EitherOf.newRight(1))).toBe(false);
      expect(left.equals(1)).toBe(false);
    });
  });

  describe("typeclasses", () => {
    const E = eqEitherOf(eqNumber, eqString);
    const S = showEitherOf(showNumber, showString);
    const H = hashEitherOf(hashNumber, hashString);

    it("Eq", () => {
      expect(E.eqv(left, EitherOf.newLeft(1))).toBe(true);
      expect(E.eqv(left, EitherOf.newRight("1"))).toBe(false);
    });

    it("Show", () => {
      expect(S.show(left)).toBe("Left(1)");
      expect(S.show(right)).toBe('Right("a")');
    });

    it("Hash agrees with Eq", () => {
      expect(H.hash(left)).toBe(H.hash(EitherOf.newLeft(1)));
      expect(H.hash(EitherOf.newLeft(1))).not.toBe(H.hash(EitherOf.newRight("1")));
    });
  });
});
