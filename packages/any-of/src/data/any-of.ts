/**
 * AnyOf - neither, either, or both of two values
 *
 * The full sum over two optional slots:
 *
 * - `Neither`: no value
 * - `Either`: exactly one value (an `EitherOf`)
 * - `Both`: two values (a `BothOf`)
 *
 * Every constructor normalizes to the unique case matching the presence of
 * each slot, so `AnyOf.new(1, null)` and `AnyOf.newLeft(1)` are the same
 * value.
 *
 * @example
 * ```typescript
 * const a = AnyOf.newLeft<number, string>(1);
 * const b = AnyOf.newRight<string, number>("x");
 *
 * a.combine(b).toString();                  // 'Both(1, "x")'
 * a.combine(b).filter(b).toString();        // "Left(1)"
 * a.withRight("y").swap().toString();       // 'Both("y", 1)'
 * ```
 */

import { failWith } from "../errors.js";
import type { LeftOrRight } from "../concepts.js";
import type { AnyOfF } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Hash } from "../typeclasses/hash.js";
import type { Show } from "../typeclasses/show.js";
import { showUnknown } from "../typeclasses/show.js";
import { BothOf, eqBothOf, hashBothOf, showBothOf } from "./both-of.js";
import type { Couple, Opt2, Pair } from "./couple.js";
import { DualBase } from "./dual.js";
import { EitherOf, eqEitherOf, hashEitherOf, showEitherOf } from "./either-of.js";
import { defined, isSome, None, type Defined, type Option } from "./option.js";

type AnyOfRepr<L, R> =
  | { readonly _tag: "Neither" }
  | { readonly _tag: "Either"; readonly either: EitherOf<L, R> }
  | { readonly _tag: "Both"; readonly both: BothOf<L, R> };

export type AnyOfCase = AnyOfRepr<unknown, unknown>["_tag"];

export interface AnyOfPatterns<L, R, T> {
  Neither: () => T;
  Either: (either: EitherOf<L, R>) => T;
  Both: (both: BothOf<L, R>) => T;
}

const NEITHER = { _tag: "Neither" } as const;

export class AnyOf<L, R = L> extends DualBase<L, R, AnyOfF> {
  private constructor(private readonly repr: AnyOfRepr<L, R>) {
    super();
  }

  // ==========================================================================
  // Constructors
  // ==========================================================================

  /**
   * Build from two optional slots.
   */
  static new<L, R>(left: Option<L>, right: Option<R>): AnyOf<L, R> {
    return AnyOf.fromDefined(
      isSome(left) ? defined(left) : None,
      isSome(right) ? defined(right) : None
    );
  }

  static newNeither<L = never, R = never>(): AnyOf<L, R> {
    return new AnyOf<L, R>(NEITHER);
  }

  static newLeft<L, R = never>(left: L): AnyOf<L, R> {
    return AnyOf.fromEither(EitherOf.newLeft<L, R>(left));
  }

  static newRight<R, L = never>(right: R): AnyOf<L, R> {
    return AnyOf.fromEither(EitherOf.newRight<R, L>(right));
  }

  static newBoth<L, R>(left: L, right: R): AnyOf<L, R> {
    return AnyOf.fromBoth(BothOf.new(left, right));
  }

  static fromEither<L, R>(either: EitherOf<L, R>): AnyOf<L, R> {
    return new AnyOf<L, R>({ _tag: "Either", either });
  }

  static fromBoth<L, R>(both: BothOf<L, R>): AnyOf<L, R> {
    return new AnyOf<L, R>({ _tag: "Both", both });
  }

  /**
   * Build from a `[left, right]` pair of options.
   *
   * `null` reads as an absent slot, so a value holding a `null` payload does
   * not survive `fromOpt2(x.opt2())`: `newLeft(null)` comes back as `Neither`.
   */
  static fromOpt2<L, R>(opt: Opt2<L, R>): AnyOf<L, R> {
    return AnyOf.new(opt[0], opt[1]);
  }

  /** Always `Both`. */
  static fromCouple<L, R>(c: Couple<L, R>): AnyOf<L, R> {
    return AnyOf.newBoth(c[0], c[1]);
  }

  static fromLeftOrRight<L, R>(x: LeftOrRight<L, R>): AnyOf<L, R> {
    return AnyOf.fromOpt2(x.opt2());
  }

  private static fromDefined<L, R>(
    left: Option<Defined<L>>,
    right: Option<Defined<R>>
  ): AnyOf<L, R> {
    if (isSome(left) && isSome(right)) return AnyOf.newBoth(left.value, right.value);
    if (isSome(left)) return AnyOf.newLeft<L, R>(left.value);
    if (isSome(right)) return AnyOf.newRight<R, L>(right.value);
    return AnyOf.newNeither<L, R>();
  }

  // Slots read from the stored case, so a null payload still counts as present.

  private definedLeft(): Option<Defined<L>> {
    return this.match<Option<Defined<L>>>({
      Neither: () => None,
      Either: (e) => e.match<Option<Defined<L>>>({ Left: defined, Right: () => None }),
      Both: (b) => defined(b.left()),
    });
  }

  private definedRight(): Option<Defined<R>> {
    return this.match<Option<Defined<R>>>({
      Neither: () => None,
      Either: (e) => e.match<Option<Defined<R>>>({ Left: () => None, Right: defined }),
      Both: (b) => defined(b.right()),
    });
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  get case(): AnyOfCase {
    return this.repr._tag;
  }

  match<T>(patterns: AnyOfPatterns<L, R, T>): T {
    switch (this.repr._tag) {
      case "Neither":
        return patterns.Neither();
      case "Either":
        return patterns.Either(this.repr.either);
      case "Both":
        return patterns.Both(this.repr.both);
    }
  }

  fold<T>(
    onNeither: () => T,
    onLeft: (left: L) => T,
    onRight: (right: R) => T,
    onBoth: (left: L, right: R) => T
  ): T {
    return this.match({
      Neither: onNeither,
      Either: (e) => e.fold(onLeft, onRight),
      Both: (b) => b.fold(onBoth),
    });
  }

  isNeither(): boolean {
    return this.repr._tag === "Neither";
  }

  /** Exactly one slot is present. */
  isEither(): boolean {
    return this.repr._tag === "Either";
  }

  isBoth(): boolean {
    return this.repr._tag === "Both";
  }

  /** At least one slot is present. */
  isAny(): boolean {
    return this.repr._tag !== "Neither";
  }

  hasLeft(): boolean {
    return isSome(this.definedLeft());
  }

  hasRight(): boolean {
    return isSome(this.definedRight());
  }

  isLeftOnly(): boolean {
    return this.hasLeft() && !this.hasRight();
  }

  isRightOnly(): boolean {
    return this.hasRight() && !this.hasLeft();
  }

  isNeitherOrBoth(): boolean {
    return !this.isEither();
  }

  left(): Option<L> {
    return this.match<Option<L>>({
      Neither: () => None,
      Either: (e) => e.left(),
      Both: (b) => b.left(),
    });
  }

  right(): Option<R> {
    return this.match<Option<R>>({
      Neither: () => None,
      Either: (e) => e.right(),
      Both: (b) => b.right(),
    });
  }

  // ==========================================================================
  // Capabilities
  // ==========================================================================

  leftOrElse(f: () => L): L {
    return this.match({
      Neither: f,
      Either: (e) => e.leftOrElse(f),
      Both: (b) => b.left(),
    });
  }

  rightOrElse(f: () => R): R {
    return this.match({
      Neither: f,
      Either: (e) => e.rightOrElse(f),
      Both: (b) => b.right(),
    });
  }

  map<L2, R2>(fl: (left: L) => L2, fr: (right: R) => R2): AnyOf<L2, R2> {
    return this.match({
      Neither: () => AnyOf.newNeither<L2, R2>(),
      Either: (e) => AnyOf.fromEither(e.map(fl, fr)),
      Both: (b) => AnyOf.fromBoth(b.map(fl, fr)),
    });
  }

  swap(): AnyOf<R, L> {
    return this.match({
      Neither: () => AnyOf.newNeither<R, L>(),
      Either: (e) => AnyOf.fromEither(e.swap()),
      Both: (b) => AnyOf.fromBoth(b.swap()),
    });
  }

  // ==========================================================================
  // Slot editing
  // ==========================================================================

  /** Drop the right slot. */
  filterLeft(): AnyOf<L, R> {
    return AnyOf.fromDefined(this.definedLeft(), None);
  }

  /** Drop the left slot. */
  filterRight(): AnyOf<L, R> {
    return AnyOf.fromDefined(None, this.definedRight());
  }

  withLeft(left: L): AnyOf<L, R> {
    return AnyOf.fromDefined(defined(left), this.definedRight());
  }

  withRight(right: R): AnyOf<L, R> {
    return AnyOf.fromDefined(this.definedLeft(), defined(right));
  }

  // ==========================================================================
  // Combination
  // ==========================================================================

  /**
   * Slot-wise union. Where both operands have a slot, `other`'s value wins.
   */
  combine(other: AnyOf<L, R>): AnyOf<L, R> {
    return AnyOf.fromDefined(
      other.definedLeft() ?? this.definedLeft(),
      other.definedRight() ?? this.definedRight()
    );
  }

  /**
   * Remove from `this` every slot that is present in `mask`.
   */
  filter<L2, R2>(mask: AnyOf<L2, R2>): AnyOf<L, R> {
    return AnyOf.fromDefined(
      mask.hasLeft() ? None : this.definedLeft(),
      mask.hasRight() ? None : this.definedRight()
    );
  }

  // ==========================================================================
  // Shape extraction
  // ==========================================================================

  /**
   * @throws ExtractionError unless the value is `Both`
   */
  intoBoth(): BothOf<L, R> {
    return this.bothOrElse(() =>
      failWith("both", "called `intoBoth` on a value that is not Both", this)
    );
  }

  /**
   * @throws ExtractionError unless the value is `Both`
   */
  unwrapBoth(): BothOf<L, R> {
    return this.bothOrElse(() =>
      failWith("both", "called `unwrapBoth` on a value that is not Both", this)
    );
  }

  bothOr(fallback: BothOf<L, R>): BothOf<L, R> {
    return this.bothOrElse(() => fallback);
  }

  /**
   * The `Both` payload, with any missing slot taken from `f()`.
   */
  bothOrElse(f: () => BothOf<L, R>): BothOf<L, R> {
    return this.match({
      Neither: f,
      Either: (e) =>
        e.match({
          Left: (left) => BothOf.new(left, f().right()),
          Right: (right) => BothOf.new(f().left(), right),
        }),
      Both: (b) => b,
    });
  }

  bothOrNone(): Option<Couple<L, R>> {
    return this.repr._tag === "Both" ? this.repr.both.toCouple() : None;
  }

  /**
   * @throws ExtractionError unless the value is `Either`
   */
  intoEither(): EitherOf<L, R> {
    return this.eitherOrElse(() =>
      failWith("either", "called `intoEither` on a value that is not Either", this)
    );
  }

  eitherOr(fallback: EitherOf<L, R>): EitherOf<L, R> {
    return this.eitherOrElse(() => fallback);
  }

  eitherOrElse(f: () => EitherOf<L, R>): EitherOf<L, R> {
    return this.repr._tag === "Either" ? this.repr.either : f();
  }

  /**
   * Split into a left-only and a right-only EitherOf.
   */
  toEitherPair(): Pair<Option<EitherOf<L, R>>> {
    const left = this.definedLeft();
    const right = this.definedRight();
    return [
      isSome(left) ? EitherOf.newLeft<L, R>(left.value) : None,
      isSome(right) ? EitherOf.newRight<R, L>(right.value) : None,
    ] as const;
  }

  // ==========================================================================
  // Display & equality
  // ==========================================================================

  toString(): string {
    return this.match({
      Neither: () => "Neither",
      Either: (e) => e.toString(),
      Both: (b) => b.fold((left, right) => `Both(${showUnknown(left)}, ${showUnknown(right)})`),
    });
  }

  equals(other: unknown): boolean {
    if (!(other instanceof AnyOf)) return false;
    const that: AnyOf<unknown, unknown> = other;
    return this.match({
      Neither: () => that.isNeither(),
      Either: (e) => that.repr._tag === "Either" && e.equals(that.repr.either),
      Both: (b) => that.repr._tag === "Both" && b.equals(that.repr.both),
    });
  }
}

/**
 * An AnyOf with the same presence pattern as `x`.
 */
export function toAnyOf<L, R>(x: LeftOrRight<L, R>): AnyOf<L, R> {
  return AnyOf.fromLeftOrRight(x);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function eqAnyOf<L, R>(EL: Eq<L>, ER: Eq<R>): Eq<AnyOf<L, R>> {
  const eqEither = eqEitherOf(EL, ER);
  const eqBoth = eqBothOf(EL, ER);
  return {
    eqv: (x, y) =>
      x.match({
        Neither: () => y.isNeither(),
        Either: (e) =>
          y.match({
            Neither: () => false,
            Either: (e2) => eqEither.eqv(e, e2),
            Both: () => false,
          }),
        Both: (b) =>
          y.match({
            Neither: () => false,
            Either: () => false,
            Both: (b2) => eqBoth.eqv(b, b2),
          }),
      }),
  };
}

export function showAnyOf<L, R>(SL: Show<L>, SR: Show<R>): Show<AnyOf<L, R>> {
  const showEither = showEitherOf(SL, SR);
  const showBoth = showBothOf(SL, SR);
  return {
    show: (x) =>
      x.match({
        Neither: () => "Neither",
        Either: (e) => showEither.show(e),
        Both: (b) => showBoth.show(b).replace(/^BothOf/, "Both"),
      }),
  };
}

export function hashAnyOf<L, R>(HL: Hash<L>, HR: Hash<R>): Hash<AnyOf<L, R>> {
  const hashEither = hashEitherOf(HL, HR);
  const hashBoth = hashBothOf(HL, HR);
  return {
    hash: (x) =>
      x.match({
        Neither: () => 0,
        Either: (e) => hashEither.hash(e),
        Both: (b) => hashBoth.hash(b),
      }),
  };
}
