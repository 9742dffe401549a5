/**
 * BothOf - two values at once
 *
 * Both slots are always present, so `left()` / `right()` return the payloads
 * directly and the `*OrElse` fallbacks are never called.
 */

import { fail } from "../errors.js";
import type { BothOfF } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import { structuralEquals } from "../typeclasses/eq.js";
import type { Hash } from "../typeclasses/hash.js";
import { combineHash } from "../typeclasses/hash.js";
import type { Show } from "../typeclasses/show.js";
import { showUnknown } from "../typeclasses/show.js";
import { AnyOf } from "./any-of.js";
import type { Couple, Opt2 } from "./couple.js";
import { DualBase } from "./dual.js";
import { EitherOf } from "./either-of.js";
import { isNone } from "./option.js";

export class BothOf<L, R = L> extends DualBase<L, R, BothOfF> {
  private constructor(
    private readonly _left: L,
    private readonly _right: R
  ) {
    super();
  }

  static new<L, R>(left: L, right: R): BothOf<L, R> {
    return new BothOf(left, right);
  }

  static fromCouple<L, R>(c: Couple<L, R>): BothOf<L, R> {
    return new BothOf(c[0], c[1]);
  }

  /**
   * @throws ExtractionError naming the missing slot
   */
  static fromOpt2<L, R>(opt: Opt2<L, R>): BothOf<L, R> {
    const [left, right] = opt;
    if (isNone(left)) return fail("left", "missing left value");
    if (isNone(right)) return fail("right", "missing right value");
    return new BothOf(left, right);
  }

  left(): L {
    return this._left;
  }

  right(): R {
    return this._right;
  }

  leftOrElse(_f: () => L): L {
    return this._left;
  }

  rightOrElse(_f: () => R): R {
    return this._right;
  }

  map<L2, R2>(fl: (left: L) => L2, fr: (right: R) => R2): BothOf<L2, R2> {
    return new BothOf(fl(this._left), fr(this._right));
  }

  swap(): BothOf<R, L> {
    return new BothOf(this._right, this._left);
  }

  fold<T>(f: (left: L, right: R) => T): T {
    return f(this._left, this._right);
  }

  toCouple(): Couple<L, R> {
    return [this._left, this._right] as const;
  }

  /** Keep the left payload, dropping the right. */
  intoLeft(): EitherOf<L, R> {
    return EitherOf.newLeft<L, R>(this._left);
  }

  intoRight(): EitherOf<L, R> {
    return EitherOf.newRight<R, L>(this._right);
  }

  toAnyOf(): AnyOf<L, R> {
    return AnyOf.fromBoth(this);
  }

  toString(): string {
    return `BothOf(${showUnknown(this._left)}, ${showUnknown(this._right)})`;
  }

  equals(other: unknown): boolean {
    if (!(other instanceof BothOf)) return false;
    const that: BothOf<unknown, unknown> = other;
    return structuralEquals(this._left, that._left) && structuralEquals(this._right, that._right);
  }
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function eqBothOf<L, R>(EL: Eq<L>, ER: Eq<R>): Eq<BothOf<L, R>> {
  return {
    eqv: (x, y) => EL.eqv(x.left(), y.left()) && ER.eqv(x.right(), y.right()),
  };
}

export function showBothOf<L, R>(SL: Show<L>, SR: Show<R>): Show<BothOf<L, R>> {
  return {
    show: (b) => `BothOf(${SL.show(b.left())}, ${SR.show(b.right())})`,
  };
}

export function hashBothOf<L, R>(HL: Hash<L>, HR: Hash<R>): Hash<BothOf<L, R>> {
  return {
    hash: (b) => combineHash(combineHash(3, HL.hash(b.left())), HR.hash(b.right())),
  };
}
