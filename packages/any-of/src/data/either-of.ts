/**
 * EitherOf - exactly one of two values
 *
 * A value that holds either a left payload or a right payload, never both and
 * never neither.
 *
 * @example
 * ```typescript
 * const e = EitherOf.newLeft<number, string>(1);
 * e.left();            // 1
 * e.right();           // null
 * e.swap().right();    // 1
 * e.map((n) => n + 1, (s) => s.length).toString(); // "Left(2)"
 * ```
 */

import { fail } from "../errors.js";
import type { EitherOfF } from "../hkt.js";
import type { Eq } from "../typeclasses/eq.js";
import { structuralEquals } from "../typeclasses/eq.js";
import type { Hash } from "../typeclasses/hash.js";
import { combineHash } from "../typeclasses/hash.js";
import type { Show } from "../typeclasses/show.js";
import { showUnknown } from "../typeclasses/show.js";
import { AnyOf } from "./any-of.js";
import type { Opt2 } from "./couple.js";
import { DualBase } from "./dual.js";
import { isNone, isSome, None, type Option } from "./option.js";

type EitherRepr<L, R> =
  | { readonly _tag: "Left"; readonly left: L }
  | { readonly _tag: "Right"; readonly right: R };

export interface EitherOfPatterns<L, R, T> {
  Left: (left: L) => T;
  Right: (right: R) => T;
}

export class EitherOf<L, R = L> extends DualBase<L, R, EitherOfF> {
  private constructor(private readonly repr: EitherRepr<L, R>) {
    super();
  }

  // ==========================================================================
  // Constructors
  // ==========================================================================

  static newLeft<L, R = never>(left: L): EitherOf<L, R> {
    return new EitherOf<L, R>({ _tag: "Left", left });
  }

  static newRight<R, L = never>(right: R): EitherOf<L, R> {
    return new EitherOf<L, R>({ _tag: "Right", right });
  }

  /**
   * @throws ExtractionError when both or neither slot is present
   */
  static fromOpt2<L, R>(opt: Opt2<L, R>): EitherOf<L, R> {
    const [left, right] = opt;
    if (isSome(left) && isNone(right)) return EitherOf.newLeft<L, R>(left);
    if (isNone(left) && isSome(right)) return EitherOf.newRight<R, L>(right);
    return isSome(left)
      ? fail("either", "cannot build an EitherOf from two present values")
      : fail("either", "cannot build an EitherOf from two absent values");
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  get case(): "Left" | "Right" {
    return this.repr._tag;
  }

  left(): Option<L> {
    return this.repr._tag === "Left" ? this.repr.left : None;
  }

  right(): Option<R> {
    return this.repr._tag === "Right" ? this.repr.right : None;
  }

  match<T>(patterns: EitherOfPatterns<L, R, T>): T {
    return this.repr._tag === "Left"
      ? patterns.Left(this.repr.left)
      : patterns.Right(this.repr.right);
  }

  fold<T>(onLeft: (left: L) => T, onRight: (right: R) => T): T {
    return this.match({ Left: onLeft, Right: onRight });
  }

  // ==========================================================================
  // Capabilities
  // ==========================================================================

  leftOrElse(f: () => L): L {
    return this.repr._tag === "Left" ? this.repr.left : f();
  }

  rightOrElse(f: () => R): R {
    return this.repr._tag === "Right" ? this.repr.right : f();
  }

  map<L2, R2>(fl: (left: L) => L2, fr: (right: R) => R2): EitherOf<L2, R2> {
    return this.match({
      Left: (left) => EitherOf.newLeft<L2, R2>(fl(left)),
      Right: (right) => EitherOf.newRight<R2, L2>(fr(right)),
    });
  }

  swap(): EitherOf<R, L> {
    return this.match({
      Left: (left) => EitherOf.newRight<L, R>(left),
      Right: (right) => EitherOf.newLeft<R, L>(right),
    });
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  toAnyOf(): AnyOf<L, R> {
    return AnyOf.fromEither(this);
  }

  toString(): string {
    return this.match({
      Left: (left) => `Left(${showUnknown(left)})`,
      Right: (right) => `Right(${showUnknown(right)})`,
    });
  }

  equals(other: unknown): boolean {
    if (!(other instanceof EitherOf)) return false;
    const that: EitherOf<unknown, unknown> = other;
    return this.match({
      Left: (left) => that.repr._tag === "Left" && structuralEquals(left, that.repr.left),
      Right: (right) => that.repr._tag === "Right" && structuralEquals(right, that.repr.right),
    });
  }
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function eqEitherOf<L, R>(EL: Eq<L>, ER: Eq<R>): Eq<EitherOf<L, R>> {
  return {
    eqv: (x, y) =>
      x.match({
        Left: (l) =>
          y.match({
            Left: (l2) => EL.eqv(l, l2),
            Right: () => false,
          }),
        Right: (r) =>
          y.match({
            Left: () => false,
            Right: (r2) => ER.eqv(r, r2),
          }),
      }),
  };
}

export function showEitherOf<L, R>(SL: Show<L>, SR: Show<R>): Show<EitherOf<L, R>> {
  return {
    show: (e) =>
      e.match({
        Left: (l) => `Left(${SL.show(l)})`,
        Right: (r) => `Right(${SR.show(r)})`,
      }),
  };
}

export function hashEitherOf<L, R>(HL: Hash<L>, HR: Hash<R>): Hash<EitherOf<L, R>> {
  return {
    hash: (e) =>
      e.match({
        Left: (l) => combineHash(1, HL.hash(l)),
        Right: (r) => combineHash(2, HR.hash(r)),
      }),
  };
}
