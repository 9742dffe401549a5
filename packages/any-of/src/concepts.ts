/**
 * Capability Interfaces
 *
 * Every two-slot type in the library is described by the same four
 * capabilities. They are plain interfaces; the data types get the derived
 * members from `DualBase` (see `data/dual.ts`), and any other type can
 * implement `LeftOrRight` directly to take part in the generic utilities below.
 *
 * | Capability    | Members                                                   |
 * | ------------- | --------------------------------------------------------- |
 * | `LeftOrRight` | `left`, `right`, `isLeft`, `isRight`, `opt2`              |
 * | `Mappable`    | `map`, `mapLeft`, `mapRight`                              |
 * | `Unwrap`      | `leftOrElse`, `leftOr`, `leftOrDefault`, `expectLeft`,... |
 * | `Swap`        | `swap`                                                    |
 *
 * @module
 */

import type { Opt2 } from "./data/couple.js";
import { isSome, type Option } from "./data/option.js";
import type { Apply2, TypeFunction2 } from "./hkt.js";
import type { Default } from "./typeclasses/default.js";

// ============================================================================
// LeftOrRight
// ============================================================================

/**
 * Read access to the two optional slots.
 *
 * `opt2()` must always equal `[left(), right()]`.
 */
export interface LeftOrRight<L, R> {
  left(): Option<L>;
  right(): Option<R>;
  isLeft(): boolean;
  isRight(): boolean;
  opt2(): Opt2<L, R>;
}

// ============================================================================
// Mappable
// ============================================================================

/**
 * Per-slot transformation preserving the case. `F` names the implementing
 * type so the result keeps it (`EitherOf` maps to `EitherOf`, ...).
 */
export interface Mappable<L, R, F extends TypeFunction2> extends LeftOrRight<L, R> {
  map<L2, R2>(fl: (left: L) => L2, fr: (right: R) => R2): Apply2<F, L2, R2>;
  mapLeft<L2>(fl: (left: L) => L2): Apply2<F, L2, R>;
  mapRight<R2>(fr: (right: R) => R2): Apply2<F, L, R2>;
}

// ============================================================================
// Unwrap
// ============================================================================

export interface Unwrap<L, R> extends LeftOrRight<L, R> {
  leftOrElse(f: () => L): L;
  rightOrElse(f: () => R): R;
  leftOr(fallback: L): L;
  rightOr(fallback: R): R;
  leftOrDefault(D: Default<L>): L;
  rightOrDefault(D: Default<R>): R;
  /** @throws ExtractionError with exactly `message` */
  expectLeft(message: string): L;
  /** @throws ExtractionError with exactly `message` */
  expectRight(message: string): R;
  unwrapLeft(): L;
  unwrapRight(): R;
}

// ============================================================================
// Swap
// ============================================================================

export interface Swap<L, R, F extends TypeFunction2> extends LeftOrRight<L, R> {
  swap(): Apply2<F, R, L>;
}

/**
 * All four capabilities together; what every data type in the library offers.
 */
export interface Dual<L, R, F extends TypeFunction2>
  extends Mappable<L, R, F>,
    Unwrap<L, R>,
    Swap<L, R, F> {}

// ============================================================================
// Generic utilities
// ============================================================================

export type Presence = "neither" | "left" | "right" | "both";

export function toOpt2<L, R>(x: LeftOrRight<L, R>): Opt2<L, R> {
  return [x.left(), x.right()] as const;
}

export function presence<L, R>(x: LeftOrRight<L, R>): Presence {
  const hasLeft = isSome(x.left());
  const hasRight = isSome(x.right());
  if (hasLeft && hasRight) return "both";
  if (hasLeft) return "left";
  if (hasRight) return "right";
  return "neither";
}

/**
 * A minimal LeftOrRight over two fixed probes.
 */
export function leftOrRightOf<L, R>(left: Option<L>, right: Option<R>): LeftOrRight<L, R> {
  return {
    left: () => left,
    right: () => right,
    isLeft: () => isSome(left),
    isRight: () => isSome(right),
    opt2: () => [left, right] as const,
  };
}
