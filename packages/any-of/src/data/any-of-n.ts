/**
 * Composite Arities
 *
 * AnyOf nested two, three and four levels deep gives a value over 4, 8 or 16
 * optional slots. The nesting is a plain type alias; these helpers read a
 * single leaf by its path (`ll` = left of left, `rlr` = right, left, right,
 * ...) and convert to and from flat tuples of options.
 *
 * A leaf is present exactly when every level on its path holds a value on
 * that side.
 *
 * @example
 * ```typescript
 * const x = AnyOf4.new4(1, null, null, 4);
 * AnyOf4.ll(x); // 1
 * AnyOf4.lr(x); // null
 * AnyOf4.rr(x); // 4
 * x.toString(); // "Both(Left(1), Right(4))"
 * ```
 */

import { AnyOf } from "./any-of.js";
import { isSome, None, type Option } from "./option.js";

// ============================================================================
// Types
// ============================================================================

export type AnyOf4<LL, LR = LL, RL = LR, RR = RL> = AnyOf<AnyOf<LL, LR>, AnyOf<RL, RR>>;

export type AnyOf8<
  LLL,
  LLR = LLL,
  LRL = LLR,
  LRR = LRL,
  RLL = LLL,
  RLR = LLR,
  RRL = LRL,
  RRR = LRR,
> = AnyOf<AnyOf4<LLL, LLR, LRL, LRR>, AnyOf4<RLL, RLR, RRL, RRR>>;

export type AnyOf16<
  LLLL,
  LLLR = LLLL,
  LLRL = LLLR,
  LLRR = LLRL,
  LRLL = LLLL,
  LRLR = LLLR,
  LRRL = LLRL,
  LRRR = LLRR,
  RLLL = LLLL,
  RLLR = LLLR,
  RLRL = LLRL,
  RLRR = LLRR,
  RRLL = LRLL,
  RRLR = LRLR,
  RRRL = LRRL,
  RRRR = LRRR,
> = AnyOf<
  AnyOf8<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR>,
  AnyOf8<RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR>
>;

export type Opt4<LL, LR, RL, RR> = readonly [Option<LL>, Option<LR>, Option<RL>, Option<RR>];

export type Opt8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR> = readonly [
  ...Opt4<LLL, LLR, LRL, LRR>,
  ...Opt4<RLL, RLR, RRL, RRR>,
];

export type Opt16<
  LLLL,
  LLLR,
  LLRL,
  LLRR,
  LRLL,
  LRLR,
  LRRL,
  LRRR,
  RLLL,
  RLLR,
  RLRL,
  RLRR,
  RRLL,
  RRLR,
  RRRL,
  RRRR,
> = readonly [
  ...Opt8<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR>,
  ...Opt8<RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR>,
];

// ============================================================================
// Path steps
// ============================================================================

/**
 * Continue into the left slot, if present.
 */
export function viaLeft<L, R, T>(x: AnyOf<L, R>, next: (left: L) => Option<T>): Option<T> {
  const left = x.left();
  return isSome(left) ? next(left) : None;
}

/**
 * Continue into the right slot, if present.
 */
export function viaRight<L, R, T>(x: AnyOf<L, R>, next: (right: R) => Option<T>): Option<T> {
  const right = x.right();
  return isSome(right) ? next(right) : None;
}

/** A half with no leaves present is an absent slot, never `Neither`. */
function nonEmpty<L, R>(x: AnyOf<L, R>): Option<AnyOf<L, R>> {
  return x.isNeither() ? None : x;
}

// ============================================================================
// Four slots
// ============================================================================

export function ll<LL, LR, R>(x: AnyOf<AnyOf<LL, LR>, R>): Option<LL> {
  return viaLeft(x, (inner) => inner.left());
}

export function lr<LL, LR, R>(x: AnyOf<AnyOf<LL, LR>, R>): Option<LR> {
  return viaLeft(x, (inner) => inner.right());
}

export function rl<L, RL, RR>(x: AnyOf<L, AnyOf<RL, RR>>): Option<RL> {
  return viaRight(x, (inner) => inner.left());
}

export function rr<L, RL, RR>(x: AnyOf<L, AnyOf<RL, RR>>): Option<RR> {
  return viaRight(x, (inner) => inner.right());
}

export function fromOpt4<LL, LR, RL, RR>(opt: Opt4<LL, LR, RL, RR>): AnyOf4<LL, LR, RL, RR> {
  const [ll, lr, rl, rr] = opt;
  return AnyOf.new(nonEmpty(AnyOf.new(ll, lr)), nonEmpty(AnyOf.new(rl, rr)));
}

export function new4<LL, LR, RL, RR>(
  ll: Option<LL>,
  lr: Option<LR>,
  rl: Option<RL>,
  rr: Option<RR>
): AnyOf4<LL, LR, RL, RR> {
  return fromOpt4([ll, lr, rl, rr]);
}

export function opt4<LL, LR, RL, RR>(x: AnyOf4<LL, LR, RL, RR>): Opt4<LL, LR, RL, RR> {
  return [ll(x), lr(x), rl(x), rr(x)] as const;
}

// ============================================================================
// Eight slots
// ============================================================================

export function lll<LLL, LLR, LR, R>(x: AnyOf<AnyOf<AnyOf<LLL, LLR>, LR>, R>): Option<LLL> {
  return viaLeft(x, (inner) => ll(inner));
}

export function llr<LLL, LLR, LR, R>(x: AnyOf<AnyOf<AnyOf<LLL, LLR>, LR>, R>): Option<LLR> {
  return viaLeft(x, (inner) => lr(inner));
}

export function lrl<LL, LRL, LRR, R>(x: AnyOf<AnyOf<LL, AnyOf<LRL, LRR>>, R>): Option<LRL> {
  return viaLeft(x, (inner) => rl(inner));
}

export function lrr<LL, LRL, LRR, R>(x: AnyOf<AnyOf<LL, AnyOf<LRL, LRR>>, R>): Option<LRR> {
  return viaLeft(x, (inner) => rr(inner));
}

export function rll<L, RLL, RLR, RR>(x: AnyOf<L, AnyOf<AnyOf<RLL, RLR>, RR>>): Option<RLL> {
  return viaRight(x, (inner) => ll(inner));
}

export function rlr<L, RLL, RLR, RR>(x: AnyOf<L, AnyOf<AnyOf<RLL, RLR>, RR>>): Option<RLR> {
  return viaRight(x, (inner) => lr(inner));
}

export function rrl<L, RL, RRL, RRR>(x: AnyOf<L, AnyOf<RL, AnyOf<RRL, RRR>>>): Option<RRL> {
  return viaRight(x, (inner) => rl(inner));
}

export function rrr<L, RL, RRL, RRR>(x: AnyOf<L, AnyOf<RL, AnyOf<RRL, RRR>>>): Option<RRR> {
  return viaRight(x, (inner) => rr(inner));
}

export function fromOpt8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR>(
  opt: Opt8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR>
): AnyOf8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR> {
  const [a, b, c, d, e, f, g, h] = opt;
  return AnyOf.new(nonEmpty(fromOpt4([a, b, c, d])), nonEmpty(fromOpt4([e, f, g, h])));
}

export function new8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR>(
  lll: Option<LLL>,
  llr: Option<LLR>,
  lrl: Option<LRL>,
  lrr: Option<LRR>,
  rll: Option<RLL>,
  rlr: Option<RLR>,
  rrl: Option<RRL>,
  rrr: Option<RRR>
): AnyOf8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR> {
  return fromOpt8([lll, llr, lrl, lrr, rll, rlr, rrl, rrr]);
}

export function opt8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR>(
  x: AnyOf8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR>
): Opt8<LLL, LLR, LRL, LRR, RLL, RLR, RRL, RRR> {
  return [lll(x), llr(x), lrl(x), lrr(x), rll(x), rlr(x), rrl(x), rrr(x)] as const;
}

// ============================================================================
// Sixteen slots
// ============================================================================

export function llll<LLLL, LLLR, LLR, LR, R>(
  x: AnyOf<AnyOf<AnyOf<AnyOf<LLLL, LLLR>, LLR>, LR>, R>
): Option<LLLL> {
  return viaLeft(x, (inner) => lll(inner));
}

export function lllr<LLLL, LLLR, LLR, LR, R>(
  x: AnyOf<AnyOf<AnyOf<AnyOf<LLLL, LLLR>, LLR>, LR>, R>
): Option<LLLR> {
  return viaLeft(x, (inner) => llr(inner));
}

export function llrl<LLL, LLRL, LLRR, LR, R>(
  x: AnyOf<AnyOf<AnyOf<LLL, AnyOf<LLRL, LLRR>>, LR>, R>
): Option<LLRL> {
  return viaLeft(x, (inner) => lrl(inner));
}

export function llrr<LLL, LLRL, LLRR, LR, R>(
  x: AnyOf<AnyOf<AnyOf<LLL, AnyOf<LLRL, LLRR>>, LR>, R>
): Option<LLRR> {
  return viaLeft(x, (inner) => lrr(inner));
}

export function lrll<LL, LRLL, LRLR, LRR, R>(
  x: AnyOf<AnyOf<LL, AnyOf<AnyOf<LRLL, LRLR>, LRR>>, R>
): Option<LRLL> {
  return viaLeft(x, (inner) => rll(inner));
}

export function lrlr<LL, LRLL, LRLR, LRR, R>(
  x: AnyOf<AnyOf<LL, AnyOf<AnyOf<LRLL, LRLR>, LRR>>, R>
): Option<LRLR> {
  return viaLeft(x, (inner) => rlr(inner));
}

export function lrrl<LL, LRL, LRRL, LRRR, R>(
  x: AnyOf<AnyOf<LL, AnyOf<LRL, AnyOf<LRRL, LRRR>>>, R>
): Option<LRRL> {
  return viaLeft(x, (inner) => rrl(inner));
}

export function lrrr<LL, LRL, LRRL, LRRR, R>(
  x: AnyOf<AnyOf<LL, AnyOf<LRL, AnyOf<LRRL, LRRR>>>, R>
): Option<LRRR> {
  return viaLeft(x, (inner) => rrr(inner));
}

export function rlll<L, RLLL, RLLR, RLR, RR>(
  x: AnyOf<L, AnyOf<AnyOf<AnyOf<RLLL, RLLR>, RLR>, RR>>
): Option<RLLL> {
  return viaRight(x, (inner) => lll(inner));
}

export function rllr<L, RLLL, RLLR, RLR, RR>(
  x: AnyOf<L, AnyOf<AnyOf<AnyOf<RLLL, RLLR>, RLR>, RR>>
): Option<RLLR> {
  return viaRight(x, (inner) => llr(inner));
}

export function rlrl<L, RLL, RLRL, RLRR, RR>(
  x: AnyOf<L, AnyOf<AnyOf<RLL, AnyOf<RLRL, RLRR>>, RR>>
): Option<RLRL> {
  return viaRight(x, (inner) => lrl(inner));
}

export function rlrr<L, RLL, RLRL, RLRR, RR>(
  x: AnyOf<L, AnyOf<AnyOf<RLL, AnyOf<RLRL, RLRR>>, RR>>
): Option<RLRR> {
  return viaRight(x, (inner) => lrr(inner));
}

export function rrll<L, RL, RRLL, RRLR, RRR>(
  x: AnyOf<L, AnyOf<RL, AnyOf<AnyOf<RRLL, RRLR>, RRR>>>
): Option<RRLL> {
  return viaRight(x, (inner) => rll(inner));
}

export function rrlr<L, RL, RRLL, RRLR, RRR>(
  x: AnyOf<L, AnyOf<RL, AnyOf<AnyOf<RRLL, RRLR>, RRR>>>
): Option<RRLR> {
  return viaRight(x, (inner) => rlr(inner));
}

export function rrrl<L, RL, RRL, RRRL, RRRR>(
  x: AnyOf<L, AnyOf<RL, AnyOf<RRL, AnyOf<RRRL, RRRR>>>>
): Option<RRRL> {
  return viaRight(x, (inner) => rrl(inner));
}

export function rrrr<L, RL, RRL, RRRL, RRRR>(
  x: AnyOf<L, AnyOf<RL, AnyOf<RRL, AnyOf<RRRL, RRRR>>>>
): Option<RRRR> {
  return viaRight(x, (inner) => rrr(inner));
}

export function fromOpt16<
  LLLL,
  LLLR,
  LLRL,
  LLRR,
  LRLL,
  LRLR,
  LRRL,
  LRRR,
  RLLL,
  RLLR,
  RLRL,
  RLRR,
  RRLL,
  RRLR,
  RRRL,
  RRRR,
>(
  opt: Opt16<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR, RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR>
): AnyOf16<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR, RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR> {
  const [a, b, c, d, e, f, g, h, i, j, k, l, m, n, o, p] = opt;
  return AnyOf.new(
    nonEmpty(fromOpt8([a, b, c, d, e, f, g, h])),
    nonEmpty(fromOpt8([i, j, k, l, m, n, o, p]))
  );
}

export function new16<
  LLLL,
  LLLR,
  LLRL,
  LLRR,
  LRLL,
  LRLR,
  LRRL,
  LRRR,
  RLLL,
  RLLR,
  RLRL,
  RLRR,
  RRLL,
  RRLR,
  RRRL,
  RRRR,
>(
  llll: Option<LLLL>,
  lllr: Option<LLLR>,
  llrl: Option<LLRL>,
  llrr: Option<LLRR>,
  lrll: Option<LRLL>,
  lrlr: Option<LRLR>,
  lrrl: Option<LRRL>,
  lrrr: Option<LRRR>,
  rlll: Option<RLLL>,
  rllr: Option<RLLR>,
  rlrl: Option<RLRL>,
  rlrr: Option<RLRR>,
  rrll: Option<RRLL>,
  rrlr: Option<RRLR>,
  rrrl: Option<RRRL>,
  rrrr: Option<RRRR>
): AnyOf16<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR, RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR> {
  return fromOpt16([
    llll,
    lllr,
    llrl,
    llrr,
    lrll,
    lrlr,
    lrrl,
    lrrr,
    rlll,
    rllr,
    rlrl,
    rlrr,
    rrll,
    rrlr,
    rrrl,
    rrrr,
  ]);
}

export function opt16<
  LLLL,
  LLLR,
  LLRL,
  LLRR,
  LRLL,
  LRLR,
  LRRL,
  LRRR,
  RLLL,
  RLLR,
  RLRL,
  RLRR,
  RRLL,
  RRLR,
  RRRL,
  RRRR,
>(
  x: AnyOf16<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR, RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR>
): Opt16<LLLL, LLLR, LLRL, LLRR, LRLL, LRLR, LRRL, LRRR, RLLL, RLLR, RLRL, RLRR, RRLL, RRLR, RRRL, RRRR> {
  return [
    llll(x),
    lllr(x),
    llrl(x),
    llrr(x),
    lrll(x),
    lrlr(x),
    lrrl(x),
    lrrr(x),
    rlll(x),
    rllr(x),
    rlrl(x),
    rlrr(x),
    rrll(x),
    rrlr(x),
    rrrl(x),
    rrrr(x),
  ] as const;
}

// ============================================================================
// Namespaces
// ============================================================================

export const AnyOf4 = { new4, fromOpt4, opt4, ll, lr, rl, rr } as const;

export const AnyOf8 = {
  new8,
  fromOpt8,
  opt8,
  lll,
  llr,
  lrl,
  lrr,
  rll,
  rlr,
  rrl,
  rrr,
} as const;

export const AnyOf16 = {
  new16,
  fromOpt16,
  opt16,
  llll,
  lllr,
  llrl,
  llrr,
  lrll,
  lrlr,
  lrrl,
  lrrr,
  rlll,
  rllr,
  rlrl,
  rlrr,
  rrll,
  rrlr,
  rrrl,
  rrrr,
} as const;
