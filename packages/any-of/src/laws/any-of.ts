/**
 * AnyOf Laws
 *
 *   - Round-trip: AnyOf.fromOpt2(x.opt2()) === x
 *   - Neither is an identity for combine, on both sides
 *   - combine takes each slot from the right operand when it has one
 *   - Filtering by itself leaves Neither
 *   - x.filter(y).combine(y) === x.combine(y)
 *
 * @module
 */

import { AnyOf, eqAnyOf } from "../data/any-of.js";
import { eqOption, isSome } from "../data/option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

export function anyOfLaws<L, R>(EL: Eq<L>, ER: Eq<R>): LawSet<[AnyOf<L, R>, AnyOf<L, R>]> {
  const E = eqAnyOf(EL, ER);
  const eqLeft = eqOption(EL);
  const eqRight = eqOption(ER);
  const neither = AnyOf.newNeither<L, R>();
  return [
    {
      name: "opt2 round-trip",
      arity: 1,
      check: (x) => E.eqv(AnyOf.fromOpt2(x.opt2()), x),
    },
    {
      name: "combine identity",
      arity: 1,
      description: "Neither combined on either side changes nothing",
      check: (x) => E.eqv(x.combine(neither), x) && E.eqv(neither.combine(x), x),
    },
    {
      name: "combine precedence",
      arity: 2,
      description: "Each slot of x.combine(y) comes from y when y has it, else from x",
      check: (x, y) => {
        const c = x.combine(y);
        const left = y.left();
        const right = y.right();
        return (
          eqLeft.eqv(c.left(), isSome(left) ? left : x.left()) &&
          eqRight.eqv(c.right(), isSome(right) ? right : x.right())
        );
      },
    },
    {
      name: "self filter",
      arity: 1,
      check: (x) => x.filter(x).isNeither(),
    },
    {
      name: "filter then combine",
      arity: 2,
      description: "x.filter(y).combine(y) equals x.combine(y)",
      check: (x, y) => E.eqv(x.filter(y).combine(y), x.combine(y)),
    },
  ];
}
