/**
 * Swap Laws
 *
 *   - Involution: swap(swap(x)) === x
 *   - Exchange: swap(x).left() === x.right() and swap(x).right() === x.left()
 *
 * @module
 */

import type { LeftOrRight } from "../concepts.js";
import { eqOption } from "../data/option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

export function swapLaws<L, R, X extends LeftOrRight<L, R>, Y extends LeftOrRight<R, L>>(
  swapX: (x: X) => Y,
  swapY: (y: Y) => X,
  EqX: Eq<X>,
  EL: Eq<L>,
  ER: Eq<R>
): LawSet<[X]> {
  const eqLeft = eqOption(EL);
  const eqRight = eqOption(ER);
  return [
    {
      name: "involution",
      arity: 1,
      description: "Swapping twice gives back the original value",
      check: (x) => EqX.eqv(swapY(swapX(x)), x),
    },
    {
      name: "exchange",
      arity: 1,
      description: "Swapping moves the left slot to the right and the right slot to the left",
      check: (x) => {
        const y = swapX(x);
        return eqLeft.eqv(y.right(), x.left()) && eqRight.eqv(y.left(), x.right());
      },
    },
  ];
}
