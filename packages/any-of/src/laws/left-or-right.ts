/**
 * LeftOrRight and Unwrap Laws
 *
 *   - opt2 consistency: x.opt2() equals [x.left(), x.right()]
 *   - isLeft / isRight agree with the probes
 *   - leftOr / rightOr return the present value, else the fallback
 *
 * @module
 */

import type { LeftOrRight, Unwrap } from "../concepts.js";
import { eqOption, isSome } from "../data/option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

export function leftOrRightLaws<L, R>(EL: Eq<L>, ER: Eq<R>): LawSet<[LeftOrRight<L, R>]> {
  const eqLeft = eqOption(EL);
  const eqRight = eqOption(ER);
  return [
    {
      name: "opt2 consistency",
      arity: 1,
      description: "x.opt2() equals [x.left(), x.right()]",
      check: (x) => {
        const [left, right] = x.opt2();
        return eqLeft.eqv(left, x.left()) && eqRight.eqv(right, x.right());
      },
    },
    {
      name: "isLeft agrees with left",
      arity: 1,
      check: (x) => x.isLeft() === isSome(x.left()),
    },
    {
      name: "isRight agrees with right",
      arity: 1,
      check: (x) => x.isRight() === isSome(x.right()),
    },
  ];
}

export function unwrapLaws<L, R>(EL: Eq<L>, ER: Eq<R>): LawSet<[Unwrap<L, R>, L, R]> {
  return [
    {
      name: "leftOr",
      arity: 2,
      description: "x.leftOr(d) is the present left value, else d",
      check: (x, d) => {
        const left = x.left();
        return EL.eqv(x.leftOr(d), isSome(left) ? left : d);
      },
    },
    {
      name: "rightOr",
      arity: 3,
      description: "x.rightOr(d) is the present right value, else d",
      check: (x, _, d) => {
        const right = x.right();
        return ER.eqv(x.rightOr(d), isSome(right) ? right : d);
      },
    },
    {
      name: "fallback only when absent",
      arity: 3,
      description: "leftOrElse / rightOrElse call the fallback exactly when the slot is absent",
      check: (x, l, r) => {
        let calls = 0;
        x.leftOrElse(() => {
          calls++;
          return l;
        });
        x.rightOrElse(() => {
          calls++;
          return r;
        });
        return calls === Number(!x.isLeft()) + Number(!x.isRight());
      },
    },
  ];
}
