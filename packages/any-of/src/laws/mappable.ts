/**
 * Mappable Laws
 *
 *   - Identity: map(x, l => l, r => r) === x
 *   - Composition: map(map(x, f1, f2), g1, g2) === map(x, g1 ∘ f1, g2 ∘ f2)
 *
 * The laws take `map` as a function so any implementer can be checked
 * without naming its type-level function.
 *
 * @module
 */

import type { Eq } from "../typeclasses/eq.js";
import type { LawSet } from "./types.js";

export type Endo<A> = (a: A) => A;

export type MapFn<X, L, R> = (x: X, fl: Endo<L>, fr: Endo<R>) => X;

export function mappableLaws<X, L, R>(
  map: MapFn<X, L, R>,
  EqX: Eq<X>
): LawSet<[X, Endo<L>, Endo<L>, Endo<R>, Endo<R>]> {
  return [
    {
      name: "identity",
      arity: 1,
      description: "Mapping identity preserves structure",
      check: (x) =>
        EqX.eqv(
          map(
            x,
            (l) => l,
            (r) => r
          ),
          x
        ),
    },
    {
      name: "composition",
      arity: 5,
      description: "Mapping twice equals mapping the composed functions once",
      check: (x, f1, g1, f2, g2) =>
        EqX.eqv(
          map(map(x, f1, f2), g1, g2),
          map(
            x,
            (l) => g1(f1(l)),
            (r) => g2(f2(r))
          )
        ),
    },
  ];
}
