/**
 * DualBase
 *
 * Abstract base for the two-slot data types. Subclasses supply the slot
 * probes, the two `*OrElse` extractors, `map` and `swap`; everything else the
 * capability interfaces ask for is derived here, once.
 */

import type { Dual } from "../concepts.js";
import { fail, failWith } from "../errors.js";
import type { Apply2, TypeFunction2 } from "../hkt.js";
import type { Default } from "../typeclasses/default.js";
import type { Opt2 } from "./couple.js";
import { isSome, type Option } from "./option.js";

export abstract class DualBase<L, R, F extends TypeFunction2> implements Dual<L, R, F> {
  abstract left(): Option<L>;
  abstract right(): Option<R>;
  abstract leftOrElse(f: () => L): L;
  abstract rightOrElse(f: () => R): R;
  abstract map<L2, R2>(fl: (left: L) => L2, fr: (right: R) => R2): Apply2<F, L2, R2>;
  abstract swap(): Apply2<F, R, L>;
  abstract equals(other: unknown): boolean;
  abstract toString(): string;

  // --------------------------------------------------------------------------
  // LeftOrRight
  // --------------------------------------------------------------------------

  isLeft(): boolean {
    return isSome(this.left());
  }

  isRight(): boolean {
    return isSome(this.right());
  }

  opt2(): Opt2<L, R> {
    return [this.left(), this.right()] as const;
  }

  // --------------------------------------------------------------------------
  // Mappable
  // --------------------------------------------------------------------------

  mapLeft<L2>(fl: (left: L) => L2): Apply2<F, L2, R> {
    return this.map(fl, (right: R) => right);
  }

  mapRight<R2>(fr: (right: R) => R2): Apply2<F, L, R2> {
    return this.map((left: L) => left, fr);
  }

  // --------------------------------------------------------------------------
  // Unwrap
  // --------------------------------------------------------------------------

  leftOr(fallback: L): L {
    return this.leftOrElse(() => fallback);
  }

  rightOr(fallback: R): R {
    return this.rightOrElse(() => fallback);
  }

  leftOrDefault(D: Default<L>): L {
    return this.leftOrElse(() => D.empty());
  }

  rightOrDefault(D: Default<R>): R {
    return this.rightOrElse(() => D.empty());
  }

  expectLeft(message: string): L {
    return this.leftOrElse(() => fail("left", message));
  }

  expectRight(message: string): R {
    return this.rightOrElse(() => fail("right", message));
  }

  unwrapLeft(): L {
    return this.leftOrElse(() =>
      failWith("left", "called `unwrapLeft` on a value with no left slot", this)
    );
  }

  unwrapRight(): R {
    return this.rightOrElse(() =>
      failWith("right", "called `unwrapRight` on a value with no right slot", this)
    );
  }
}
