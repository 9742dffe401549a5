/**
 * Two-Slot Type-Level Functions
 *
 * The capability interfaces in `concepts.ts` return "the same kind of value,
 * with different payload types" from `map` and `swap`. TypeScript has no
 * higher-kinded types, so each data type registers a type-level function
 * that is applied with `Apply2`.
 *
 * The encoding is the `this`-indexed one used for single-slot kinds
 * (`interface OptionF { _: Option<this["__kind__"]> }`), widened to two slots:
 *
 * ```typescript
 * interface BothOfF extends TypeFunction2 {
 *   readonly _: BothOf<this["__left__"], this["__right__"]>;
 * }
 * type T = Apply2<BothOfF, number, string>; // → BothOf<number, string>
 * ```
 *
 * @module
 */

import type { AnyOf } from "./data/any-of.js";
import type { BothOf } from "./data/both-of.js";
import type { EitherOf } from "./data/either-of.js";

// ============================================================================
// Core encoding
// ============================================================================

/**
 * A type-level function of two arguments.
 */
export interface TypeFunction2 {
  readonly __left__: unknown;
  readonly __right__: unknown;
  readonly _: unknown;
}

/**
 * Apply a two-slot type-level function.
 */
export type Apply2<F extends TypeFunction2, L, R> = (F & {
  readonly __left__: L;
  readonly __right__: R;
})["_"];

// ============================================================================
// Type-level functions for the data types
// ============================================================================

/** `Apply2<EitherOfF, L, R>` → `EitherOf<L, R>` */
export interface EitherOfF extends TypeFunction2 {
  readonly _: EitherOf<this["__left__"], this["__right__"]>;
}

/** `Apply2<BothOfF, L, R>` → `BothOf<L, R>` */
export interface BothOfF extends TypeFunction2 {
  readonly _: BothOf<this["__left__"], this["__right__"]>;
}

/** `Apply2<AnyOfF, L, R>` → `AnyOf<L, R>` */
export interface AnyOfF extends TypeFunction2 {
  readonly _: AnyOf<this["__left__"], this["__right__"]>;
}
