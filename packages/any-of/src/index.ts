/**
 * any-of: flexible sum types over two optional values
 *
 * - `EitherOf<L, R>`: exactly one of two values
 * - `BothOf<L, R>`: both values
 * - `AnyOf<L, R>`: neither, either or both
 * - `AnyOf4` / `AnyOf8` / `AnyOf16`: nested AnyOf with flat path accessors
 *
 * All of them share the LeftOrRight, Mappable, Unwrap and Swap capabilities.
 *
 * @example
 * ```typescript
 * import { AnyOf, AnyOf4 } from "any-of";
 *
 * const a = AnyOf.newLeft<number, string>(1).combine(AnyOf.newRight("x"));
 * a.isBoth();             // true
 * a.swap().toString();    // 'Both("x", 1)'
 *
 * const q = AnyOf4.new4(1, null, null, 4);
 * AnyOf4.rr(q);           // 4
 * ```
 */

// ============================================================================
// Foundations
// ============================================================================

export type { TypeFunction2, Apply2, EitherOfF, BothOfF, AnyOfF } from "./hkt.js";

export {
  type Option,
  type Defined,
  Some,
  None,
  defined,
  fromNullable,
  isSome,
  isNone,
  eqOption,
} from "./data/option.js";

export * from "./data/couple.js";

// ============================================================================
// Capabilities
// ============================================================================

export * from "./concepts.js";
export { DualBase } from "./data/dual.js";

// ============================================================================
// Data Types
// ============================================================================

export * from "./data/either-of.js";
export * from "./data/both-of.js";
export * from "./data/any-of.js";
export {
  AnyOf4,
  AnyOf8,
  AnyOf16,
  type Opt4,
  type Opt8,
  type Opt16,
  viaLeft,
  viaRight,
} from "./data/any-of-n.js";

// ============================================================================
// Typeclasses & Laws
// ============================================================================

export * from "./typeclasses/index.js";
export * from "./laws/index.js";

// ============================================================================
// Runtime: errors, configuration, logging
// ============================================================================

export { ExtractionError, type Slot } from "./errors.js";
export {
  config,
  defineConfig,
  type AnyOfConfig,
  type ResolvedConfig,
  type LogLevel,
} from "./config.js";
export { logger } from "./logging.js";
