/**
 * Option (Zero-Cost)
 *
 * Every Option<A> is either a value A or null. `Some(42)` is `42` at runtime
 * and `None` is `null`; no wrapper objects are allocated.
 *
 * **Important**: A must not include null. A slot probe such as `left()` that
 * returns `null` means "absent", so `Option<null>` would collapse. Operations
 * that branch on the stored case (`leftOrElse`, `map`, `combine`, ...) never go
 * through a probe and are unaffected.
 */

import type { Eq } from "../typeclasses/eq.js";

// ============================================================================
// Type Definition
// ============================================================================

export type Option<A> = A | null;

/** Type-level alias; at runtime it's just A */
export type Some<A> = A;

/** Type-level alias; at runtime it's null */
export type None = null;

/**
 * Defined<T> - Wrapper for values that may legitimately include null.
 *
 * `Option<Defined<T>>` keeps "no value" (None) apart from "value is null"
 * (`{ value: null }`).
 */
export type Defined<T> = { readonly value: T };

export function defined<T>(value: T): Defined<T> {
  return { value };
}

// ============================================================================
// Constructors
// ============================================================================

export function Some<A>(value: A): Option<A> {
  return value;
}

export const None: None = null;

/**
 * Convert a possibly-undefined value into an Option
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value ?? None;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

export function eqOption<A>(E: Eq<A>): Eq<Option<A>> {
  return {
    eqv: (x, y) => (isSome(x) && isSome(y) ? E.eqv(x, y) : isNone(x) && isNone(y)),
  };
}
