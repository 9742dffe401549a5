/**
 * Couple, Pair and Opt2
 *
 * Plain two-slot products. `Opt2` is the canonical decomposed form every
 * LeftOrRight value converts to and from.
 */

import type { Option } from "./option.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Show } from "../typeclasses/show.js";
import type { Hash } from "../typeclasses/hash.js";
import { combineHash } from "../typeclasses/hash.js";

// ============================================================================
// Types
// ============================================================================

/** The `[T, U]` tuple. */
export type Couple<T, U> = readonly [T, U];

/** A shortcut for `Couple<T, T>`. */
export type Pair<T> = Couple<T, T>;

/**
 * Two independent optional slots. All four presence combinations are valid,
 * which is exactly the set of states an AnyOf enumerates.
 */
export type Opt2<T, U> = Couple<Option<T>, Option<U>>;

// ============================================================================
// Constructors & accessors
// ============================================================================

export function couple<T, U>(first: T, second: U): Couple<T, U> {
  return [first, second] as const;
}

export function pair<T>(first: T, second: T): Pair<T> {
  return [first, second] as const;
}

export function fst<T, U>(c: Couple<T, U>): T {
  return c[0];
}

export function snd<T, U>(c: Couple<T, U>): U {
  return c[1];
}

export function swapCouple<T, U>(c: Couple<T, U>): Couple<U, T> {
  return [c[1], c[0]] as const;
}

export function bimapCouple<T, U, T2, U2>(
  c: Couple<T, U>,
  f: (t: T) => T2,
  g: (u: U) => U2
): Couple<T2, U2> {
  return [f(c[0]), g(c[1])] as const;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export function eqCouple<T, U>(eqT: Eq<T>, eqU: Eq<U>): Eq<Couple<T, U>> {
  return {
    eqv: (a, b) => eqT.eqv(a[0], b[0]) && eqU.eqv(a[1], b[1]),
  };
}

export function showCouple<T, U>(showT: Show<T>, showU: Show<U>): Show<Couple<T, U>> {
  return {
    show: (c) => `[${showT.show(c[0])}, ${showU.show(c[1])}]`,
  };
}

export function hashCouple<T, U>(hashT: Hash<T>, hashU: Hash<U>): Hash<Couple<T, U>> {
  return {
    hash: (c) => combineHash(combineHash(2, hashT.hash(c[0])), hashU.hash(c[1])),
  };
}
