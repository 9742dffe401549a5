/**
 * Eq Typeclass
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Not equal
 */
export function neqv<A>(E: Eq<A>): (x: A, y: A) => boolean {
  return (x, y) => !E.eqv(x, y);
}

/**
 * Build an Eq by comparing a projection of the values
 */
export function contramap<A, B>(E: Eq<A>, f: (b: B) => A): Eq<B> {
  return {
    eqv: (x, y) => E.eqv(f(x), f(y)),
  };
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Reference / SameValue equality
 */
export function eqStrict<A>(): Eq<A> {
  return {
    eqv: (x, y) => Object.is(x, y),
  };
}

export const eqNumber: Eq<number> = {
  eqv: (x, y) => x === y || (Number.isNaN(x) && Number.isNaN(y)),
};

export const eqString: Eq<string> = {
  eqv: (x, y) => x === y,
};

export const eqBoolean: Eq<boolean> = {
  eqv: (x, y) => x === y,
};

export const eqBigInt: Eq<bigint> = {
  eqv: (x, y) => x === y,
};

export function eqArray<A>(E: Eq<A>): Eq<ReadonlyArray<A>> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

// ============================================================================
// Structural equality for unknown payloads
// ============================================================================

interface HasEquals {
  equals(other: unknown): boolean;
}

function hasEquals(value: unknown): value is HasEquals {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Default equality used by the `equals` methods of the data types:
 * SameValue for primitives, element-wise for arrays, and a value's own
 * `equals` method when it has one (so nested AnyOf / EitherOf / BothOf
 * compare structurally).
 */
export function structuralEquals(x: unknown, y: unknown): boolean {
  if (Object.is(x, y)) return true;
  if (Array.isArray(x) && Array.isArray(y)) {
    return x.length === y.length && x.every((v, i) => structuralEquals(v, y[i]));
  }
  if (hasEquals(x)) return x.equals(y);
  return false;
}

export const eqStructural: Eq<unknown> = {
  eqv: structuralEquals,
};
