/**
 * Default Typeclass
 *
 * The zero value of a type, used by `leftOrDefault` / `rightOrDefault`.
 * `empty` is a thunk so that mutable defaults (arrays) are fresh per call.
 */

export interface Default<A> {
  readonly empty: () => A;
}

export const defaultNumber: Default<number> = {
  empty: () => 0,
};

export const defaultString: Default<string> = {
  empty: () => "",
};

export const defaultBoolean: Default<boolean> = {
  empty: () => false,
};

export const defaultBigInt: Default<bigint> = {
  empty: () => 0n,
};

export function defaultArray<A>(): Default<A[]> {
  return {
    empty: () => [],
  };
}

/**
 * Lift a constant into a Default instance
 */
export function defaultOf<A>(value: A): Default<A> {
  return {
    empty: () => value,
  };
}
