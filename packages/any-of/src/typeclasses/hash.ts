/**
 * Hash Typeclass
 *
 * Simple hash functions (not cryptographic, just for hash tables).
 * Law: eqv(x, y) => hash(x) === hash(y) for the matching Eq instance.
 */

export interface Hash<A> {
  readonly hash: (a: A) => number;
}

/**
 * Fold one more hash into an accumulator (djb2 step, unsigned 32-bit)
 */
export function combineHash(acc: number, next: number): number {
  return (((acc << 5) + acc) ^ next) >>> 0;
}

// ============================================================================
// Common Instances
// ============================================================================

export const hashString: Hash<string> = {
  hash: (a) => {
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
      return a >>> 0;
    }
    return hashString.hash(String(a));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (a) => (a ? 1 : 0),
};

export const hashBigInt: Hash<bigint> = {
  hash: (a) => hashString.hash(a.toString()),
};

export function hashArray<A>(H: Hash<A>): Hash<ReadonlyArray<A>> {
  return {
    hash: (as) => as.reduce((acc, a) => combineHash(acc, H.hash(a)), as.length >>> 0),
  };
}
