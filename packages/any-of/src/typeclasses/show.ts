/**
 * Show Typeclass
 *
 * Converts values to a "programmer-friendly" string, often valid code that
 * could recreate the value. `toString()` on the data types goes through
 * `showUnknown`; pass explicit instances to `showAnyOf` & co. for full
 * control over the payload rendering.
 */

// ============================================================================
// Show
// ============================================================================

export interface Show<A> {
  readonly show: (a: A) => string;
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

export const showNumber: Show<number> = {
  show: (n) => String(n),
};

export const showBoolean: Show<boolean> = {
  show: (b) => String(b),
};

export const showBigInt: Show<bigint> = {
  show: (n) => `${n}n`,
};

export function showArray<A>(S: Show<A>): Show<ReadonlyArray<A>> {
  return {
    show: (as) => `[${as.map(S.show).join(", ")}]`,
  };
}

// ============================================================================
// Fallback rendering
// ============================================================================

function hasOwnToString(value: object): boolean {
  return typeof value.toString === "function" && value.toString !== Object.prototype.toString;
}

/**
 * Render any value for debugging
 */
export function showUnknown(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "symbol":
      return value.toString();
    case "function":
      return `[Function ${value.name || "anonymous"}]`;
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return `[${value.map(showUnknown).join(", ")}]`;
      if (hasOwnToString(value)) return String(value);
      return `{ ${Object.entries(value)
        .map(([k, v]) => `${k}: ${showUnknown(v)}`)
        .join(", ")} }`;
    default:
      return String(value);
  }
}

export const showAny: Show<unknown> = {
  show: showUnknown,
};
