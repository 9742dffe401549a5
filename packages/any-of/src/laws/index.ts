/**
 * Laws Index
 *
 * @module
 */

export * from "./types.js";
export * from "./left-or-right.js";
export * from "./mappable.js";
export * from "./swap.js";
export * from "./any-of.js";
