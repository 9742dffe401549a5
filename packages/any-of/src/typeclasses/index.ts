/**
 * Typeclasses Index
 */

export * from "./eq.js";
export * from "./show.js";
export * from "./hash.js";
export * from "./default.js";
