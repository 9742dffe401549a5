/**
 * Extraction failures
 *
 * `unwrap*`, `expect*`, `intoBoth`, `intoEither` and the strict `fromOpt2`
 * constructors are the only partial operations in the library. They throw an
 * `ExtractionError`; every one of them has an `*Or` / `*OrElse` sibling that
 * never throws.
 */

import { config } from "./config.js";
import { logger } from "./logging.js";
import { showUnknown } from "./typeclasses/show.js";

/**
 * The slot or shape that was requested but not present.
 */
export type Slot = "left" | "right" | "both" | "either";

export class ExtractionError extends Error {
  /** What the caller asked for. */
  readonly slot: Slot;

  constructor(slot: Slot, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.slot = slot;
  }
}

/**
 * Throw an ExtractionError with exactly `message`.
 */
export function fail(slot: Slot, message: string): never {
  const error = new ExtractionError(slot, message);
  logger.debug(`${slot} extraction failed: ${message}`);
  throw error;
}

/**
 * Throw an ExtractionError with a library message, followed by the
 * offending value when `errors.showValue` is on.
 */
export function failWith(slot: Slot, message: string, value: unknown): never {
  const full = config.getAll().errors.showValue ? `${message}: ${showUnknown(value)}` : message;
  return fail(slot, full);
}
