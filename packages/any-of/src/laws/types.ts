/**
 * Law Definition Types
 *
 * A law is a predicate every implementation of a capability must satisfy.
 * Law generators (`swapLaws`, `mappableLaws`, ...) build `LawSet`s from the
 * operations under test; `checkLaws` runs a set over sample inputs.
 *
 * @example
 * ```typescript
 * const laws = swapLaws(
 *   (x: AnyOf<number, string>) => x.swap(),
 *   (y: AnyOf<string, number>) => y.swap(),
 *   eqAnyOf(eqNumber, eqString)
 * );
 * checkLaws(laws, [[AnyOf.newLeft(1)], [AnyOf.newNeither()]]).failed; // 0
 * ```
 *
 * @module
 */

import { logger } from "../logging.js";
import { showUnknown } from "../typeclasses/show.js";

export interface Law<Args extends unknown[]> {
  /** Used in failure reports and test titles. */
  readonly name: string;
  readonly check: (...args: Args) => boolean;
  /** Number of leading sample arguments `check` reads. */
  readonly arity: number;
  /** Printed under the law when it is violated. */
  readonly description?: string;
}

export type LawSet<Args extends unknown[]> = readonly Law<Args>[];

export function defineLaw<Args extends unknown[]>(law: Law<Args>): Law<Args> {
  return law;
}

export function combineLaws<Args extends unknown[]>(...lawSets: LawSet<Args>[]): LawSet<Args> {
  return lawSets.flat();
}

// ============================================================================
// Checking
// ============================================================================

export type LawCheckResult =
  | { readonly status: "held"; readonly law: string; readonly samples: number }
  | {
      readonly status: "violated";
      readonly law: string;
      readonly counterexample: string;
      readonly description?: string;
    };

export interface LawCheckSummary {
  readonly total: number;
  readonly held: number;
  readonly failed: number;
  readonly results: readonly LawCheckResult[];
}

export function checkLaw<Args extends unknown[]>(
  law: Law<Args>,
  samples: readonly Args[]
): LawCheckResult {
  for (const args of samples) {
    if (args.length < law.arity) {
      throw new Error(
        `law "${law.name}" reads ${law.arity} arguments but a sample has ${args.length}`
      );
    }
    if (!law.check(...args)) {
      const counterexample = args.map(showUnknown).join(", ");
      logger.debug(`law "${law.name}" violated by (${counterexample})`);
      return { status: "violated", law: law.name, counterexample, description: law.description };
    }
  }
  return { status: "held", law: law.name, samples: samples.length };
}

export function checkLaws<Args extends unknown[]>(
  laws: LawSet<Args>,
  samples: readonly Args[]
): LawCheckSummary {
  const results = laws.map((law) => checkLaw(law, samples));
  const held = results.filter((r) => r.status === "held").length;
  return { total: results.length, held, failed: results.length - held, results };
}

export function formatLawCheckSummary(summary: LawCheckSummary): string {
  const lines = [`${summary.held}/${summary.total} laws held`];
  for (const result of summary.results) {
    if (result.status === "violated") {
      lines.push(`  ✗ ${result.law}: (${result.counterexample})`);
      if (result.description !== undefined) {
        lines.push(`    ${result.description}`);
      }
    }
  }
  return lines.join("\n");
}
