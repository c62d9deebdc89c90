import type { VariationPolicy } from "./config.js";
import { THRESHOLD_PLACEHOLDER } from "./queries.js";
import type { QuerySpec, VariedQuery } from "./types.js";

/**
 * Threshold substituted into the template for one iteration. Strictly increasing
 * in the iteration index, so no two iterations of a session share a query text
 * and neither engine can answer from a result or plan cache.
 */
export function thresholdFor(iterationIndex: number, policy: VariationPolicy): number {
  return policy.base + iterationIndex * policy.step;
}

export function varyQuery(
  spec: QuerySpec,
  iterationIndex: number,
  policy: VariationPolicy
): VariedQuery {
  const threshold = String(thresholdFor(iterationIndex, policy));
  return {
    queryText: spec.template.split(THRESHOLD_PLACEHOLDER).join(threshold),
    generationIndex: iterationIndex,
  };
}
