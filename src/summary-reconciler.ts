/**
 * SummaryReconciler: combines the advisory summary with the authoritative
 * detection confidence and hands the result to the rule engine.
 *
 * Only the advisory's qualitative hints (rock size, trajectory) can survive;
 * its confidence and risk level are always recomputed.
 */

import { normalizeConfidence } from "./confidence-normalizer.js";
import { concludeRisk } from "./risk-conclusion-engine.js";
import type { AdvisorySummary, Analysis } from "./types.js";

/** Seed used when no usable advisory exists: every qualitative field unknown. */
export function defaultSeed(confidence: number): Analysis {
  return {
    riskLevel: "Low",
    confidence,
    rockSize: "Unknown",
    trajectory: "Unknown",
    recommendations: [],
  };
}

export function reconcileSummary(advisory: AdvisorySummary, highestRawConfidence: number): Analysis {
  const confidence = normalizeConfidence(highestRawConfidence);
  const seed = defaultSeed(confidence);

  if (advisory.kind === "parsed") {
    const { fields } = advisory;
    if (fields.rockSize) seed.rockSize = fields.rockSize;
    if (fields.trajectory) seed.trajectory = fields.trajectory;
  }

  return concludeRisk(seed);
}
