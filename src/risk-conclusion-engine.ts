/**
 * RiskConclusionEngine: deterministic decision table that turns a seed
 * Analysis into the final safety verdict.
 *
 * Order of evaluation:
 *  1. riskLevel is recomputed from the calibrated confidence.
 *  2. trajectory is filled from confidence only when it is "Unknown".
 *  3. rockSize is filled the same way.
 *  4. recommendations are rebuilt from the risk tier and the filled fields.
 *
 * The engine never overrides a known trajectory or rock size, so running it
 * on its own output returns an equal Analysis.
 */

import type { Analysis, RiskLevel, RockSize, Trajectory } from "./types.js";

// ─── Recommendation texts ───────────────────────────────────────────────────────

export const RECOMMENDATIONS = {
  continueMonitoring: "Continue monitoring",
  scheduleInspection: "Schedule inspection",
  immediateInspection: "Immediate inspection",
  evacuate: "Evacuate personnel if necessary",
  reinforceSupports: "Reinforce support structures",
} as const;

// ─── Individual rules ───────────────────────────────────────────────────────────

export function riskLevelFor(confidence: number): RiskLevel {
  if (confidence <= 40) return "Low";
  if (confidence <= 60) return "Medium";
  if (confidence <= 75) return "High";
  return "VeryHigh";
}

export function fillTrajectory(trajectory: Trajectory, confidence: number): Trajectory {
  if (trajectory !== "Unknown") return trajectory;
  if (confidence > 70) return "Unstable";
  if (confidence > 50) return "Moderate";
  return "Stable";
}

export function fillRockSize(rockSize: RockSize, confidence: number): RockSize {
  if (rockSize !== "Unknown") return rockSize;
  if (confidence > 75) return "Large";
  if (confidence > 50) return "Medium";
  return "Small";
}

export function recommendationsFor(
  riskLevel: RiskLevel,
  rockSize: RockSize,
  trajectory: Trajectory,
): string[] {
  const recommendations: string[] = [];

  if (riskLevel === "Low" || riskLevel === "Medium") {
    recommendations.push(RECOMMENDATIONS.continueMonitoring);
    if (rockSize === "Medium" || rockSize === "Large") {
      recommendations.push(RECOMMENDATIONS.scheduleInspection);
    }
  } else {
    recommendations.push(RECOMMENDATIONS.immediateInspection);
    recommendations.push(RECOMMENDATIONS.evacuate);
    if (trajectory === "Unstable") {
      recommendations.push(RECOMMENDATIONS.reinforceSupports);
    }
  }

  return dedupe(recommendations);
}

/** Drop repeated entries, keeping the first occurrence of each. */
export function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)];
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export function concludeRisk(seed: Analysis): Analysis {
  const { confidence } = seed;
  const riskLevel = riskLevelFor(confidence);
  const trajectory = fillTrajectory(seed.trajectory, confidence);
  const rockSize = fillRockSize(seed.rockSize, confidence);

  return {
    riskLevel,
    confidence,
    rockSize,
    trajectory,
    recommendations: recommendationsFor(riskLevel, rockSize, trajectory),
  };
}
