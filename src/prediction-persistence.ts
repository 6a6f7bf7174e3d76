// Rockfall Risk Pipeline - Prediction Persistence
// Opt-in saving of one run's predictions and verdict to disk.
//
// Output directory structure:
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{runId}/
//     predictions.json   frame_<i> → [{ class, confidence }], in frame order
//     analysis.json      final verdict plus per-frame failures

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { toPredictionRecord } from "./prediction-aggregator.js";
import type { PipelineSuccess } from "./types.js";

/**
 * Generates the output directory name for a run.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{runId}` (UTC).
 */
export function buildDirectoryName(runId: string, date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  const hours = String(date.getUTCHours()).padStart(2, "0");
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  const seconds = String(date.getUTCSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${runId}`;
}

/** predictions.json content: 4-space indented, keys in frame order. */
export function formatPredictions(outcome: PipelineSuccess): string {
  return JSON.stringify(toPredictionRecord(outcome.predictions), null, 4);
}

export function formatAnalysis(outcome: PipelineSuccess): string {
  return JSON.stringify(
    {
      runId: outcome.runId,
      sampledFrameCount: outcome.sampledFrameCount,
      analysis: outcome.analysis,
      frameFailures: outcome.predictions.failures,
    },
    null,
    2,
  );
}

export class PredictionPersistence {
  constructor(
    private readonly baseDir: string = "output",
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** @returns The file paths that were written. */
  async save(outcome: PipelineSuccess): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(outcome.runId, this.now()));
    await mkdir(dirPath, { recursive: true });

    const predictionsPath = join(dirPath, "predictions.json");
    await writeFile(predictionsPath, formatPredictions(outcome), "utf-8");

    const analysisPath = join(dirPath, "analysis.json");
    await writeFile(analysisPath, formatAnalysis(outcome), "utf-8");

    return [predictionsPath, analysisPath];
  }
}
