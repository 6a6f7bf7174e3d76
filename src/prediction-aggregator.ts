/**
 * PredictionAggregator: collects per-frame task results, in whatever order
 * they complete, into a PredictionSet keyed by frame index.
 *
 * Each task writes only its own index, so results never contend. The set is
 * published only once every index in [0, expectedCount) has been written,
 * which keeps the key range contiguous regardless of completion order.
 */

import type {
  Detection,
  FrameFailure,
  FramePredictions,
  FrameTaskResult,
  PredictionSet,
  RawDetection,
} from "./types.js";

/** Keep what downstream consumers read; geometry and ids are dropped. */
function toDetection(frameIndex: number, raw: RawDetection): Detection {
  return { frameIndex, class: raw.class, confidence: raw.confidence };
}

export class PredictionAggregator {
  private readonly slots = new Map<number, FramePredictions>();
  private readonly failures = new Map<number, FrameFailure>();

  constructor(private readonly threshold: number) {
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`Confidence threshold must be between 0 and 1, got ${threshold}`);
    }
  }

  /** Record one task result. Each frame index may be recorded once. */
  record(result: FrameTaskResult): void {
    const { frameIndex } = result;
    if (!Number.isInteger(frameIndex) || frameIndex < 0) {
      throw new RangeError(`Invalid frame index ${frameIndex}`);
    }
    if (this.slots.has(frameIndex)) {
      throw new Error(`Frame ${frameIndex} was already recorded`);
    }

    if (result.status === "failed") {
      this.failures.set(frameIndex, result.failure);
      this.slots.set(frameIndex, { frameIndex, detections: [] });
      return;
    }

    const detections = result.detections
      .filter((raw) => raw.confidence >= this.threshold)
      .map((raw) => toDetection(frameIndex, raw));
    this.slots.set(frameIndex, { frameIndex, detections });
  }

  /** Number of frames recorded so far. */
  get size(): number {
    return this.slots.size;
  }

  /**
   * Freeze and return the set. Throws if any index below `expectedCount` is
   * missing or if results were recorded beyond it.
   */
  publish(expectedCount: number): PredictionSet {
    if (this.slots.size !== expectedCount) {
      throw new Error(`Expected ${expectedCount} frame results, have ${this.slots.size}`);
    }

    const frames: FramePredictions[] = [];
    const failures: FrameFailure[] = [];
    for (let index = 0; index < expectedCount; index++) {
      const slot = this.slots.get(index);
      if (!slot) {
        throw new Error(`Frame ${index} has no result`);
      }
      frames.push(Object.freeze({ frameIndex: index, detections: Object.freeze([...slot.detections]) }));
      const failure = this.failures.get(index);
      if (failure) failures.push(Object.freeze({ ...failure }));
    }

    return Object.freeze({ frames: Object.freeze(frames), failures: Object.freeze(failures) });
  }
}

// ─── Views over a published set ─────────────────────────────────────────────────

/** Highest raw confidence across every retained detection, or 0 when there are none. */
export function highestConfidence(set: PredictionSet): number {
  let highest = 0;
  for (const frame of set.frames) {
    for (const detection of frame.detections) {
      if (detection.confidence > highest) highest = detection.confidence;
    }
  }
  return highest;
}

export type PredictionRecord = Record<string, Array<{ class: string; confidence: number }>>;

/** Render as `{ "frame_0": [...], "frame_1": [...] }` in frame order. */
export function toPredictionRecord(set: PredictionSet): PredictionRecord {
  const record: PredictionRecord = {};
  for (const frame of set.frames) {
    record[`frame_${frame.frameIndex}`] = frame.detections.map(({ class: label, confidence }) => ({
      class: label,
      confidence,
    }));
  }
  return record;
}
