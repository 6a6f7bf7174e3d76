/**
 * Unit tests for prediction-aggregator.ts
 */

import { describe, it, expect } from "vitest";
import { PredictionAggregator, highestConfidence, toPredictionRecord } from "./prediction-aggregator.js";
import type { FrameTaskResult, RawDetection } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function ok(frameIndex: number, detections: RawDetection[]): FrameTaskResult {
  return { status: "ok", frameIndex, detections };
}

function failed(frameIndex: number, message = "upstream 503"): FrameTaskResult {
  return { status: "failed", frameIndex, failure: { frameIndex, code: "GATEWAY_ERROR", message } };
}

// ─── Recording ──────────────────────────────────────────────────────────────────

describe("PredictionAggregator", () => {
  describe("threshold filtering", () => {
    it("keeps detections at or above the threshold", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(
        ok(0, [
          { class: "rock", confidence: 0.39 },
          { class: "rock", confidence: 0.4 },
          { class: "crack", confidence: 0.72 },
        ]),
      );

      const set = aggregator.publish(1);

      expect(set.frames[0].detections).toEqual([
        { frameIndex: 0, class: "rock", confidence: 0.4 },
        { frameIndex: 0, class: "crack", confidence: 0.72 },
      ]);
    });

    it("drops geometry and provider ids", () => {
      const aggregator = new PredictionAggregator(0);
      aggregator.record(
        ok(0, [{ class: "rock", confidence: 0.5, classId: 3, detectionId: "d-1", x: 10, y: 20, width: 5, height: 6 }]),
      );

      expect(aggregator.publish(1).frames[0].detections).toEqual([{ frameIndex: 0, class: "rock", confidence: 0.5 }]);
    });

    it("keeps every detection with a threshold of 0 and none below 1 with a threshold of 1", () => {
      const detections = [
        { class: "rock", confidence: 0 },
        { class: "rock", confidence: 0.99 },
        { class: "rock", confidence: 1 },
      ];
      const open = new PredictionAggregator(0);
      open.record(ok(0, detections));
      const strict = new PredictionAggregator(1);
      strict.record(ok(0, detections));

      expect(open.publish(1).frames[0].detections).toHaveLength(3);
      expect(strict.publish(1).frames[0].detections).toEqual([{ frameIndex: 0, class: "rock", confidence: 1 }]);
    });

    it("rejects a threshold outside [0, 1]", () => {
      expect(() => new PredictionAggregator(-0.1)).toThrow(RangeError);
      expect(() => new PredictionAggregator(1.5)).toThrow(RangeError);
      expect(() => new PredictionAggregator(Number.NaN)).toThrow(RangeError);
    });
  });

  describe("ordering", () => {
    it("publishes frames by index whatever the completion order", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(2, [{ class: "rock", confidence: 0.5 }]));
      aggregator.record(ok(0, []));
      aggregator.record(ok(1, [{ class: "rock", confidence: 0.9 }]));

      const set = aggregator.publish(3);

      expect(set.frames.map((f) => f.frameIndex)).toEqual([0, 1, 2]);
      expect(set.frames[1].detections[0].confidence).toBe(0.9);
    });
  });

  describe("failures", () => {
    it("records a failed frame as empty with a failure entry", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(0, [{ class: "rock", confidence: 0.8 }]));
      aggregator.record(failed(1));

      const set = aggregator.publish(2);

      expect(set.frames[1]).toEqual({ frameIndex: 1, detections: [] });
      expect(set.failures).toEqual([{ frameIndex: 1, code: "GATEWAY_ERROR", message: "upstream 503" }]);
    });

    it("lists failures in frame order", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(failed(3, "c"));
      aggregator.record(ok(0, []));
      aggregator.record(failed(1, "a"));
      aggregator.record(ok(2, []));

      expect(aggregator.publish(4).failures.map((f) => f.frameIndex)).toEqual([1, 3]);
    });
  });

  describe("completeness", () => {
    it("refuses to record the same frame twice", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(0, []));
      expect(() => aggregator.record(ok(0, []))).toThrow("Frame 0 was already recorded");
    });

    it("refuses a negative or fractional index", () => {
      const aggregator = new PredictionAggregator(0.4);
      expect(() => aggregator.record(ok(-1, []))).toThrow(RangeError);
      expect(() => aggregator.record(ok(1.5, []))).toThrow(RangeError);
    });

    it("refuses to publish with a missing index", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(0, []));
      aggregator.record(ok(2, []));
      expect(() => aggregator.publish(2)).toThrow("Frame 1 has no result");
    });

    it("refuses to publish with the wrong count", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(0, []));
      expect(() => aggregator.publish(2)).toThrow("Expected 2 frame results, have 1");
    });

    it("publishes an empty set for zero frames", () => {
      expect(new PredictionAggregator(0.4).publish(0)).toEqual({ frames: [], failures: [] });
    });

    it("tracks how many frames have been recorded", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(1, []));
      aggregator.record(failed(0));
      expect(aggregator.size).toBe(2);
    });

    it("publishes a frozen set", () => {
      const aggregator = new PredictionAggregator(0.4);
      aggregator.record(ok(0, [{ class: "rock", confidence: 0.5 }]));
      const set = aggregator.publish(1);

      expect(Object.isFrozen(set)).toBe(true);
      expect(Object.isFrozen(set.frames)).toBe(true);
      expect(Object.isFrozen(set.frames[0].detections)).toBe(true);
    });
  });
});

// ─── Views ──────────────────────────────────────────────────────────────────────

describe("highestConfidence", () => {
  it("returns the largest retained raw confidence", () => {
    const aggregator = new PredictionAggregator(0.4);
    aggregator.record(ok(0, [{ class: "rock", confidence: 0.45 }]));
    aggregator.record(ok(1, [{ class: "rock", confidence: 0.8 }, { class: "crack", confidence: 0.6 }]));
    aggregator.record(ok(2, [{ class: "rock", confidence: 0.3 }]));

    expect(highestConfidence(aggregator.publish(3))).toBe(0.8);
  });

  it("returns 0 when nothing was retained", () => {
    const aggregator = new PredictionAggregator(0.4);
    aggregator.record(ok(0, [{ class: "rock", confidence: 0.1 }]));
    aggregator.record(failed(1));

    expect(highestConfidence(aggregator.publish(2))).toBe(0);
  });
});

describe("toPredictionRecord", () => {
  it("keys detections by frame in frame order", () => {
    const aggregator = new PredictionAggregator(0.4);
    aggregator.record(ok(1, []));
    aggregator.record(ok(0, [{ class: "rock", confidence: 0.55, x: 1 }]));

    const record = toPredictionRecord(aggregator.publish(2));

    expect(Object.keys(record)).toEqual(["frame_0", "frame_1"]);
    expect(record).toEqual({ frame_0: [{ class: "rock", confidence: 0.55 }], frame_1: [] });
  });
});
