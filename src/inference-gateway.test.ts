/**
 * Unit tests for inference-gateway.ts
 */

import { describe, it, expect, vi } from "vitest";
import { InferenceGatewayError } from "./errors.js";
import type { FrameArtifact } from "./frame-artifacts.js";
import { WorkflowInferenceGateway, parseWorkflowPredictions, type FetchFn } from "./inference-gateway.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeArtifact(): FrameArtifact {
  return {
    frameIndex: 0,
    path: "memory://frame_0.jpg",
    bytes: Buffer.from("jpeg-bytes"),
    contentType: "image/jpeg",
  };
}

function respondWith(status: number, body: string) {
  return vi.fn<FetchFn>(async () => ({ ok: status >= 200 && status < 300, status, text: async () => body }));
}

function makeGateway(fetchFn: FetchFn): WorkflowInferenceGateway {
  return new WorkflowInferenceGateway({
    apiUrl: "https://inference.example.test/",
    apiKey: "test-secret",
    target: { workspaceName: "mine-site", workflowId: "rockfall detect" },
    fetchFn,
    readFromDisk: false,
  });
}

const WORKFLOW_BODY = JSON.stringify({
  outputs: [
    {
      model_predictions: {
        image: { width: 640, height: 480 },
        predictions: [
          { class: "rock", confidence: 0.8, class_id: 0, detection_id: "a1", x: 100, y: 120, width: 40, height: 30 },
          { class: "crack", confidence: 0.35, points: [{ x: 1, y: 2 }, { x: 3, y: 4 }] },
        ],
      },
    },
  ],
});

async function rejection(promise: Promise<unknown>): Promise<InferenceGatewayError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof InferenceGatewayError) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

// ─── Response parsing ───────────────────────────────────────────────────────────

describe("parseWorkflowPredictions", () => {
  it("reads detections and their geometry", () => {
    expect(parseWorkflowPredictions(JSON.parse(WORKFLOW_BODY))).toEqual([
      { class: "rock", confidence: 0.8, classId: 0, detectionId: "a1", x: 100, y: 120, width: 40, height: 30 },
      { class: "crack", confidence: 0.35, points: [{ x: 1, y: 2 }, { x: 3, y: 4 }] },
    ]);
  });

  it("accepts a bare outputs array", () => {
    const body = [{ model_predictions: { predictions: [{ class: "rock", confidence: 0.5 }] } }];
    expect(parseWorkflowPredictions(body)).toEqual([{ class: "rock", confidence: 0.5 }]);
  });

  it("scores a prediction without a confidence as 0", () => {
    const body = { outputs: [{ model_predictions: { predictions: [{ class: "rock" }] } }] };
    expect(parseWorkflowPredictions(body)).toEqual([{ class: "rock", confidence: 0 }]);
  });

  it("returns no detections for an empty predictions array", () => {
    expect(parseWorkflowPredictions({ outputs: [{ model_predictions: { predictions: [] } }] })).toEqual([]);
  });

  it("rejects responses without outputs or predictions", () => {
    expect(() => parseWorkflowPredictions({})).toThrow("Workflow response has no outputs");
    expect(() => parseWorkflowPredictions({ outputs: [{}] })).toThrow("Workflow output has no 'model_predictions'");
    expect(() => parseWorkflowPredictions({ outputs: [{ model_predictions: {} }] })).toThrow(
      "Workflow output has no 'predictions' array",
    );
  });

  it("rejects a prediction without a class or with a non-numeric confidence", () => {
    const noClass = { outputs: [{ model_predictions: { predictions: [{ confidence: 0.9 }] } }] };
    const badConfidence = { outputs: [{ model_predictions: { predictions: [{ class: "rock", confidence: "high" }] } }] };

    expect(() => parseWorkflowPredictions(noClass)).toThrow("predictions[0]: missing or invalid 'class'");
    expect(() => parseWorkflowPredictions(badConfidence)).toThrow("predictions[0]: invalid 'confidence'");
  });

  it("raises INVALID_RESPONSE", () => {
    try {
      parseWorkflowPredictions(null);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InferenceGatewayError);
      if (err instanceof InferenceGatewayError) expect(err.code).toBe("INVALID_RESPONSE");
    }
  });
});

// ─── HTTP adapter ───────────────────────────────────────────────────────────────

describe("WorkflowInferenceGateway", () => {
  it("posts the frame as base64 to the workflow endpoint", async () => {
    const fetchFn = respondWith(200, WORKFLOW_BODY);
    await makeGateway(fetchFn).infer(makeArtifact());

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://inference.example.test/mine-site/workflows/rockfall%20detect");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(init.body)).toEqual({
      api_key: "test-secret",
      inputs: { image: { type: "base64", value: Buffer.from("jpeg-bytes").toString("base64") } },
      use_cache: true,
    });
  });

  it("returns every detection, leaving thresholding to the caller", async () => {
    const detections = await makeGateway(respondWith(200, WORKFLOW_BODY)).infer(makeArtifact());
    expect(detections.map((d) => d.confidence)).toEqual([0.8, 0.35]);
  });

  it("raises GATEWAY_ERROR for a non-2xx status", async () => {
    const err = await rejection(makeGateway(respondWith(503, "Service Unavailable")).infer(makeArtifact()));
    expect(err.code).toBe("GATEWAY_ERROR");
    expect(err.message).toBe("Inference request failed: 503 Service Unavailable");
  });

  it("raises GATEWAY_ERROR when the request itself fails", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new Error("ECONNRESET");
    });
    const err = await rejection(makeGateway(fetchFn).infer(makeArtifact()));
    expect(err.code).toBe("GATEWAY_ERROR");
    expect(err.message).toBe("Inference request failed: ECONNRESET");
  });

  it("raises INVALID_RESPONSE for a body that is not JSON", async () => {
    const err = await rejection(makeGateway(respondWith(200, "<html>")).infer(makeArtifact()));
    expect(err.code).toBe("INVALID_RESPONSE");
    expect(err.message).toBe("Inference response is not JSON: <html>");
  });

  it("raises INVALID_RESPONSE for JSON of the wrong shape", async () => {
    const err = await rejection(makeGateway(respondWith(200, '{"outputs":[]}')).infer(makeArtifact()));
    expect(err.code).toBe("INVALID_RESPONSE");
  });
});
