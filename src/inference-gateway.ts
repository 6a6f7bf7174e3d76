/**
 * InferenceGateway: the object-detection provider as the pipeline sees it.
 *
 * The provided adapter calls a hosted detection workflow over HTTP: the frame
 * is posted as base64 and the workflow's `model_predictions` block is read
 * back. Every failure is raised as an InferenceGatewayError so the dispatcher
 * can record a per-frame code without inspecting transport details.
 */

import { readFile } from "node:fs/promises";
import { InferenceGatewayError, describeError } from "./errors.js";
import type { FrameArtifact } from "./frame-artifacts.js";
import type { DetectionPoint, InferenceTarget, RawDetection } from "./types.js";

// ─── Interface ──────────────────────────────────────────────────────────────────

export interface InferenceGateway {
  infer(artifact: FrameArtifact): Promise<RawDetection[]>;
}

/** The slice of the Fetch API the HTTP adapter uses (injectable for tests). */
export type FetchFn = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string },
) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface WorkflowGatewayOptions {
  apiUrl: string;
  apiKey: string;
  target: InferenceTarget;
  fetchFn?: FetchFn;
  /** Read the artifact from disk instead of using the in-memory copy. Default: true. */
  readFromDisk?: boolean;
}

// ─── Response parsing ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function parsePoints(value: unknown): DetectionPoint[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const points: DetectionPoint[] = [];
  for (const point of value) {
    if (isRecord(point) && typeof point.x === "number" && typeof point.y === "number") {
      points.push({ x: point.x, y: point.y });
    }
  }
  return points;
}

function parseDetection(raw: unknown, position: number): RawDetection {
  if (!isRecord(raw)) {
    throw new InferenceGatewayError("INVALID_RESPONSE", `predictions[${position}] is not an object`);
  }
  if (typeof raw.class !== "string") {
    throw new InferenceGatewayError("INVALID_RESPONSE", `predictions[${position}]: missing or invalid 'class'`);
  }
  // A prediction without a confidence scores 0 and falls below any threshold.
  const confidence = raw.confidence === undefined ? 0 : raw.confidence;
  if (typeof confidence !== "number" || !Number.isFinite(confidence)) {
    throw new InferenceGatewayError("INVALID_RESPONSE", `predictions[${position}]: invalid 'confidence'`);
  }

  const detection: RawDetection = { class: raw.class, confidence };
  const classId = optionalNumber(raw.class_id);
  if (classId !== undefined) detection.classId = classId;
  if (typeof raw.detection_id === "string") detection.detectionId = raw.detection_id;
  const x = optionalNumber(raw.x);
  const y = optionalNumber(raw.y);
  const width = optionalNumber(raw.width);
  const height = optionalNumber(raw.height);
  if (x !== undefined) detection.x = x;
  if (y !== undefined) detection.y = y;
  if (width !== undefined) detection.width = width;
  if (height !== undefined) detection.height = height;
  const points = parsePoints(raw.points);
  if (points) detection.points = points;
  return detection;
}

/**
 * Extract detections from a workflow response. Accepts the HTTP shape
 * `{ outputs: [{ model_predictions: { predictions } }] }` as well as the bare
 * outputs array.
 */
export function parseWorkflowPredictions(body: unknown): RawDetection[] {
  const outputs = Array.isArray(body) ? body : isRecord(body) ? body.outputs : undefined;
  if (!Array.isArray(outputs) || outputs.length === 0) {
    throw new InferenceGatewayError("INVALID_RESPONSE", "Workflow response has no outputs");
  }
  const first: unknown = outputs[0];
  if (!isRecord(first) || !isRecord(first.model_predictions)) {
    throw new InferenceGatewayError("INVALID_RESPONSE", "Workflow output has no 'model_predictions'");
  }
  const predictions = first.model_predictions.predictions;
  if (!Array.isArray(predictions)) {
    throw new InferenceGatewayError("INVALID_RESPONSE", "Workflow output has no 'predictions' array");
  }
  return predictions.map((prediction: unknown, position) => parseDetection(prediction, position));
}

// ─── HTTP workflow adapter ──────────────────────────────────────────────────────

export class WorkflowInferenceGateway implements InferenceGateway {
  private readonly fetchFn: FetchFn;
  private readonly endpoint: string;

  constructor(private readonly options: WorkflowGatewayOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    const base = options.apiUrl.replace(/\/$/, "");
    const { workspaceName, workflowId } = options.target;
    this.endpoint = `${base}/${encodeURIComponent(workspaceName)}/workflows/${encodeURIComponent(workflowId)}`;
  }

  async infer(artifact: FrameArtifact): Promise<RawDetection[]> {
    const image = this.options.readFromDisk === false ? artifact.bytes : await readFile(artifact.path);
    const body = JSON.stringify({
      api_key: this.options.apiKey,
      inputs: { image: { type: "base64", value: image.toString("base64") } },
      use_cache: true,
    });

    let response: Awaited<ReturnType<FetchFn>>;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
      });
    } catch (err) {
      throw new InferenceGatewayError("GATEWAY_ERROR", `Inference request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new InferenceGatewayError(
        "GATEWAY_ERROR",
        `Inference request failed: ${response.status} ${text.slice(0, 200)}`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new InferenceGatewayError("INVALID_RESPONSE", `Inference response is not JSON: ${text.slice(0, 200)}`);
    }
    return parseWorkflowPredictions(parsed);
  }
}
