// Rockfall Risk Pipeline - Shared TypeScript interfaces and types

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** One sampled frame handed to the dispatcher. Not retained after inference. */
export interface Frame {
  index: number;
  sampleTimeSeconds: number;
  pixels: Buffer; // JPEG bytes
}

// ─── Detections ─────────────────────────────────────────────────────────────────

export interface DetectionPoint {
  x: number;
  y: number;
}

/** A detection exactly as the inference provider reports it. */
export interface RawDetection {
  class: string;
  confidence: number;
  classId?: number;
  detectionId?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  points?: DetectionPoint[];
}

/** A detection that survived the confidence threshold, geometry removed. */
export interface Detection {
  frameIndex: number;
  class: string;
  confidence: number;
}

// ─── Per-frame task results ─────────────────────────────────────────────────────

export type FrameFailureCode = "GATEWAY_ERROR" | "INVALID_RESPONSE" | "ARTIFACT_ERROR";

export interface FrameFailure {
  frameIndex: number;
  code: FrameFailureCode;
  message: string;
}

export type FrameTaskResult =
  | { status: "ok"; frameIndex: number; detections: RawDetection[] }
  | { status: "failed"; frameIndex: number; failure: FrameFailure };

// ─── Prediction set ─────────────────────────────────────────────────────────────

export interface FramePredictions {
  frameIndex: number;
  detections: readonly Detection[];
}

/**
 * Published, frozen result of one batch. `frames[i].frameIndex === i` for every i.
 * A failed frame appears with no detections and a matching entry in `failures`.
 */
export interface PredictionSet {
  readonly frames: readonly FramePredictions[];
  readonly failures: readonly FrameFailure[];
}

// ─── Analysis ───────────────────────────────────────────────────────────────────

export type RiskLevel = "Low" | "Medium" | "High" | "VeryHigh";
export type RockSize = "Small" | "Medium" | "Large" | "Unknown";
export type Trajectory = "Stable" | "Moderate" | "Unstable" | "Unknown";

export const RISK_LEVELS: readonly RiskLevel[] = ["Low", "Medium", "High", "VeryHigh"];
export const ROCK_SIZES: readonly RockSize[] = ["Small", "Medium", "Large", "Unknown"];
export const TRAJECTORIES: readonly Trajectory[] = ["Stable", "Moderate", "Unstable", "Unknown"];

export interface Analysis {
  riskLevel: RiskLevel;
  confidence: number; // calibrated, integer 0-100
  rockSize: RockSize;
  trajectory: Trajectory;
  recommendations: string[];
}

// ─── Advisory summary ───────────────────────────────────────────────────────────

/** Fields an advisory summary may carry. Anything unrecognized is absent. */
export interface AdvisoryFields {
  riskLevel?: RiskLevel;
  confidence?: number;
  rockSize?: RockSize;
  trajectory?: Trajectory;
  recommendations?: string[];
}

export type AdvisorySummary =
  | { kind: "parsed"; fields: AdvisoryFields }
  | { kind: "unparsed"; reason: string };

// ─── Pipeline configuration ─────────────────────────────────────────────────────

export interface InferenceTarget {
  workspaceName: string;
  workflowId: string;
}

export interface PipelineConfig {
  /** Seconds between sampled frames. Default: 2. */
  sampleIntervalSeconds: number;
  /** Detections below this raw confidence are discarded. Range 0-1, default: 0.4. */
  confidenceThreshold: number;
  /** Maximum number of concurrent inference calls. Default: 4. */
  workerPoolSize: number;
  inferenceApiUrl: string;
  inferenceApiKey: string | null;
  inferenceTarget: InferenceTarget;
  openaiApiKey: string | null;
  summaryModel: string;
  ffmpegPath: string;
  ffprobePath: string;
  /** Directory for saved predictions and analysis. Null disables persistence. */
  outputDir: string | null;
}

// ─── Pipeline outcome ───────────────────────────────────────────────────────────

export type VideoInput =
  | { kind: "path"; path: string }
  | { kind: "bytes"; data: Buffer };

export type PipelineErrorCode = "VIDEO_UNAVAILABLE" | "PIPELINE_FAILED";

export interface PipelineError {
  code: PipelineErrorCode;
  message: string;
}

export interface PipelineSuccess {
  success: true;
  runId: string;
  sampledFrameCount: number;
  predictions: PredictionSet;
  analysis: Analysis;
  advisory: AdvisorySummary;
}

export interface PipelineFailure {
  success: false;
  runId: string;
  error: PipelineError;
}

export type PipelineOutcome = PipelineSuccess | PipelineFailure;
