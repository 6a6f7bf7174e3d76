// Rockfall Risk Pipeline - Error types
//
// Fatal faults (video, config) are thrown and converted to a structured
// PipelineOutcome at the pipeline boundary. Per-frame faults never leave the
// dispatcher as exceptions; they become FrameFailure records.

import type { FrameFailureCode } from "./types.js";

/** The video could not be opened, inspected or decoded. */
export class VideoSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VideoSourceError";
  }
}

/** A single inference call failed or returned something unusable. */
export class InferenceGatewayError extends Error {
  readonly code: Extract<FrameFailureCode, "GATEWAY_ERROR" | "INVALID_RESPONSE">;

  constructor(
    code: InferenceGatewayError["code"],
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "InferenceGatewayError";
    this.code = code;
  }
}

/** An environment variable holds a value the pipeline cannot use. */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
