// Rockfall Risk Pipeline - Configuration
// Defaults match the values the monitoring deployment has run with; every
// field can be overridden from the environment.

import { ConfigError } from "./errors.js";
import type { PipelineConfig } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  sampleIntervalSeconds: 2,
  confidenceThreshold: 0.4,
  workerPoolSize: 4,
  inferenceApiUrl: "https://serverless.roboflow.com",
  inferenceApiKey: null,
  inferenceTarget: {
    workspaceName: "",
    workflowId: "",
  },
  openaiApiKey: null,
  summaryModel: "gpt-4o-mini",
  ffmpegPath: "ffmpeg",
  ffprobePath: "ffprobe",
  outputDir: null,
};

export type Env = Record<string, string | undefined>;

// ─── Parsing helpers ────────────────────────────────────────────────────────────

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

/**
 * Build a PipelineConfig from environment variables, falling back to
 * DEFAULT_PIPELINE_CONFIG for anything unset or blank.
 * Throws ConfigError for values that are present but out of range.
 */
export function loadConfigFromEnv(env: Env = process.env): PipelineConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;

  const sampleIntervalSeconds = readNumber(env, "SAMPLE_INTERVAL_SECONDS") ?? defaults.sampleIntervalSeconds;
  if (sampleIntervalSeconds <= 0) {
    throw new ConfigError("SAMPLE_INTERVAL_SECONDS", "must be greater than 0");
  }

  const confidenceThreshold = readNumber(env, "CONFIDENCE_THRESHOLD") ?? defaults.confidenceThreshold;
  if (confidenceThreshold < 0 || confidenceThreshold > 1) {
    throw new ConfigError("CONFIDENCE_THRESHOLD", "must be between 0 and 1");
  }

  const workerPoolSize = readNumber(env, "WORKER_POOL_SIZE") ?? defaults.workerPoolSize;
  if (!Number.isInteger(workerPoolSize) || workerPoolSize < 1) {
    throw new ConfigError("WORKER_POOL_SIZE", "must be a positive integer");
  }

  return {
    sampleIntervalSeconds,
    confidenceThreshold,
    workerPoolSize,
    inferenceApiUrl: readString(env, "INFERENCE_API_URL") ?? defaults.inferenceApiUrl,
    inferenceApiKey: readString(env, "INFERENCE_API_KEY") ?? defaults.inferenceApiKey,
    inferenceTarget: {
      workspaceName: readString(env, "INFERENCE_WORKSPACE") ?? defaults.inferenceTarget.workspaceName,
      workflowId: readString(env, "INFERENCE_WORKFLOW_ID") ?? defaults.inferenceTarget.workflowId,
    },
    openaiApiKey: readString(env, "OPENAI_API_KEY") ?? defaults.openaiApiKey,
    summaryModel: readString(env, "SUMMARY_MODEL") ?? defaults.summaryModel,
    ffmpegPath: readString(env, "FFMPEG_PATH") ?? defaults.ffmpegPath,
    ffprobePath: readString(env, "FFPROBE_PATH") ?? defaults.ffprobePath,
    outputDir: readString(env, "OUTPUT_DIR") ?? defaults.outputDir,
  };
}
