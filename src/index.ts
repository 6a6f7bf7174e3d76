#!/usr/bin/env node
// Rockfall Risk Pipeline - Entry point
// Wires up all pipeline dependencies from the environment and assesses the
// video given on the command line, printing the outcome as JSON.

import "dotenv/config";
import OpenAI from "openai";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { OpenAIAdvisorySummarizer, type OpenAIClient } from "./advisory-summary.js";
import { loadConfigFromEnv, type Env } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { TempFileArtifactStore } from "./frame-artifacts.js";
import { WorkflowInferenceGateway } from "./inference-gateway.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import { toPredictionRecord } from "./prediction-aggregator.js";
import { PredictionPersistence } from "./prediction-persistence.js";
import { RiskPipeline } from "./risk-pipeline.js";
import type { PipelineConfig } from "./types.js";
import { openVideoSource } from "./video-source.js";

export const APP_NAME = "Rockfall Risk Pipeline";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.error(`[INIT] [${ts()}] ${msg}`);

// ─── Wiring ─────────────────────────────────────────────────────────────────────

export function buildPipeline(config: PipelineConfig, logger: PipelineLogger = defaultLogger): RiskPipeline {
  if (!config.inferenceApiKey) {
    throw new ConfigError("INFERENCE_API_KEY", "is not set. Add it to your .env file.");
  }
  if (!config.inferenceTarget.workspaceName) {
    throw new ConfigError("INFERENCE_WORKSPACE", "is not set. Add it to your .env file.");
  }
  if (!config.inferenceTarget.workflowId) {
    throw new ConfigError("INFERENCE_WORKFLOW_ID", "is not set. Add it to your .env file.");
  }

  const gateway = new WorkflowInferenceGateway({
    apiUrl: config.inferenceApiUrl,
    apiKey: config.inferenceApiKey,
    target: config.inferenceTarget,
  });

  let summarizer: OpenAIAdvisorySummarizer | null = null;
  if (config.openaiApiKey) {
    const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
    summarizer = new OpenAIAdvisorySummarizer(openaiClient as unknown as OpenAIClient, config.summaryModel);
  } else {
    logger.warn("OPENAI_API_KEY is not set; advisory summaries are disabled");
  }

  return new RiskPipeline(
    {
      openVideo: (input) =>
        openVideoSource(input, { ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
      gateway,
      artifacts: new TempFileArtifactStore(join(tmpdir(), "rockfall-frames")),
      summarizer,
      persistence: config.outputDir ? new PredictionPersistence(config.outputDir) : null,
      logger,
    },
    {
      sampleIntervalSeconds: config.sampleIntervalSeconds,
      confidenceThreshold: config.confidenceThreshold,
      workerPoolSize: config.workerPoolSize,
    },
  );
}

// ─── CLI ────────────────────────────────────────────────────────────────────────

/** Returns the process exit code: 0 on a verdict, 1 on a failed run, 2 on bad usage or config. */
export async function main(args: string[], env: Env = process.env): Promise<number> {
  const videoPath = args[0];
  if (!videoPath) {
    console.error("Usage: rockfall-risk <video-file>");
    return 2;
  }

  let pipeline: RiskPipeline;
  try {
    const config = loadConfigFromEnv(env);
    logInit(
      `Sampling every ${config.sampleIntervalSeconds}s, threshold ${config.confidenceThreshold}, ${config.workerPoolSize} workers`,
    );
    pipeline = buildPipeline(config);
  } catch (err) {
    console.error(`[FATAL] [${ts()}] ${describeError(err)}`);
    return 2;
  }

  logInit(`${APP_NAME} v${APP_VERSION} assessing ${videoPath}`);
  const outcome = await pipeline.assess({ kind: "path", path: videoPath });
  const report = outcome.success
    ? {
        success: true,
        runId: outcome.runId,
        analysis: outcome.analysis,
        predictions: toPredictionRecord(outcome.predictions),
        frameFailures: outcome.predictions.failures,
      }
    : outcome;
  console.log(JSON.stringify(report, null, 2));
  return outcome.success ? 0 : 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`[FATAL] [${ts()}] ${describeError(err)}`);
      process.exitCode = 1;
    },
  );
}
