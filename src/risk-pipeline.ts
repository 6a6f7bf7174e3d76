// Rockfall Risk Pipeline - Orchestrator
// Video → sampled frames → concurrent inference → aggregated predictions →
// advisory summary → calibrated verdict.
//
// assess() never throws. A video that cannot be opened or decoded, or any
// other fault that leaves no complete prediction set, is returned as a
// structured failure; per-frame inference faults and advisory faults are
// absorbed along the way.

import { v4 as uuidv4 } from "uuid";
import {
  formatPredictionsText,
  parseAdvisorySummary,
  type AdvisorySummarizer,
} from "./advisory-summary.js";
import { ConcurrentDispatcher } from "./concurrent-dispatcher.js";
import { VideoSourceError, describeError } from "./errors.js";
import type { FrameArtifactStore } from "./frame-artifacts.js";
import { FrameSampler } from "./frame-sampler.js";
import type { InferenceGateway } from "./inference-gateway.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import { PredictionAggregator, highestConfidence } from "./prediction-aggregator.js";
import type { PredictionPersistence } from "./prediction-persistence.js";
import { reconcileSummary } from "./summary-reconciler.js";
import type {
  AdvisorySummary,
  PipelineErrorCode,
  PipelineFailure,
  PipelineOutcome,
  PipelineSuccess,
  PredictionSet,
  VideoInput,
} from "./types.js";
import type { VideoSource } from "./video-source.js";

// ─── Dependencies ───────────────────────────────────────────────────────────────

export interface RiskPipelineDeps {
  openVideo: (input: VideoInput) => Promise<VideoSource>;
  gateway: InferenceGateway;
  artifacts: FrameArtifactStore;
  /** Optional advisory collaborator. Without one the default seed is used. */
  summarizer?: AdvisorySummarizer | null;
  /** Optional persistence. Without one nothing is written. */
  persistence?: PredictionPersistence | null;
  logger?: PipelineLogger;
  createRunId?: () => string;
}

export interface RiskPipelineOptions {
  sampleIntervalSeconds: number;
  confidenceThreshold: number;
  workerPoolSize: number;
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export class RiskPipeline {
  private readonly deps: RiskPipelineDeps;
  private readonly logger: PipelineLogger;
  private readonly createRunId: () => string;

  constructor(
    deps: RiskPipelineDeps,
    private readonly options: RiskPipelineOptions,
  ) {
    this.deps = deps;
    this.logger = deps.logger ?? defaultLogger;
    this.createRunId = deps.createRunId ?? (() => uuidv4());
  }

  async assess(input: VideoInput): Promise<PipelineOutcome> {
    const runId = this.createRunId();

    let source: VideoSource;
    try {
      source = await this.deps.openVideo(input);
    } catch (err) {
      return this.failure(runId, "VIDEO_UNAVAILABLE", err);
    }

    try {
      const predictions = await this.collectPredictions(source);
      const advisory = await this.requestAdvisory(predictions);
      const analysis = reconcileSummary(advisory, highestConfidence(predictions));

      const outcome: PipelineSuccess = {
        success: true,
        runId,
        sampledFrameCount: predictions.frames.length,
        predictions,
        analysis,
        advisory,
      };
      this.logger.info(
        `Run ${runId}: ${analysis.riskLevel} risk at ${analysis.confidence}% over ${outcome.sampledFrameCount} frames`,
      );

      await this.persist(outcome);
      return outcome;
    } catch (err) {
      return this.failure(runId, err instanceof VideoSourceError ? "VIDEO_UNAVAILABLE" : "PIPELINE_FAILED", err);
    } finally {
      await this.closeSource(source);
    }
  }

  // ── Stages ─────────────────────────────────────────────────────────────────

  private async collectPredictions(source: VideoSource): Promise<PredictionSet> {
    const sampler = new FrameSampler(this.options.sampleIntervalSeconds);
    const aggregator = new PredictionAggregator(this.options.confidenceThreshold);
    const dispatcher = new ConcurrentDispatcher(
      { gateway: this.deps.gateway, artifacts: this.deps.artifacts, logger: this.logger },
      this.options.workerPoolSize,
    );

    const summary = await dispatcher.run(sampler.sample(source), (result) => aggregator.record(result));
    if (summary.submitted === 0) {
      this.logger.warn("Video produced no frames");
    }
    return aggregator.publish(summary.submitted);
  }

  private async requestAdvisory(predictions: PredictionSet): Promise<AdvisorySummary> {
    const { summarizer } = this.deps;
    if (!summarizer) {
      return { kind: "unparsed", reason: "advisory summary disabled" };
    }

    try {
      const reply = await summarizer.summarize(formatPredictionsText(predictions));
      const advisory = parseAdvisorySummary(reply);
      if (advisory.kind === "unparsed") {
        this.logger.warn(`Advisory summary ignored: ${advisory.reason}`);
      }
      return advisory;
    } catch (err) {
      const reason = `advisory summary failed: ${describeError(err)}`;
      this.logger.warn(reason);
      return { kind: "unparsed", reason };
    }
  }

  private async persist(outcome: PipelineSuccess): Promise<void> {
    const { persistence } = this.deps;
    if (!persistence) return;
    try {
      const paths = await persistence.save(outcome);
      this.logger.info(`Saved ${paths.join(", ")}`);
    } catch (err) {
      this.logger.error(`Failed to save outputs for run ${outcome.runId}: ${describeError(err)}`);
    }
  }

  private async closeSource(source: VideoSource): Promise<void> {
    try {
      await source.close();
    } catch (err) {
      this.logger.warn(`Failed to close video source: ${describeError(err)}`);
    }
  }

  private failure(runId: string, code: PipelineErrorCode, err: unknown): PipelineFailure {
    const message = describeError(err);
    this.logger.error(`Run ${runId} failed (${code}): ${message}`);
    return { success: false, runId, error: { code, message } };
  }
}
