/**
 * ConcurrentDispatcher: runs sampled frames through the inference gateway
 * with at most `poolSize` calls in flight.
 *
 * Each worker pulls the next frame from the shared (lazy) frame sequence, so
 * decoding only advances as workers free up. A task never rejects: a failed
 * inference or artifact step becomes a `failed` FrameTaskResult and the
 * remaining tasks carry on. run() resolves once every pulled frame has been
 * handed to `onResult`.
 */

import { InferenceGatewayError, describeError } from "./errors.js";
import { withFrameArtifact, type FrameArtifactStore } from "./frame-artifacts.js";
import type { InferenceGateway } from "./inference-gateway.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import type { Frame, FrameFailureCode, FrameTaskResult } from "./types.js";

export const DEFAULT_POOL_SIZE = 4;

/** Anything the gateway throws counts as a gateway failure; artifact errors stay as they are. */
function asGatewayError(err: unknown): InferenceGatewayError {
  if (err instanceof InferenceGatewayError) return err;
  return new InferenceGatewayError("GATEWAY_ERROR", describeError(err), { cause: err });
}

export interface DispatcherDeps {
  gateway: InferenceGateway;
  artifacts: FrameArtifactStore;
  logger?: PipelineLogger;
}

export interface DispatchSummary {
  submitted: number;
  failed: number;
}

export class ConcurrentDispatcher {
  private readonly gateway: InferenceGateway;
  private readonly artifacts: FrameArtifactStore;
  private readonly logger: PipelineLogger;

  constructor(
    deps: DispatcherDeps,
    private readonly poolSize: number = DEFAULT_POOL_SIZE,
  ) {
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${poolSize}`);
    }
    this.gateway = deps.gateway;
    this.artifacts = deps.artifacts;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Dispatch every frame and report each completion through `onResult`, in
   * completion order. If the frame sequence or `onResult` fails, no further
   * frames are pulled and in-flight tasks are still awaited before the error
   * is rethrown.
   */
  async run(frames: AsyncIterable<Frame>, onResult: (result: FrameTaskResult) => void): Promise<DispatchSummary> {
    const iterator = frames[Symbol.asyncIterator]();
    const summary: DispatchSummary = { submitted: 0, failed: 0 };
    let exhausted = false;

    const worker = async (): Promise<void> => {
      try {
        while (!exhausted) {
          const next = await iterator.next();
          if (next.done) {
            exhausted = true;
            return;
          }
          summary.submitted++;
          const result = await this.processFrame(next.value);
          if (result.status === "failed") {
            summary.failed++;
          }
          onResult(result);
        }
      } catch (err) {
        // Stop the rest of the pool from pulling new frames.
        exhausted = true;
        throw err;
      }
    };

    const workers = Array.from({ length: this.poolSize }, () => worker());
    const settled = await Promise.allSettled(workers);

    const readFailure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");
    if (readFailure) {
      throw readFailure.reason;
    }

    this.logger.info(`Dispatched ${summary.submitted} frames, ${summary.failed} failed`);
    return summary;
  }

  private async processFrame(frame: Frame): Promise<FrameTaskResult> {
    try {
      const detections = await withFrameArtifact(this.artifacts, frame, async (artifact) => {
        try {
          return await this.gateway.infer(artifact);
        } catch (err) {
          throw asGatewayError(err);
        }
      });
      return { status: "ok", frameIndex: frame.index, detections };
    } catch (err) {
      const code: FrameFailureCode = err instanceof InferenceGatewayError ? err.code : "ARTIFACT_ERROR";
      const message = describeError(err);
      this.logger.warn(`Frame ${frame.index} failed (${code}): ${message}`);
      return { status: "failed", frameIndex: frame.index, failure: { frameIndex: frame.index, code, message } };
    }
  }
}
