/**
 * Frame sampler that keeps one decoded frame per sampling interval.
 * The stride is fixed up front from the video's frame rate, so the sampled
 * positions are 0, stride, 2·stride, … in decode order.
 */

import type { Frame } from "./types.js";
import type { VideoSource } from "./video-source.js";

/**
 * Number of decoded frames per sample: round(frameRate × interval).
 * An unknown or zero frame rate, or an interval shorter than one frame,
 * samples every frame.
 */
export function computeStride(frameRate: number | null, intervalSeconds: number): number {
  if (frameRate === null || !Number.isFinite(frameRate) || frameRate <= 0) {
    return 1;
  }
  return Math.max(1, Math.round(frameRate * intervalSeconds));
}

export class FrameSampler {
  private consumed = false;

  constructor(private readonly intervalSeconds: number) {
    if (!(intervalSeconds > 0)) {
      throw new RangeError(`Sampling interval must be positive, got ${intervalSeconds}`);
    }
  }

  /**
   * Lazily yield sampled frames with sequential indices starting at 0.
   * The source is consumed once; a sampler refuses a second run.
   */
  async *sample(source: VideoSource): AsyncGenerator<Frame> {
    if (this.consumed) {
      throw new Error("FrameSampler has already consumed its video");
    }
    this.consumed = true;

    const frameRate = await source.frameRate();
    const stride = computeStride(frameRate, this.intervalSeconds);

    let position = 0;
    let index = 0;
    for await (const image of source.frames()) {
      if (position % stride === 0) {
        yield {
          index,
          sampleTimeSeconds: frameRate ? position / frameRate : index * this.intervalSeconds,
          pixels: image,
        };
        index++;
      }
      position++;
    }
  }
}
