// Property-Based Test: the sampler keeps exactly one frame per stride, in
// decode order, with contiguous indices

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { FrameSampler, computeStride } from "./frame-sampler.js";
import { FakeVideoSource, positionOf } from "./testing/fakes.js";
import type { Frame } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryFrameRate = (): fc.Arbitrary<number | null> =>
  fc.option(fc.constantFrom(10, 12.5, 24, 25, 30000 / 1001, 30, 60), { freq: 6 });

const arbitraryInterval = (): fc.Arbitrary<number> => fc.constantFrom(0.1, 0.5, 1, 2, 3.5);

// ─── Helpers ────────────────────────────────────────────────────────────────────

async function collect(frames: AsyncIterable<Frame>): Promise<Frame[]> {
  const result: Frame[] = [];
  for await (const frame of frames) {
    result.push(frame);
  }
  return result;
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: frame sampling", () => {
  it("samples ceil(frameCount / stride) frames at positions 0, stride, 2·stride, …", async () => {
    await fc.assert(
      fc.asyncProperty(
        arbitraryFrameRate(),
        arbitraryInterval(),
        fc.integer({ min: 0, max: 400 }),
        async (frameRate, interval, frameCount) => {
          const stride = computeStride(frameRate, interval);
          const frames = await collect(new FrameSampler(interval).sample(new FakeVideoSource({ frameRate, frameCount })));

          expect(frames).toHaveLength(Math.ceil(frameCount / stride));
          frames.forEach((frame, i) => {
            expect(frame.index).toBe(i);
            expect(positionOf(frame.pixels)).toBe(i * stride);
          });
        },
      ),
      { numRuns: 100 },
    );
  });

  it("sample times never decrease", async () => {
    await fc.assert(
      fc.asyncProperty(arbitraryFrameRate(), arbitraryInterval(), async (frameRate, interval) => {
        const frames = await collect(
          new FrameSampler(interval).sample(new FakeVideoSource({ frameRate, frameCount: 120 })),
        );
        for (let i = 1; i < frames.length; i++) {
          expect(frames[i].sampleTimeSeconds).toBeGreaterThan(frames[i - 1].sampleTimeSeconds);
        }
      }),
      { numRuns: 50 },
    );
  });
});
