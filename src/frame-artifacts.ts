// Rockfall Risk Pipeline - Per-frame scratch artifacts
//
// Each inference task encodes its frame to a temporary JPEG file, sends it,
// and deletes it. withFrameArtifact() is the only way tasks obtain one, so the
// release runs on every exit path: success, rejected inference, thrown error.

import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { Frame } from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface FrameArtifact {
  frameIndex: number;
  /** Location of the encoded image on disk. */
  path: string;
  bytes: Buffer;
  contentType: "image/jpeg";
}

export interface FrameArtifactStore {
  acquire(frame: Frame): Promise<FrameArtifact>;
  release(artifact: FrameArtifact): Promise<void>;
}

// ─── Temp-file store ────────────────────────────────────────────────────────────

export class TempFileArtifactStore implements FrameArtifactStore {
  private ready: Promise<string | undefined> | null = null;

  constructor(private readonly directory: string) {}

  async acquire(frame: Frame): Promise<FrameArtifact> {
    this.ready ??= mkdir(this.directory, { recursive: true }).catch((err: unknown) => {
      // Let the next acquire retry.
      this.ready = null;
      throw err;
    });
    await this.ready;

    const path = join(this.directory, `frame_${frame.index}_${uuidv4()}.jpg`);
    await writeFile(path, frame.pixels);
    return {
      frameIndex: frame.index,
      path,
      bytes: frame.pixels,
      contentType: "image/jpeg",
    };
  }

  async release(artifact: FrameArtifact): Promise<void> {
    await rm(artifact.path, { force: true });
  }
}

// ─── Scoped use ─────────────────────────────────────────────────────────────────

/** Acquire an artifact for `frame`, run `use` with it, and release it whatever `use` does. */
export async function withFrameArtifact<T>(
  store: FrameArtifactStore,
  frame: Frame,
  use: (artifact: FrameArtifact) => Promise<T>,
): Promise<T> {
  const artifact = await store.acquire(frame);
  try {
    return await use(artifact);
  } finally {
    await store.release(artifact);
  }
}
