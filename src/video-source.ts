/**
 * VideoSource: decodes a video into a one-shot stream of JPEG frames.
 *
 * The ffmpeg-backed implementation probes the frame rate with `ffprobe` and
 * decodes with `ffmpeg -f image2pipe -c:v mjpeg`, splitting stdout into
 * images as it arrives. Decoding is pulled by the consumer: when nobody reads,
 * the pipe fills and ffmpeg blocks.
 */

import { execFile, spawn, type ChildProcessByStdio } from "node:child_process";
import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { promisify } from "node:util";
import { v4 as uuidv4 } from "uuid";
import { VideoSourceError, describeError } from "./errors.js";
import { MjpegSplitter } from "./mjpeg-splitter.js";
import type { VideoInput } from "./types.js";

const execFileAsync = promisify(execFile);

/** Keep at most this much ffmpeg stderr for error messages. */
const MAX_STDERR_CHARS = 2000;

// ─── Interface ──────────────────────────────────────────────────────────────────

export interface VideoSource {
  /** Frames per second, or null when the container does not say. */
  frameRate(): Promise<number | null>;
  /** Decoded frames in decode order. May be called once per source. */
  frames(): AsyncIterable<Buffer>;
  /** Stop decoding and release anything the source holds on disk. */
  close(): Promise<void>;
}

export interface FfmpegOptions {
  ffmpegPath: string;
  ffprobePath: string;
}

// ─── Frame rate parsing ─────────────────────────────────────────────────────────

/**
 * Parse an ffprobe rate such as "30000/1001", "25/1" or "29.97".
 * Returns null for "0/0", zero, negative or non-numeric input.
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;
  const [numeratorText, denominatorText] = value.trim().split("/");
  const numerator = Number(numeratorText);
  const denominator = denominatorText === undefined ? 1 : Number(denominatorText);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return null;
  }
  const rate = numerator / denominator;
  return rate > 0 ? rate : null;
}

/** Pick the frame rate out of `ffprobe -of json -show_entries stream=...` output. */
export function frameRateFromStreamInfo(stdout: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    throw new VideoSourceError(`ffprobe returned unreadable output: ${stdout.slice(0, 200)}`);
  }
  if (!parsed || typeof parsed !== "object" || !("streams" in parsed) || !Array.isArray(parsed.streams)) {
    throw new VideoSourceError("ffprobe found no video stream");
  }
  const stream: unknown = parsed.streams[0];
  if (!stream || typeof stream !== "object") {
    throw new VideoSourceError("ffprobe found no video stream");
  }
  const average = "avg_frame_rate" in stream && typeof stream.avg_frame_rate === "string" ? stream.avg_frame_rate : undefined;
  const base = "r_frame_rate" in stream && typeof stream.r_frame_rate === "string" ? stream.r_frame_rate : undefined;
  return parseFrameRate(average) ?? parseFrameRate(base);
}

// ─── ffmpeg implementation ──────────────────────────────────────────────────────

interface ProcessExit {
  code: number | null;
  error: Error | null;
}

export class FfmpegVideoSource implements VideoSource {
  private child: ChildProcessByStdio<null, Readable, Readable> | null = null;
  private started = false;
  private closed = false;

  constructor(
    private readonly filePath: string,
    private readonly options: FfmpegOptions,
    /** Temporary directory owned by this source, removed on close. */
    private readonly scratchDir: string | null = null,
  ) {}

  async frameRate(): Promise<number | null> {
    try {
      const { stdout } = await execFileAsync(this.options.ffprobePath, [
        "-v", "error",
        "-select_streams", "v:0",
        "-show_entries", "stream=avg_frame_rate,r_frame_rate",
        "-of", "json",
        this.filePath,
      ]);
      return frameRateFromStreamInfo(stdout);
    } catch (err) {
      if (err instanceof VideoSourceError) throw err;
      throw new VideoSourceError(`Cannot read the frame rate of video ${this.filePath}: ${describeError(err)}`, { cause: err });
    }
  }

  async *frames(): AsyncGenerator<Buffer> {
    if (this.started) {
      throw new VideoSourceError("Video frames can only be read once");
    }
    if (this.closed) {
      throw new VideoSourceError("Video source is closed");
    }
    this.started = true;

    const child = spawn(
      this.options.ffmpegPath,
      ["-v", "error", "-i", this.filePath, "-f", "image2pipe", "-c:v", "mjpeg", "-q:v", "2", "-"],
      { stdio: ["ignore", "pipe", "pipe"] },
    );
    this.child = child;

    let stderr = "";
    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (text: string) => {
      stderr = (stderr + text).slice(-MAX_STDERR_CHARS);
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once("error", (error) => resolve({ code: null, error }));
      child.once("close", (code) => resolve({ code, error: null }));
    });

    const splitter = new MjpegSplitter();
    let finished = false;
    try {
      for await (const chunk of child.stdout) {
        if (!Buffer.isBuffer(chunk)) continue;
        for (const image of splitter.push(chunk)) {
          yield image;
        }
      }

      const exit = await exited;
      if (exit.error) {
        throw new VideoSourceError(`Cannot start ffmpeg: ${exit.error.message}`, { cause: exit.error });
      }
      if (exit.code !== 0 && !this.closed) {
        throw new VideoSourceError(
          `ffmpeg exited with code ${String(exit.code)} while decoding ${this.filePath}: ${stderr.trim()}`,
        );
      }
      finished = true;
    } finally {
      // Consumer stopped early or decoding failed: do not leave ffmpeg running.
      if (!finished && child.exitCode === null) {
        child.kill("SIGKILL");
      }
      this.child = null;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.child && this.child.exitCode === null) {
      this.child.kill("SIGKILL");
    }
    if (this.scratchDir) {
      await rm(this.scratchDir, { recursive: true, force: true });
    }
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/**
 * Open a video from a path or from in-memory bytes. Bytes are spooled to a
 * private temporary directory because ffprobe needs a seekable input.
 * Throws VideoSourceError when the path does not exist or cannot be read.
 */
export async function openVideoSource(input: VideoInput, options: FfmpegOptions): Promise<VideoSource> {
  if (input.kind === "path") {
    try {
      await access(input.path);
    } catch (err) {
      throw new VideoSourceError(`Cannot open video ${input.path}: ${describeError(err)}`, { cause: err });
    }
    return new FfmpegVideoSource(input.path, options);
  }

  if (input.data.length === 0) {
    throw new VideoSourceError("Cannot open video: upload is empty");
  }
  const scratchDir = await mkdtemp(join(tmpdir(), "rockfall-video-"));
  const filePath = join(scratchDir, `${uuidv4()}.video`);
  try {
    await writeFile(filePath, input.data);
  } catch (err) {
    await rm(scratchDir, { recursive: true, force: true });
    throw new VideoSourceError(`Cannot spool uploaded video: ${describeError(err)}`, { cause: err });
  }
  return new FfmpegVideoSource(filePath, options, scratchDir);
}
