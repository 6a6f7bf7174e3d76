/**
 * Splits a concatenated MJPEG byte stream (ffmpeg `-f image2pipe -c:v mjpeg`)
 * into individual JPEG images.
 *
 * Each image runs from an SOI marker (FF D8) to the next EOI marker (FF D9).
 * Entropy-coded JPEG data byte-stuffs every 0xFF, so an EOI marker only occurs
 * at the end of an image. Chunks may split an image, or a marker, anywhere.
 */

// ─── Constants ──────────────────────────────────────────────────────────────────

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/** Refuse to buffer a single image larger than this (64 MB). */
const MAX_PENDING_BYTES = 64 * 1024 * 1024;

// ─── Splitter ───────────────────────────────────────────────────────────────────

export class MjpegSplitter {
  private pending: Buffer = Buffer.alloc(0);

  /** Feed the next chunk; returns every image completed by it, in stream order. */
  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const images: Buffer[] = [];

    for (;;) {
      const start = this.pending.indexOf(SOI);
      if (start === -1) {
        // Keep a trailing 0xFF: it may be the first half of the next SOI.
        const last = this.pending.length - 1;
        this.pending = last >= 0 && this.pending[last] === 0xff ? this.pending.subarray(last) : Buffer.alloc(0);
        break;
      }

      const end = this.pending.indexOf(EOI, start + SOI.length);
      if (end === -1) {
        this.pending = this.pending.subarray(start);
        if (this.pending.length > MAX_PENDING_BYTES) {
          throw new Error(`MJPEG image exceeds ${MAX_PENDING_BYTES} bytes without an end marker`);
        }
        break;
      }

      // Copy so the emitted image does not pin the larger stream buffer.
      images.push(Buffer.from(this.pending.subarray(start, end + EOI.length)));
      this.pending = this.pending.subarray(end + EOI.length);
    }

    return images;
  }

  /** Bytes held back waiting for the rest of an image. */
  get pendingBytes(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
