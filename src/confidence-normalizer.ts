/**
 * Confidence calibration.
 *
 * Maps a raw detector confidence (0-1) onto the integer 0-100 scale used by
 * every downstream decision. The 40-60% band, where the rockfall model is
 * least decisive, is stretched over 40-95; anything above 60% is pinned at 98
 * so the verdict never claims absolute certainty.
 */

// ─── Breakpoints (percent) ──────────────────────────────────────────────────────

const PASS_THROUGH_MAX = 40;
const STEEP_BAND_MAX = 55;
const SHALLOW_BAND_MAX = 60;

const STEEP_BAND_TARGET = 90;
const SHALLOW_BAND_TARGET = 95;

export const CALIBRATED_CEILING = 98;

/** Linear interpolation of `value` from [x0, x1] onto [y0, y1]. */
function interpolate(value: number, x0: number, x1: number, y0: number, y1: number): number {
  return y0 + ((value - x0) * (y1 - y0)) / (x1 - x0);
}

/** Round to the nearest integer; exact halves go to the even neighbour (12.5 → 12, 13.5 → 14). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Calibrate a raw confidence. Out-of-range input is clamped to [0, 1];
 * NaN is treated as 0.
 */
export function normalizeConfidence(raw: number): number {
  const clamped = Number.isNaN(raw) ? 0 : Math.min(1, Math.max(0, raw));
  const actual = clamped * 100;

  let scaled: number;
  if (actual <= PASS_THROUGH_MAX) {
    scaled = actual;
  } else if (actual <= STEEP_BAND_MAX) {
    scaled = interpolate(actual, PASS_THROUGH_MAX, STEEP_BAND_MAX, PASS_THROUGH_MAX, STEEP_BAND_TARGET);
  } else if (actual <= SHALLOW_BAND_MAX) {
    scaled = interpolate(actual, STEEP_BAND_MAX, SHALLOW_BAND_MAX, STEEP_BAND_TARGET, SHALLOW_BAND_TARGET);
  } else {
    scaled = CALIBRATED_CEILING;
  }

  return roundHalfEven(scaled);
}
