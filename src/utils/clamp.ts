import type { Rgba } from "../raster/image.js";

/** Storage types a channel value can be narrowed to */
export type ChannelType = "u8" | "u16" | "i16";

const CHANNEL_RANGE: Readonly<Record<ChannelType, readonly [number, number]>> = {
  u8: [0, 255],
  u16: [0, 65535],
  i16: [-32768, 32767],
};

/**
 * Saturate `x` into the range of `to`. In-range values are truncated toward zero.
 * NaN saturates to the maximum.
 */
export function clamp(x: number, to: ChannelType = "u8"): number {
  const [min, max] = CHANNEL_RANGE[to];
  if (x < max) {
    return x > min ? Math.trunc(x) : min;
  }
  return max;
}

/** Adds pixels with the given weights, clamping every channel to u8. */
export function weightedSum(
  left: Rgba,
  right: Rgba,
  leftWeight: number,
  rightWeight: number
): Rgba {
  return [
    clamp(left[0] * leftWeight + right[0] * rightWeight),
    clamp(left[1] * leftWeight + right[1] * rightWeight),
    clamp(left[2] * leftWeight + right[2] * rightWeight),
    clamp(left[3] * leftWeight + right[3] * rightWeight),
  ];
}

/**
 * Linear blend: `left * leftWeight + right * (1 - leftWeight)`.
 * Matches the `(lineColor, original, weight)` blend signature of the antialiased primitives.
 */
export function interpolate(left: Rgba, right: Rgba, leftWeight: number): Rgba {
  return weightedSum(left, right, leftWeight, 1 - leftWeight);
}
