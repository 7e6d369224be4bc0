import { RenderError } from "../errors.js";

/** Which video segment a chunk feeds besides its scroll segment */
export type SegmentRole = "first" | "last" | "mid" | "only";

/**
 * Split `slides` into windows of `step` items, each sharing `overlap` items with the
 * previous one. Windows start at multiples of `step - overlap` while the start is below
 * `slides.length - overlap`; the last window may be shorter than `step`.
 */
export function chunkSlides<T>(slides: readonly T[], step: number, overlap: number): T[][] {
  if (!Number.isInteger(step) || !Number.isInteger(overlap) || overlap < 1 || step <= overlap) {
    throw new RenderError(
      "InvalidConfig",
      `Chunking needs step > overlap >= 1, got step=${step} overlap=${overlap}`
    );
  }
  if (slides.length < overlap) {
    throw new RenderError(
      "InsufficientSlides",
      `${slides.length} slides cannot fill an overlap of ${overlap}`
    );
  }

  const chunks: T[][] = [];
  for (let start = 0; start < slides.length - overlap; start += step - overlap) {
    chunks.push(slides.slice(start, Math.min(start + step, slides.length)));
  }
  return chunks;
}

/** Role of window `index` among `count` windows */
export function segmentRole(index: number, count: number): SegmentRole {
  const first = index === 0;
  const last = index === count - 1;
  if (first && last) return "only";
  if (first) return "first";
  if (last) return "last";
  return "mid";
}
