import type { DrawingSurface, Rgba } from "../raster/image.js";
import { inBounds } from "../raster/image.js";
import { type Color, toRgba } from "../schema/color.js";
import { weightedSum } from "../utils/clamp.js";
import type { Rect } from "../utils/geometry.js";

/** Width and height of laid-out text, in pixels */
export interface TextExtent {
  width: number;
  height: number;
}

/**
 * Rasterized text: one coverage value in [0, 1] per pixel, row-major,
 * `width * height` entries.
 */
export interface GlyphCoverage extends TextExtent {
  scale: number;
  coverage: Float32Array;
}

/** Font-backed text layout. Implementations own the font; callers only see coverage. */
export interface GlyphService {
  /** Extent of `text` set at `scale` */
  measure(text: string, scale: number): TextExtent;
  /** Coverage of `text` at the largest scale ≤ `maxScale` that fits `maxWidth × maxHeight` */
  layout(text: string, maxScale: number, maxWidth: number, maxHeight: number): GlyphCoverage;
}

/**
 * Largest scale ≤ `maxScale` at which text measured as `measured` (at `maxScale`)
 * fits the box. Extent is linear in scale.
 */
export function fitScale(
  measured: TextExtent,
  maxScale: number,
  maxWidth: number,
  maxHeight: number
): number {
  let scale = maxScale;
  if (measured.width > 0) {
    scale = Math.min(scale, (maxScale * maxWidth) / measured.width);
  }
  if (measured.height > 0) {
    scale = Math.min(scale, (maxScale * maxHeight) / measured.height);
  }
  return Math.max(0, scale);
}

/**
 * Draw `text` centered in `rect`, as large as fits up to `maxScale`.
 * Each pixel becomes `original * (1 - c) + color * c` for coverage `c`.
 */
export function drawTextCentered(
  surface: DrawingSurface<Rgba>,
  color: Color,
  rect: Rect,
  maxScale: number,
  glyphs: GlyphService,
  text: string
): void {
  const laid = glyphs.layout(text, maxScale, rect.w, rect.h);
  const ox = rect.x + Math.floor((rect.w - laid.width) / 2);
  const oy = rect.y + Math.floor((rect.h - laid.height) / 2);
  const ink = toRgba(color);

  for (let gy = 0; gy < laid.height; gy++) {
    for (let gx = 0; gx < laid.width; gx++) {
      const c = laid.coverage[gy * laid.width + gx] ?? 0;
      if (c <= 0) continue;
      const x = ox + gx;
      const y = oy + gy;
      if (!inBounds(surface, x, y)) continue;
      const original = surface.getPixel(x, y);
      surface.putPixel(x, y, weightedSum(original, ink, 1 - c, c));
    }
  }
}
