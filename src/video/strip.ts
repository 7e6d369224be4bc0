import { RenderError } from "../errors.js";
import { RgbaImage } from "../raster/image.js";
import type { Color } from "../schema/color.js";
import type { RenderDeps } from "../slide/element.js";
import { renderSlide } from "../slide/render.js";
import type { Slide } from "../slide/slide.js";

/** Screen (frame) size as `[width, height]` */
export type ScreenSize = readonly [number, number];

/** Render every slide and lay them out left to right, one `slideWidth` column each */
export async function composeStrip(
  slides: readonly Slide[],
  slideWidth: number,
  height: number,
  deps: RenderDeps,
  separatorColor?: Color
): Promise<RgbaImage> {
  if (slides.length === 0) {
    throw new RenderError("InsufficientSlides", "Cannot compose a strip from zero slides");
  }
  const strip = new RgbaImage(slides.length * slideWidth, height);
  for (const [i, slide] of slides.entries()) {
    const frame = await renderSlide(slide, slideWidth, height, deps, separatorColor);
    strip.copyFrom(frame, i * slideWidth, 0);
  }
  return strip;
}

/** Leftmost screen-sized window of the strip */
export function cropCover(strip: RgbaImage, screen: ScreenSize): RgbaImage {
  return strip.crop(0, 0, screen[0], screen[1]);
}

/** Rightmost screen-sized window of the strip */
export function cropEnding(strip: RgbaImage, screen: ScreenSize): RgbaImage {
  return strip.crop(strip.width - screen[0], 0, screen[0], screen[1]);
}

/** Horizontal distance the screen travels across a chunk */
export function scrollPixels(chunkLength: number, overlap: number, slideWidth: number): number {
  return (chunkLength - overlap) * slideWidth;
}

/** Duration of a scroll segment: whole seconds of travel plus one */
export function scrollSeconds(pixels: number, pixelsPerSec: number): number {
  return Math.floor(pixels / pixelsPerSec) + 1;
}
