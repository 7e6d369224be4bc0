import { RgbaImage } from "../raster/image.js";
import { drawLineSegment } from "../raster/line.js";
import { type Color, toRgba } from "../schema/color.js";
import { type RenderDeps, renderElement } from "./element.js";
import type { Slide } from "./slide.js";

/**
 * Paint a slide into a new transparent `width × height` image, elements in stored order.
 * With a separator color, a vertical line is drawn along the left edge last.
 */
export async function renderSlide(
  slide: Slide,
  width: number,
  height: number,
  deps: RenderDeps,
  separatorColor?: Color
): Promise<RgbaImage> {
  const image = new RgbaImage(width, height);
  for (const element of slide.elements) {
    await renderElement(image, element, deps);
  }
  if (separatorColor) {
    drawLineSegment(image, { x: 0, y: 0 }, { x: 0, y: height }, toRgba(separatorColor));
  }
  return image;
}
