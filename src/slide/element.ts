import { COLOR_BLOCK_RADIUS } from "../constants.js";
import type { ImageSource } from "../image/source.js";
import type { RgbaImage } from "../raster/image.js";
import { drawFilledRoundedRect } from "../raster/rect.js";
import { type Color, toRgba } from "../schema/color.js";
import { type GlyphService, drawTextCentered } from "../text/glyphs.js";
import { type Rect, rectAt } from "../utils/geometry.js";

/**
 * Vertical placement inside a slide. `left` is the horizontal margin on both
 * sides, so the element width follows the slide width.
 */
export interface Position {
  left: number;
  top: number;
  height: number;
}

export function positionToRect(position: Position, width: number): Rect {
  return rectAt(position.left, position.top).ofSize(
    Math.max(0, width - 2 * position.left),
    position.height
  );
}

export interface ImageElement {
  kind: "image";
  source: string;
  position: Position;
}

export interface TextElement {
  kind: "text";
  content: string;
  maxScale: number;
  color: Color;
  position: Position;
}

export interface ColorElement {
  kind: "color";
  color: Color;
  position: Position;
}

export type Element = ImageElement | TextElement | ColorElement;

/** Collaborators an element needs to paint itself */
export interface RenderDeps {
  images: ImageSource;
  glyphs: GlyphService;
}

/** Paint one element into `image`, sized against the image width */
export async function renderElement(
  image: RgbaImage,
  element: Element,
  deps: RenderDeps
): Promise<void> {
  const rect = positionToRect(element.position, image.width);
  switch (element.kind) {
    case "image": {
      const thumb = await deps.images.loadThumbnail(element.source, rect.w, rect.h);
      image.copyFrom(
        thumb,
        rect.x + Math.floor((rect.w - thumb.width) / 2),
        rect.y + Math.floor((rect.h - thumb.height) / 2)
      );
      break;
    }
    case "text":
      drawTextCentered(image, element.color, rect, element.maxScale, deps.glyphs, element.content);
      break;
    case "color":
      drawFilledRoundedRect(image, rect, COLOR_BLOCK_RADIUS, toRgba(element.color));
      break;
  }
}
