import type { Rgba, RgbaImage } from "./image.js";
import { type BlendFn, drawAntialiasedLineSegment, drawLineSegment } from "./line.js";
import {
  drawFilledCircle,
  drawFilledEllipse,
  drawHollowCircle,
  drawHollowEllipse,
} from "./ellipse.js";
import { drawAntialiasedPolygon, drawHollowPolygon, drawPolygon } from "./polygon.js";
import {
  drawFilledRect,
  drawFilledRoundedRect,
  drawHollowRect,
  drawHollowRoundedRect,
} from "./rect.js";
import { drawCubicBezierCurve } from "./bezier.js";
import { drawCross } from "./cross.js";
import type { Point, Rect } from "../utils/geometry.js";

/**
 * Copy-then-mutate form of any in-place primitive: clones `surface`, lets `draw`
 * paint into the clone and returns it. The input is left untouched, also when
 * `draw` throws.
 */
export function drawOnCopy<S extends { clone(): S }>(surface: S, draw: (target: S) => void): S {
  const out = surface.clone();
  draw(out);
  return out;
}

export function drawLineSegmentOnCopy(
  image: RgbaImage,
  start: Point,
  end: Point,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawLineSegment(out, start, end, color));
}

export function drawAntialiasedLineSegmentOnCopy(
  image: RgbaImage,
  start: Point,
  end: Point,
  color: Rgba,
  blend: BlendFn<Rgba>
): RgbaImage {
  return drawOnCopy(image, (out) => drawAntialiasedLineSegment(out, start, end, color, blend));
}

export function drawHollowCircleOnCopy(
  image: RgbaImage,
  center: Point,
  radius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawHollowCircle(out, center, radius, color));
}

export function drawFilledCircleOnCopy(
  image: RgbaImage,
  center: Point,
  radius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawFilledCircle(out, center, radius, color));
}

export function drawHollowEllipseOnCopy(
  image: RgbaImage,
  center: Point,
  widthRadius: number,
  heightRadius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) =>
    drawHollowEllipse(out, center, widthRadius, heightRadius, color)
  );
}

export function drawFilledEllipseOnCopy(
  image: RgbaImage,
  center: Point,
  widthRadius: number,
  heightRadius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) =>
    drawFilledEllipse(out, center, widthRadius, heightRadius, color)
  );
}

export function drawPolygonOnCopy(image: RgbaImage, poly: readonly Point[], color: Rgba): RgbaImage {
  return drawOnCopy(image, (out) => drawPolygon(out, poly, color));
}

export function drawAntialiasedPolygonOnCopy(
  image: RgbaImage,
  poly: readonly Point[],
  color: Rgba,
  blend: BlendFn<Rgba>
): RgbaImage {
  return drawOnCopy(image, (out) => drawAntialiasedPolygon(out, poly, color, blend));
}

export function drawHollowPolygonOnCopy(
  image: RgbaImage,
  poly: readonly Point[],
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawHollowPolygon(out, poly, color));
}

export function drawFilledRectOnCopy(image: RgbaImage, rect: Rect, color: Rgba): RgbaImage {
  return drawOnCopy(image, (out) => drawFilledRect(out, rect, color));
}

export function drawHollowRectOnCopy(image: RgbaImage, rect: Rect, color: Rgba): RgbaImage {
  return drawOnCopy(image, (out) => drawHollowRect(out, rect, color));
}

export function drawFilledRoundedRectOnCopy(
  image: RgbaImage,
  rect: Rect,
  radius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawFilledRoundedRect(out, rect, radius, color));
}

export function drawHollowRoundedRectOnCopy(
  image: RgbaImage,
  rect: Rect,
  radius: number,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) => drawHollowRoundedRect(out, rect, radius, color));
}

export function drawCubicBezierCurveOnCopy(
  image: RgbaImage,
  start: Point,
  end: Point,
  controlA: Point,
  controlB: Point,
  color: Rgba
): RgbaImage {
  return drawOnCopy(image, (out) =>
    drawCubicBezierCurve(out, start, end, controlA, controlB, color)
  );
}

export function drawCrossOnCopy(image: RgbaImage, color: Rgba, x: number, y: number): RgbaImage {
  return drawOnCopy(image, (out) => drawCross(out, color, x, y));
}
