import { type DrawingSurface, drawIfInBounds } from "./image.js";
import { drawFilledCircle, midpointCircle } from "./ellipse.js";
import { drawLineSegment } from "./line.js";
import { type Rect, intersectRects, rectAt, rectBottom, rectRight } from "../utils/geometry.js";

/** Fill the part of `rect` that lies inside the surface */
export function drawFilledRect<P>(surface: DrawingSurface<P>, rect: Rect, color: P): void {
  const bounds = rectAt(0, 0).ofSize(surface.width, surface.height);
  const visible = intersectRects(rect, bounds);
  if (!visible) return;
  for (let y = visible.y; y < visible.y + visible.h; y++) {
    for (let x = visible.x; x < visible.x + visible.w; x++) {
      surface.putPixel(x, y, color);
    }
  }
}

/** Draw the one-pixel outline of `rect` */
export function drawHollowRect<P>(surface: DrawingSurface<P>, rect: Rect, color: P): void {
  if (rect.w === 0 || rect.h === 0) return;
  const left = rect.x;
  const right = rectRight(rect);
  const top = rect.y;
  const bottom = rectBottom(rect);

  drawLineSegment(surface, { x: left, y: top }, { x: right, y: top }, color);
  drawLineSegment(surface, { x: left, y: bottom }, { x: right, y: bottom }, color);
  drawLineSegment(surface, { x: left, y: top }, { x: left, y: bottom }, color);
  drawLineSegment(surface, { x: right, y: top }, { x: right, y: bottom }, color);
}

/** Largest corner radius whose circles (2r + 1 pixels across) stay inside `rect` */
function cornerRadius(rect: Rect, radius: number): number {
  return Math.max(0, Math.min(radius, Math.floor((Math.min(rect.w, rect.h) - 1) / 2)));
}

/**
 * Fill a rect with rounded corners: four circles inset by `radius` from the corners,
 * one full-width band between the circles' rows and one full-height band between
 * their columns. The radius shrinks to fit small rects; empty rects paint nothing.
 */
export function drawFilledRoundedRect<P>(
  surface: DrawingSurface<P>,
  rect: Rect,
  maxRadius: number,
  color: P
): void {
  if (rect.w <= 0 || rect.h <= 0) return;
  const radius = cornerRadius(rect, maxRadius);
  const left = rect.x;
  const right = rectRight(rect);
  const top = rect.y;
  const bottom = rectBottom(rect);

  drawFilledCircle(surface, { x: left + radius, y: top + radius }, radius, color);
  drawFilledCircle(surface, { x: left + radius, y: bottom - radius }, radius, color);
  drawFilledCircle(surface, { x: right - radius, y: top + radius }, radius, color);
  drawFilledCircle(surface, { x: right - radius, y: bottom - radius }, radius, color);

  drawFilledRect(
    surface,
    rectAt(left, top + radius).ofSize(rect.w, Math.max(0, rect.h - 2 * radius)),
    color
  );
  drawFilledRect(
    surface,
    rectAt(left + radius, top).ofSize(Math.max(0, rect.w - 2 * radius), rect.h),
    color
  );
}

/**
 * Outline of a rect with rounded corners: a quarter of a midpoint circle at each
 * corner joined by four straight edges. Radius handling matches `drawFilledRoundedRect`.
 */
export function drawHollowRoundedRect<P>(
  surface: DrawingSurface<P>,
  rect: Rect,
  maxRadius: number,
  color: P
): void {
  if (rect.w <= 0 || rect.h <= 0) return;
  const radius = cornerRadius(rect, maxRadius);
  const left = rect.x;
  const right = rectRight(rect);
  const top = rect.y;
  const bottom = rectBottom(rect);

  const corners: ReadonlyArray<{ cx: number; cy: number; sx: number; sy: number }> = [
    { cx: left + radius, cy: top + radius, sx: -1, sy: -1 },
    { cx: right - radius, cy: top + radius, sx: 1, sy: -1 },
    { cx: left + radius, cy: bottom - radius, sx: -1, sy: 1 },
    { cx: right - radius, cy: bottom - radius, sx: 1, sy: 1 },
  ];
  for (const { cx, cy, sx, sy } of corners) {
    midpointCircle({ x: cx, y: cy }, radius, (x0, y0, x, y) => {
      drawIfInBounds(surface, x0 + sx * x, y0 + sy * y, color);
      drawIfInBounds(surface, x0 + sx * y, y0 + sy * x, color);
    });
  }

  drawLineSegment(surface, { x: left + radius, y: top }, { x: right - radius, y: top }, color);
  drawLineSegment(surface, { x: left + radius, y: bottom }, { x: right - radius, y: bottom }, color);
  drawLineSegment(surface, { x: left, y: top + radius }, { x: left, y: bottom - radius }, color);
  drawLineSegment(surface, { x: right, y: top + radius }, { x: right, y: bottom - radius }, color);
}
