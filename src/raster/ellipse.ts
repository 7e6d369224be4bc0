import { type DrawingSurface, drawIfInBounds } from "./image.js";
import { drawLineSegment } from "./line.js";
import type { Point } from "../utils/geometry.js";

/** Receives the center and one octant/quadrant offset; mirroring is up to the callback */
export type ConicVisitor = (x0: number, y0: number, x: number, y: number) => void;

/**
 * Midpoint circle algorithm. Walks the octant from (0, r) to the diagonal with an
 * integer decision variable and hands each offset to `visit`.
 */
export function midpointCircle(center: Point, radius: number, visit: ConicVisitor): void {
  let x = 0;
  let y = radius;
  let p = 1 - radius;

  while (x <= y) {
    visit(center.x, center.y, x, y);
    x += 1;
    if (p < 0) {
      p += 2 * x + 1;
    } else {
      y -= 1;
      p += 2 * (x - y) + 1;
    }
  }
}

/**
 * Midpoint ellipse algorithm for `(x/rw)^2 + (y/rh)^2 = 1`.
 * Region 1 steps x while the slope is shallow; region 2 steps y down to 0.
 * Each visited offset is one point of the first quadrant.
 */
export function midpointEllipse(
  center: Point,
  widthRadius: number,
  heightRadius: number,
  visit: ConicVisitor
): void {
  const { x: x0, y: y0 } = center;
  const w2 = widthRadius * widthRadius;
  const h2 = heightRadius * heightRadius;
  let x = 0;
  let y = heightRadius;
  let px = 0;
  let py = 2 * w2 * y;

  visit(x0, y0, x, y);

  // Top and bottom regions.
  let p = h2 - w2 * heightRadius + 0.25 * w2;
  while (px < py) {
    x += 1;
    px += 2 * h2;
    if (p < 0) {
      p += h2 + px;
    } else {
      y -= 1;
      py -= 2 * w2;
      p += h2 + px - py;
    }
    visit(x0, y0, x, y);
  }

  // Left and right regions.
  p = h2 * (x + 0.5) ** 2 + w2 * (y - 1) ** 2 - w2 * h2;
  while (y > 0) {
    y -= 1;
    py -= 2 * w2;
    if (p > 0) {
      p += w2 - py;
    } else {
      x += 1;
      px += 2 * h2;
      p += w2 - py + px;
    }
    visit(x0, y0, x, y);
  }
}

function hspan<P>(surface: DrawingSurface<P>, x0: number, x1: number, y: number, color: P): void {
  drawLineSegment(surface, { x: x0, y }, { x: x1, y }, color);
}

/** Draw the outline of a circle */
export function drawHollowCircle<P>(
  surface: DrawingSurface<P>,
  center: Point,
  radius: number,
  color: P
): void {
  midpointCircle(center, radius, (x0, y0, x, y) => {
    drawIfInBounds(surface, x0 + x, y0 + y, color);
    drawIfInBounds(surface, x0 + y, y0 + x, color);
    drawIfInBounds(surface, x0 - y, y0 + x, color);
    drawIfInBounds(surface, x0 - x, y0 + y, color);
    drawIfInBounds(surface, x0 - x, y0 - y, color);
    drawIfInBounds(surface, x0 - y, y0 - x, color);
    drawIfInBounds(surface, x0 + y, y0 - x, color);
    drawIfInBounds(surface, x0 + x, y0 - y, color);
  });
}

/** Draw a circle and its contents */
export function drawFilledCircle<P>(
  surface: DrawingSurface<P>,
  center: Point,
  radius: number,
  color: P
): void {
  midpointCircle(center, radius, (x0, y0, x, y) => {
    hspan(surface, x0 - x, x0 + x, y0 + y, color);
    hspan(surface, x0 - y, x0 + y, y0 + x, color);
    hspan(surface, x0 - x, x0 + x, y0 - y, color);
    hspan(surface, x0 - y, x0 + y, y0 - x, color);
  });
}

/** Draw the outline of an axis-aligned ellipse */
export function drawHollowEllipse<P>(
  surface: DrawingSurface<P>,
  center: Point,
  widthRadius: number,
  heightRadius: number,
  color: P
): void {
  if (widthRadius === heightRadius) {
    drawHollowCircle(surface, center, widthRadius, color);
    return;
  }
  midpointEllipse(center, widthRadius, heightRadius, (x0, y0, x, y) => {
    drawIfInBounds(surface, x0 + x, y0 + y, color);
    drawIfInBounds(surface, x0 - x, y0 + y, color);
    drawIfInBounds(surface, x0 + x, y0 - y, color);
    drawIfInBounds(surface, x0 - x, y0 - y, color);
  });
}

/** Draw an axis-aligned ellipse and its contents */
export function drawFilledEllipse<P>(
  surface: DrawingSurface<P>,
  center: Point,
  widthRadius: number,
  heightRadius: number,
  color: P
): void {
  if (widthRadius === heightRadius) {
    drawFilledCircle(surface, center, widthRadius, color);
    return;
  }
  midpointEllipse(center, widthRadius, heightRadius, (x0, y0, x, y) => {
    hspan(surface, x0 - x, x0 + x, y0 + y, color);
    hspan(surface, x0 - x, x0 + x, y0 - y, color);
  });
}
