import { type DrawingSurface, inBounds } from "./image.js";
import { type Point, roundPixel } from "../utils/geometry.js";

/** `(lineColor, original, weight) => blended`, e.g. `interpolate` */
export type BlendFn<P> = (lineColor: P, original: P, weight: number) => P;

/**
 * Integer coordinates of a line segment, by Bresenham's algorithm.
 *
 * Endpoints are rounded to the nearest pixel. When the segment is steeper than 45°
 * the walk runs along y; in both cases it proceeds in increasing dominant-axis order,
 * so a segment given right-to-left is yielded left-to-right.
 */
export function* bresenhamLine(
  start: Point,
  end: Point
): Generator<[number, number], void, undefined> {
  let x0 = roundPixel(start.x);
  let y0 = roundPixel(start.y);
  let x1 = roundPixel(end.x);
  let y1 = roundPixel(end.y);

  const isSteep = Math.abs(y1 - y0) > Math.abs(x1 - x0);
  if (isSteep) {
    [x0, y0] = [y0, x0];
    [x1, y1] = [y1, x1];
  }
  if (x0 > x1) {
    [x0, x1] = [x1, x0];
    [y0, y1] = [y1, y0];
  }

  const dx = x1 - x0;
  const dy = Math.abs(y1 - y0);
  const yStep = y0 < y1 ? 1 : -1;
  let error = dx / 2;
  let y = y0;

  for (let x = x0; x <= x1; x++) {
    yield isSteep ? [y, x] : [x, y];
    error -= dy;
    if (error < 0) {
      y += yStep;
      error += dx;
    }
  }
}

/** Draw the part of a line segment that lies inside the surface */
export function drawLineSegment<P>(
  surface: DrawingSurface<P>,
  start: Point,
  end: Point,
  color: P
): void {
  for (const [x, y] of bresenhamLine(start, end)) {
    if (inBounds(surface, x, y)) {
      surface.putPixel(x, y, color);
    }
  }
}

/** Maps loop coordinates back to surface coordinates and blends into the surface */
class Plotter<P> {
  constructor(
    private readonly surface: DrawingSurface<P>,
    private readonly transpose: boolean,
    private readonly blend: BlendFn<P>
  ) {}

  plot(x: number, y: number, color: P, weight: number): void {
    const [px, py] = this.transpose ? [y, x] : [x, y];
    if (!inBounds(this.surface, px, py)) return;
    const original = this.surface.getPixel(px, py);
    this.surface.putPixel(px, py, this.blend(color, original, weight));
  }
}

// Wu's core loop for a segment with |slope| <= 1 and start.x <= end.x.
function plotWuLine<P>(
  plotter: Plotter<P>,
  start: Point,
  end: Point,
  color: P
): void {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const gradient = dx === 0 ? 0 : dy / dx;
  let fy = start.y;

  for (let x = start.x; x <= end.x; x++) {
    const iy = Math.floor(fy);
    const frac = fy - iy;
    plotter.plot(x, iy, color, 1 - frac);
    plotter.plot(x, iy + 1, color, frac);
    fy += gradient;
  }
}

/**
 * Draw an antialiased line segment with Xiaolin Wu's algorithm.
 * Endpoints are rounded to integer pixels; coverage is split between the two pixels
 * straddling the ideal line and merged into the surface through `blend`.
 */
export function drawAntialiasedLineSegment<P>(
  surface: DrawingSurface<P>,
  start: Point,
  end: Point,
  color: P,
  blend: BlendFn<P>
): void {
  let x0 = roundPixel(start.x);
  let y0 = roundPixel(start.y);
  let x1 = roundPixel(end.x);
  let y1 = roundPixel(end.y);

  const isSteep = Math.abs(y1 - y0) > Math.abs(x1 - x0);

  if (isSteep) {
    if (y0 > y1) {
      [x0, x1] = [x1, x0];
      [y0, y1] = [y1, y0];
    }
    plotWuLine(new Plotter(surface, true, blend), { x: y0, y: x0 }, { x: y1, y: x1 }, color);
  } else {
    if (x0 > x1) {
      [x0, x1] = [x1, x0];
      [y0, y1] = [y1, y0];
    }
    plotWuLine(new Plotter(surface, false, blend), { x: x0, y: y0 }, { x: x1, y: y1 }, color);
  }
}
