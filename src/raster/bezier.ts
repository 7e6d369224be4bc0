import type { DrawingSurface } from "./image.js";
import { drawLineSegment } from "./line.js";
import { type Point, roundPixel } from "../utils/geometry.js";

function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/** Number of line segments used to approximate a curve with the given control-polygon length */
export function bezierSegmentCount(controlPolygonLength: number): number {
  return Math.round(Math.sqrt(controlPolygonLength ** 2 + 800) / 8);
}

/** Evaluate the cubic Bernstein form at `t` in [0, 1] */
export function cubicBezierPoint(
  t: number,
  start: Point,
  controlA: Point,
  controlB: Point,
  end: Point
): Point {
  const u = 1 - t;
  const b0 = u * u * u;
  const b1 = 3 * u * u * t;
  const b2 = 3 * u * t * t;
  const b3 = t * t * t;
  return {
    x: b0 * start.x + b1 * controlA.x + b2 * controlB.x + b3 * end.x,
    y: b0 * start.y + b1 * controlA.y + b2 * controlB.y + b3 * end.y,
  };
}

/**
 * Draw a cubic Bézier curve as a polyline. Samples are rounded to the nearest pixel
 * and joined with Bresenham segments.
 */
export function drawCubicBezierCurve<P>(
  surface: DrawingSurface<P>,
  start: Point,
  end: Point,
  controlA: Point,
  controlB: Point,
  color: P
): void {
  const length =
    distance(start, controlA) + distance(controlA, controlB) + distance(controlB, end);
  const segments = bezierSegmentCount(length);

  const sample = (t: number): Point => {
    const p = cubicBezierPoint(t, start, controlA, controlB, end);
    return { x: roundPixel(p.x), y: roundPixel(p.y) };
  };

  let previous = sample(0);
  for (let i = 1; i <= segments; i++) {
    const next = sample(i / segments);
    drawLineSegment(surface, previous, next, color);
    previous = next;
  }
}
