import type { DrawingSurface } from "./image.js";
import { type BlendFn, drawAntialiasedLineSegment, drawLineSegment } from "./line.js";
import { RenderError } from "../errors.js";
import { type Point, pointsEqual, roundPixel } from "../utils/geometry.js";

/** Strokes one polygon edge after the interior has been filled */
export type EdgePlotter<P> = (
  surface: DrawingSurface<P>,
  start: Point,
  end: Point,
  color: P
) => void;

/**
 * Reject point lists that cannot describe an open polygon path.
 * Runs before any pixel is touched.
 */
function assertOpenPath(poly: readonly Point[]): void {
  if (poly.length < 2) {
    throw new RenderError(
      "DegeneratePolygon",
      `Polygon only has ${poly.length} points, but at least two are needed`
    );
  }
  const first = poly[0];
  const last = poly[poly.length - 1];
  if (first && last && pointsEqual(first, last)) {
    throw new RenderError(
      "DegeneratePolygon",
      `First point (${first.x}, ${first.y}) == last point (${last.x}, ${last.y})`
    );
  }
}

/** Edges of the path closed by an implicit last → first edge */
function closedEdges(poly: readonly Point[]): Array<[Point, Point]> {
  return poly.map((p, i): [Point, Point] => [p, poly[(i + 1) % poly.length] ?? p]);
}

/**
 * Scanline x-intersections of all edges with row `y`.
 *
 * Horizontal edges on the row contribute both endpoints. An edge that only touches
 * the row at one endpoint contributes it when the other endpoint lies below the row,
 * so a vertex shared by two edges is counted once. Crossing edges contribute the
 * interpolated x rounded to the nearest pixel.
 */
export function scanlineIntersections(
  edges: ReadonlyArray<readonly [Point, Point]>,
  y: number
): number[] {
  const xs: number[] = [];
  for (const [p0, p1] of edges) {
    if (!((p0.y <= y && p1.y >= y) || (p1.y <= y && p0.y >= y))) continue;
    if (p0.y === p1.y) {
      xs.push(p0.x, p1.x);
    } else if (p0.y === y || p1.y === y) {
      if (p1.y > y) xs.push(p0.x);
      if (p0.y > y) xs.push(p1.x);
    } else {
      const fraction = (y - p0.y) / (p1.y - p0.y);
      xs.push(Math.round(p0.x + fraction * (p1.x - p0.x)));
    }
  }
  return xs.sort((a, b) => a - b);
}

/**
 * Fill a polygon by scanlines, then stroke every edge with `plotter`.
 *
 * `poly` is an open path (first != last); the closing edge is implicit. Points are
 * rounded to the nearest pixel first, and the rounded path must still be open.
 * Intersections are consumed in pairs and each pair fills an inclusive span; an
 * unpaired trailing intersection is ignored.
 */
export function drawPolygonWith<P>(
  surface: DrawingSurface<P>,
  poly: readonly Point[],
  color: P,
  plotter: EdgePlotter<P>
): void {
  assertOpenPath(poly);
  const points = poly.map((p) => ({ x: roundPixel(p.x), y: roundPixel(p.y) }));
  assertOpenPath(points);

  const { width, height } = surface;
  let yMin = Infinity;
  let yMax = -Infinity;
  for (const p of points) {
    yMin = Math.min(yMin, p.y);
    yMax = Math.max(yMax, p.y);
  }

  // Intersect polygon vertical range with image bounds
  yMin = Math.max(0, Math.min(yMin, height - 1));
  yMax = Math.max(0, Math.min(yMax, height - 1));

  const edges = closedEdges(points);

  if (width > 0 && height > 0) {
    for (let y = yMin; y <= yMax; y++) {
      const xs = scanlineIntersections(edges, y);
      for (let i = 0; i + 1 < xs.length; i += 2) {
        let from = Math.min(xs[i] ?? 0, width);
        let to = Math.min(xs[i + 1] ?? 0, width - 1);
        if (from < width && to >= 0) {
          from = Math.max(0, from);
          to = Math.max(0, to);
          for (let x = from; x <= to; x++) {
            surface.putPixel(x, y, color);
          }
        }
      }
    }
  }

  for (const [start, end] of edges) {
    plotter(surface, start, end, color);
  }
}

/** Draw a filled polygon with Bresenham-stroked edges */
export function drawPolygon<P>(surface: DrawingSurface<P>, poly: readonly Point[], color: P): void {
  drawPolygonWith(surface, poly, color, drawLineSegment);
}

/** Draw a filled polygon with antialiased edges */
export function drawAntialiasedPolygon<P>(
  surface: DrawingSurface<P>,
  poly: readonly Point[],
  color: P,
  blend: BlendFn<P>
): void {
  drawPolygonWith(surface, poly, color, (target, start, end, c) =>
    drawAntialiasedLineSegment(target, start, end, c, blend)
  );
}

/**
 * Draw the outline of a polygon: one segment per consecutive pair plus the closing
 * segment from the first to the last point. Points may be fractional.
 */
export function drawHollowPolygon<P>(
  surface: DrawingSurface<P>,
  poly: readonly Point[],
  color: P
): void {
  assertOpenPath(poly);
  for (let i = 0; i + 1 < poly.length; i++) {
    const a = poly[i];
    const b = poly[i + 1];
    if (a && b) drawLineSegment(surface, a, b, color);
  }
  const first = poly[0];
  const last = poly[poly.length - 1];
  if (first && last) drawLineSegment(surface, first, last, color);
}
