/** A 2D point. Integer for raster algorithms, fractional for parametric ones. */
export interface Point<T extends number = number> {
  x: T;
  y: T;
}

/**
 * An axis-aligned rectangle in pixel coordinates.
 * The corner may be negative or outside the canvas; `w` and `h` are non-negative integers.
 */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export function point(x: number, y: number): Point {
  return { x, y };
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Start a rect at the given top-left corner.
 * `rectAt(10, 10).ofSize(40, 40)` covers pixels 10..49 on both axes.
 */
export function rectAt(x: number, y: number): { ofSize(w: number, h: number): Rect } {
  return {
    ofSize(w: number, h: number): Rect {
      if (!Number.isInteger(x) || !Number.isInteger(y)) {
        throw new RangeError(`Rect corner must be integer, got (${x}, ${y})`);
      }
      if (!Number.isInteger(w) || !Number.isInteger(h) || w < 0 || h < 0) {
        throw new RangeError(`Rect size must be a non-negative integer, got ${w}x${h}`);
      }
      return { x, y, w, h };
    },
  };
}

/** Rightmost pixel column covered by the rect */
export function rectRight(r: Rect): number {
  return r.x + r.w - 1;
}

/** Bottom pixel row covered by the rect */
export function rectBottom(r: Rect): number {
  return r.y + r.h - 1;
}

/** Compute the intersection of two rects, or null if they don't intersect */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.w, b.x + b.w);
  const bottom = Math.min(a.y + a.h, b.y + b.h);
  const w = right - x;
  const h = bottom - y;
  if (w <= 0 || h <= 0) return null;
  return { x, y, w, h };
}

/** Compute the area of a rect */
export function rectArea(r: Rect): number {
  return r.w * r.h;
}

/** Round to the nearest pixel, halves away from zero */
export function roundPixel(v: number): number {
  return v < 0 ? -Math.round(-v) : Math.round(v);
}
