import { type DrawingSurface, drawIfInBounds } from "./image.js";

const STENCIL: ReadonlyArray<readonly [number, number]> = [
  [0, -1],
  [-1, 0],
  [0, 0],
  [1, 0],
  [0, 1],
];

/** Mark (x, y) with a 3×3 plus sign; parts outside the surface are dropped */
export function drawCross<P>(surface: DrawingSurface<P>, color: P, x: number, y: number): void {
  for (const [dx, dy] of STENCIL) {
    drawIfInBounds(surface, x + dx, y + dy, color);
  }
}
