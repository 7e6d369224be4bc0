import { describe, it, expect } from "vitest";
import {
  drawFilledCircle,
  drawFilledEllipse,
  drawHollowCircle,
  drawHollowEllipse,
  midpointCircle,
  midpointEllipse,
} from "../../src/raster/ellipse.js";
import { GridSurface } from "../helpers.js";

function visits(walk: (visit: (x0: number, y0: number, x: number, y: number) => void) => void) {
  const out: Array<[number, number]> = [];
  walk((_x0, _y0, x, y) => out.push([x, y]));
  return out;
}

describe("midpoint circle", () => {
  it("walks one octant", () => {
    expect(visits((v) => midpointCircle({ x: 0, y: 0 }, 3, v))).toEqual([
      [0, 3],
      [1, 3],
      [2, 2],
    ]);
  });

  it("draws the 8-way mirrored outline", () => {
    const surface = new GridSurface(11, 11);
    drawHollowCircle(surface, { x: 5, y: 5 }, 3, 1);
    const painted = surface.painted();
    expect(painted).toHaveLength(16);
    expect(painted).toContain("5,2");
    expect(painted).toContain("8,5");
    expect(painted).toContain("3,3");
    expect(painted).toContain("4,8");
    expect(painted).not.toContain("5,5");
  });

  it("fills with horizontal spans", () => {
    const surface = new GridSurface(11, 11);
    drawFilledCircle(surface, { x: 5, y: 5 }, 3, 1);
    expect(surface.row(2)).toEqual([4, 5, 6]);
    expect(surface.row(3)).toEqual([3, 4, 5, 6, 7]);
    expect(surface.row(4)).toEqual([2, 3, 4, 5, 6, 7, 8]);
    expect(surface.row(5)).toEqual([2, 3, 4, 5, 6, 7, 8]);
    expect(surface.row(8)).toEqual([4, 5, 6]);
    expect(surface.painted()).toHaveLength(37);
  });

  it("clips at the surface edge", () => {
    const surface = new GridSurface(4, 4);
    drawFilledCircle(surface, { x: 0, y: 0 }, 3, 1);
    drawHollowCircle(surface, { x: 3, y: 3 }, 5, 1);
    expect(surface.row(0)).toEqual([0, 1, 2, 3]);
  });
});

describe("midpoint ellipse", () => {
  it("walks both regions of the first quadrant", () => {
    expect(visits((v) => midpointEllipse({ x: 0, y: 0 }, 4, 2, v))).toEqual([
      [0, 2],
      [1, 2],
      [2, 2],
      [3, 1],
      [4, 0],
    ]);
  });

  it("draws the 4-way mirrored outline", () => {
    const surface = new GridSurface(11, 11);
    drawHollowEllipse(surface, { x: 5, y: 5 }, 4, 2, 1);
    const painted = surface.painted();
    expect(painted).toHaveLength(16);
    expect(painted).toContain("9,5");
    expect(painted).toContain("1,5");
    expect(painted).toContain("5,3");
    expect(painted).toContain("2,6");
  });

  it("fills with one span per mirrored pair", () => {
    const surface = new GridSurface(11, 11);
    drawFilledEllipse(surface, { x: 5, y: 5 }, 4, 2, 1);
    expect(surface.row(3)).toEqual([3, 4, 5, 6, 7]);
    expect(surface.row(4)).toEqual([2, 3, 4, 5, 6, 7, 8]);
    expect(surface.row(5)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(surface.row(7)).toEqual([3, 4, 5, 6, 7]);
    expect(surface.painted()).toHaveLength(33);
  });

  it("paints exactly the circle when both radii are equal", () => {
    for (const radius of [0, 1, 4, 9]) {
      const circle = new GridSurface(21, 21);
      const ellipse = new GridSurface(21, 21);
      drawFilledCircle(circle, { x: 10, y: 10 }, radius, 1);
      drawFilledEllipse(ellipse, { x: 10, y: 10 }, radius, radius, 1);
      expect(ellipse.painted()).toEqual(circle.painted());

      const ring = new GridSurface(21, 21);
      const oval = new GridSurface(21, 21);
      drawHollowCircle(ring, { x: 10, y: 10 }, radius, 1);
      drawHollowEllipse(oval, { x: 10, y: 10 }, radius, radius, 1);
      expect(oval.painted()).toEqual(ring.painted());
    }
  });
});
