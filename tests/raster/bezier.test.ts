import { describe, it, expect } from "vitest";
import {
  bezierSegmentCount,
  cubicBezierPoint,
  drawCubicBezierCurve,
} from "../../src/raster/bezier.js";
import { GridSurface } from "../helpers.js";

describe("cubic Bézier", () => {
  it("derives the segment count from the control-polygon length", () => {
    expect(bezierSegmentCount(0)).toBe(4);
    expect(bezierSegmentCount(9)).toBe(4);
    expect(bezierSegmentCount(100)).toBe(13);
  });

  it("evaluates the Bernstein form", () => {
    const p = cubicBezierPoint(0.5, { x: 0, y: 0 }, { x: 0, y: 10 }, { x: 10, y: 10 }, { x: 10, y: 0 });
    expect(p).toEqual({ x: 5, y: 7.5 });
  });

  it("draws a degenerate straight curve as a line", () => {
    const surface = new GridSurface(12, 3);
    drawCubicBezierCurve(surface, { x: 0, y: 0 }, { x: 9, y: 0 }, { x: 3, y: 0 }, { x: 6, y: 0 }, 1);
    expect(surface.painted()).toEqual([
      "0,0", "1,0", "2,0", "3,0", "4,0", "5,0", "6,0", "7,0", "8,0", "9,0",
    ]);
  });

  it("passes through both endpoints", () => {
    const surface = new GridSurface(12, 12);
    drawCubicBezierCurve(surface, { x: 1, y: 1 }, { x: 8, y: 6 }, { x: 10, y: 0 }, { x: 0, y: 11 }, 1);
    const painted = surface.painted();
    expect(painted).toContain("1,1");
    expect(painted).toContain("8,6");
  });

  it("clips control points far outside the surface", () => {
    const surface = new GridSurface(5, 5);
    drawCubicBezierCurve(surface, { x: 0, y: 2 }, { x: 4, y: 2 }, { x: -50, y: -50 }, { x: 60, y: 70 }, 1);
    expect(surface.painted()).toContain("0,2");
  });
});
