import { describe, it, expect } from "vitest";
import { RgbaImage } from "../../src/raster/image.js";
import {
  bresenhamLine,
  drawAntialiasedLineSegment,
  drawLineSegment,
} from "../../src/raster/line.js";
import { interpolate } from "../../src/utils/clamp.js";
import { GridSurface } from "../helpers.js";

// Accumulates coverage so tests can read the weights back
const accumulate = (line: number, original: number, weight: number): number =>
  original + line * weight;

describe("bresenhamLine", () => {
  it("walks a shallow line", () => {
    expect([...bresenhamLine({ x: 0, y: 0 }, { x: 5, y: 2 })]).toEqual([
      [0, 0],
      [1, 0],
      [2, 1],
      [3, 1],
      [4, 2],
      [5, 2],
    ]);
  });

  it("walks a steep line along y", () => {
    expect([...bresenhamLine({ x: 0, y: 0 }, { x: 1, y: 3 })]).toEqual([
      [0, 0],
      [0, 1],
      [1, 2],
      [1, 3],
    ]);
  });

  it("rounds fractional endpoints", () => {
    expect([...bresenhamLine({ x: 0.4, y: 0.6 }, { x: 2.5, y: 0.6 })]).toEqual([
      [0, 1],
      [1, 1],
      [2, 1],
      [3, 1],
    ]);
  });

  it("yields a reversed segment in increasing x", () => {
    expect([...bresenhamLine({ x: 5, y: 2 }, { x: 0, y: 0 })]).toEqual([
      ...bresenhamLine({ x: 0, y: 0 }, { x: 5, y: 2 }),
    ]);
  });

  it("starts and ends on the rounded endpoints and stays monotonic", () => {
    const cases: Array<[number, number, number, number]> = [
      [0, 0, 17, 5],
      [2.6, 1.2, 9.4, 30.7],
      [-3, 4, 12, -6],
      [1, 1, 1, 1],
    ];
    for (const [x0, y0, x1, y1] of cases) {
      const pts = [...bresenhamLine({ x: x0, y: y0 }, { x: x1, y: y1 })];
      const steep = Math.abs(Math.round(y1) - Math.round(y0)) > Math.abs(Math.round(x1) - Math.round(x0));
      const axis = steep ? 1 : 0;
      const ends = [
        [Math.round(x0), Math.round(y0)],
        [Math.round(x1), Math.round(y1)],
      ].sort((a, b) => a[axis] - b[axis]);
      expect(pts[0]).toEqual(ends[0]);
      expect(pts[pts.length - 1]).toEqual(ends[1]);
      for (let i = 1; i < pts.length; i++) {
        expect(pts[i][axis] - pts[i - 1][axis]).toBe(1);
      }
    }
  });
});

describe("drawLineSegment", () => {
  it("drops pixels outside the surface", () => {
    const surface = new GridSurface(3, 3);
    drawLineSegment(surface, { x: -2, y: 1 }, { x: 5, y: 1 }, 1);
    expect(surface.painted()).toEqual(["0,1", "1,1", "2,1"]);
  });
});

describe("drawAntialiasedLineSegment", () => {
  it("splits coverage between the two rows around a shallow line", () => {
    const surface = new GridSurface(5, 3);
    drawAntialiasedLineSegment(surface, { x: 0, y: 0 }, { x: 4, y: 1 }, 1, accumulate);
    expect(surface.cells).toEqual([
      1, 0.75, 0.5, 0.25, 0,
      0, 0.25, 0.5, 0.75, 1,
      0, 0, 0, 0, 0,
    ]);
  });

  it("transposes steep lines", () => {
    const surface = new GridSurface(3, 5);
    drawAntialiasedLineSegment(surface, { x: 0, y: 0 }, { x: 1, y: 4 }, 1, accumulate);
    expect(surface.cells).toEqual([
      1, 0, 0,
      0.75, 0.25, 0,
      0.5, 0.5, 0,
      0.25, 0.75, 0,
      0, 1, 0,
    ]);
  });

  it("draws the same pixels in either direction", () => {
    const forward = new GridSurface(5, 3);
    const backward = new GridSurface(5, 3);
    drawAntialiasedLineSegment(forward, { x: 0, y: 0 }, { x: 4, y: 1 }, 1, accumulate);
    drawAntialiasedLineSegment(backward, { x: 4, y: 1 }, { x: 0, y: 0 }, 1, accumulate);
    expect(backward.cells).toEqual(forward.cells);
  });

  it("blends RGBA pixels through interpolate", () => {
    const image = new RgbaImage(3, 1);
    drawAntialiasedLineSegment(image, { x: 0, y: 0 }, { x: 2, y: 0 }, [255, 0, 0, 255], interpolate);
    expect(image.getPixel(0, 0)).toEqual([255, 0, 0, 255]);
    expect(image.getPixel(2, 0)).toEqual([255, 0, 0, 255]);
  });
});
