import { describe, it, expect } from "vitest";
import {
  drawCrossOnCopy,
  drawFilledRectOnCopy,
  drawLineSegmentOnCopy,
  drawOnCopy,
  drawPolygonOnCopy,
} from "../../src/raster/copy.js";
import { drawCross } from "../../src/raster/cross.js";
import { RgbaImage } from "../../src/raster/image.js";
import { drawLineSegment } from "../../src/raster/line.js";
import { rectAt } from "../../src/utils/geometry.js";
import { GridSurface } from "../helpers.js";

const RED = [255, 0, 0, 255] as const;
const CLEAR = [0, 0, 0, 0] as const;

describe("copy-then-mutate forms", () => {
  it("paint a copy and leave the input untouched", () => {
    const image = new RgbaImage(4, 4);
    const out = drawFilledRectOnCopy(image, rectAt(1, 1).ofSize(2, 2), RED);
    expect(out).not.toBe(image);
    expect(out.getPixel(1, 1)).toEqual(RED);
    expect(out.getPixel(0, 0)).toEqual(CLEAR);
    expect(image.getPixel(1, 1)).toEqual(CLEAR);
  });

  it("match the in-place result", () => {
    const source = new RgbaImage(6, 6);
    const copy = drawLineSegmentOnCopy(source, { x: 0, y: 0 }, { x: 5, y: 2 }, RED);
    const target = new RgbaImage(6, 6);
    drawLineSegment(target, { x: 0, y: 0 }, { x: 5, y: 2 }, RED);
    expect(Array.from(copy.data)).toEqual(Array.from(target.data));
  });

  it("hand the callback the clone it returns", () => {
    const image = new RgbaImage(2, 2);
    let drawnOn: RgbaImage | null = null;
    const out = drawOnCopy(image, (target) => {
      drawnOn = target;
    });
    expect(drawnOn).toBe(out);
    expect(out).not.toBe(image);
  });

  it("leave the input untouched when drawing fails", () => {
    const image = new RgbaImage(4, 4);
    expect(() =>
      drawPolygonOnCopy(
        image,
        [
          { x: 0, y: 0 },
          { x: 0, y: 0 },
        ],
        RED
      )
    ).toThrow();
    expect(Array.from(image.data).every((v) => v === 0)).toBe(true);
  });
});

describe("drawCross", () => {
  it("paints a plus sign", () => {
    const surface = new GridSurface(3, 3);
    drawCross(surface, 1, 1, 1);
    expect(surface.painted()).toEqual(["1,0", "0,1", "1,1", "2,1", "1,2"]);
  });

  it("clips at the corner", () => {
    const out = drawCrossOnCopy(new RgbaImage(3, 3), RED, 0, 0);
    expect(out.getPixel(0, 0)).toEqual(RED);
    expect(out.getPixel(1, 0)).toEqual(RED);
    expect(out.getPixel(0, 1)).toEqual(RED);
    expect(out.getPixel(1, 1)).toEqual(CLEAR);
  });
});
