import { describe, it, expect } from "vitest";
import { chunkSlides, segmentRole } from "../../src/video/chunks.js";
import { renderErrorKind } from "../helpers.js";

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe("chunkSlides", () => {
  it("windows a long run with the default step", () => {
    const chunks = chunkSlides(range(23), 20, 4);
    expect(chunks).toEqual([range(20), range(23).slice(16)]);
  });

  it("shares exactly `overlap` items between neighbours", () => {
    expect(chunkSlides(range(5), 3, 1)).toEqual([
      [0, 1, 2],
      [2, 3, 4],
    ]);
  });

  it("yields a single short window when everything fits", () => {
    expect(chunkSlides(range(6), 20, 4)).toEqual([range(6)]);
  });

  it("yields nothing when only the overlap is present", () => {
    expect(chunkSlides(range(4), 20, 4)).toEqual([]);
  });

  it("rejects fewer items than the overlap", () => {
    expect(renderErrorKind(() => chunkSlides(range(3), 20, 4))).toBe("InsufficientSlides");
  });

  it("rejects a step that does not advance", () => {
    expect(renderErrorKind(() => chunkSlides(range(10), 4, 4))).toBe("InvalidConfig");
    expect(renderErrorKind(() => chunkSlides(range(10), 4, 0))).toBe("InvalidConfig");
    expect(renderErrorKind(() => chunkSlides(range(10), 4.5, 1))).toBe("InvalidConfig");
  });
});

describe("segmentRole", () => {
  it("tags first, middle and last windows", () => {
    expect([0, 1, 2].map((i) => segmentRole(i, 3))).toEqual(["first", "mid", "last"]);
  });

  it("tags a lone window as only", () => {
    expect(segmentRole(0, 1)).toBe("only");
  });
});
