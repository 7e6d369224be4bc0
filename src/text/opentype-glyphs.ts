import { readFile } from "node:fs/promises";
import opentype from "opentype.js";
import type { Font, PathCommand } from "opentype.js";
import { GLYPH_CURVE_STEPS, GLYPH_SUPERSAMPLE } from "../constants.js";
import { RenderError } from "../errors.js";
import type { Point } from "../utils/geometry.js";
import { type GlyphCoverage, type GlyphService, type TextExtent, fitScale } from "./glyphs.js";

interface Edge {
  a: Point;
  b: Point;
}

/** Flatten outline commands into closed-contour edges */
export function flattenPath(commands: readonly PathCommand[], curveSteps = GLYPH_CURVE_STEPS): Edge[] {
  const edges: Edge[] = [];
  let start: Point | null = null;
  let cursor: Point = { x: 0, y: 0 };

  const lineTo = (p: Point): void => {
    if (cursor.x !== p.x || cursor.y !== p.y) edges.push({ a: cursor, b: p });
    cursor = p;
  };
  const close = (): void => {
    if (start) lineTo(start);
    start = null;
  };

  for (const cmd of commands) {
    switch (cmd.type) {
      case "M":
        close();
        cursor = { x: cmd.x, y: cmd.y };
        start = cursor;
        break;
      case "L":
        lineTo({ x: cmd.x, y: cmd.y });
        break;
      case "Q": {
        const p0 = cursor;
        for (let i = 1; i <= curveSteps; i++) {
          const t = i / curveSteps;
          const u = 1 - t;
          lineTo({
            x: u * u * p0.x + 2 * u * t * cmd.x1 + t * t * cmd.x,
            y: u * u * p0.y + 2 * u * t * cmd.y1 + t * t * cmd.y,
          });
        }
        break;
      }
      case "C": {
        const p0 = cursor;
        for (let i = 1; i <= curveSteps; i++) {
          const t = i / curveSteps;
          const u = 1 - t;
          lineTo({
            x: u * u * u * p0.x + 3 * u * u * t * cmd.x1 + 3 * u * t * t * cmd.x2 + t * t * t * cmd.x,
            y: u * u * u * p0.y + 3 * u * u * t * cmd.y1 + 3 * u * t * t * cmd.y2 + t * t * t * cmd.y,
          });
        }
        break;
      }
      case "Z":
        close();
        break;
    }
  }
  close();
  return edges;
}

/**
 * Nonzero-winding coverage of `edges` over a `width × height` pixel grid,
 * sampled `samples × samples` times per pixel.
 */
export function rasterizeEdges(
  edges: readonly Edge[],
  width: number,
  height: number,
  samples = GLYPH_SUPERSAMPLE
): Float32Array {
  const coverage = new Float32Array(width * height);
  const weight = 1 / (samples * samples);
  const columns = width * samples;

  for (let row = 0; row < height * samples; row++) {
    const sy = (row + 0.5) / samples;
    const crossings: Array<{ x: number; dir: number }> = [];
    for (const { a, b } of edges) {
      if (a.y === b.y) continue;
      const upward = a.y > b.y;
      const lo = upward ? b : a;
      const hi = upward ? a : b;
      if (sy < lo.y || sy >= hi.y) continue;
      const x = lo.x + ((sy - lo.y) / (hi.y - lo.y)) * (hi.x - lo.x);
      crossings.push({ x, dir: upward ? -1 : 1 });
    }
    crossings.sort((p, q) => p.x - q.x);

    const py = Math.floor(row / samples);
    let winding = 0;
    for (let i = 0; i < crossings.length; i++) {
      const crossing = crossings[i];
      const next = crossings[i + 1];
      if (!crossing) break;
      winding += crossing.dir;
      if (winding === 0 || !next) continue;
      // sample columns whose centers fall in [crossing.x, next.x)
      const first = Math.max(0, Math.ceil(crossing.x * samples - 0.5));
      const last = Math.min(columns, Math.ceil(next.x * samples - 0.5));
      for (let col = first; col < last; col++) {
        coverage[py * width + Math.floor(col / samples)] += weight;
      }
    }
  }

  for (let i = 0; i < coverage.length; i++) {
    coverage[i] = Math.min(1, coverage[i]);
  }
  return coverage;
}

/** Single-line text layout on top of an opentype.js font */
export class OpentypeGlyphService implements GlyphService {
  private constructor(private readonly font: Font) {}

  /** Parse TrueType/OpenType bytes; fails with `InvalidFont` */
  static fromBytes(bytes: Uint8Array): OpentypeGlyphService {
    let font: Font;
    try {
      font = opentype.parse(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
    } catch (err) {
      throw new RenderError("InvalidFont", "Font bytes could not be parsed", { cause: err });
    }
    if (!font.supported || font.unitsPerEm <= 0) {
      throw new RenderError("InvalidFont", "Font format is not supported");
    }
    return new OpentypeGlyphService(font);
  }

  measure(text: string, scale: number): TextExtent {
    const { ascender, descender, unitsPerEm } = this.font;
    return {
      width: this.font.getAdvanceWidth(text, scale),
      height: ((ascender - descender) / unitsPerEm) * scale,
    };
  }

  layout(text: string, maxScale: number, maxWidth: number, maxHeight: number): GlyphCoverage {
    const scale = fitScale(this.measure(text, maxScale), maxScale, maxWidth, maxHeight);
    const extent = this.measure(text, scale);
    const width = Math.max(0, Math.min(Math.ceil(extent.width), Math.floor(maxWidth)));
    const height = Math.max(0, Math.min(Math.ceil(extent.height), Math.floor(maxHeight)));
    if (width === 0 || height === 0) {
      return { width, height, scale, coverage: new Float32Array(width * height) };
    }

    const baseline = (this.font.ascender / this.font.unitsPerEm) * scale;
    const path = this.font.getPath(text, 0, baseline, scale);
    return { width, height, scale, coverage: rasterizeEdges(flattenPath(path.commands), width, height) };
  }
}

/** Read a font file and parse it */
export async function loadFont(fontPath: string): Promise<OpentypeGlyphService> {
  let bytes: Buffer;
  try {
    bytes = await readFile(fontPath);
  } catch (err) {
    throw new RenderError("SourceUnavailable", `Cannot read font file ${fontPath}`, { cause: err });
  }
  return OpentypeGlyphService.fromBytes(bytes);
}
