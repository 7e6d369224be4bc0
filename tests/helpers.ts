import { isRenderError } from "../src/errors.js";
import type { ImageSource } from "../src/image/source.js";
import { RgbaImage, type DrawingSurface, type Rgba } from "../src/raster/image.js";
import type { GlyphCoverage, GlyphService, TextExtent } from "../src/text/glyphs.js";

/** Numeric surface for primitive tests; 0 means unpainted */
export class GridSurface implements DrawingSurface<number> {
  readonly cells: number[];

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.cells = new Array<number>(width * height).fill(0);
  }

  getPixel(x: number, y: number): number {
    return this.cells[y * this.width + x];
  }

  putPixel(x: number, y: number, value: number): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`write outside surface at (${x}, ${y})`);
    }
    this.cells[y * this.width + x] = value;
  }

  /** Painted pixels as "x,y", row-major */
  painted(): string[] {
    const out: string[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getPixel(x, y) !== 0) out.push(`${x},${y}`);
      }
    }
    return out;
  }

  /** Painted x coordinates of row `y` */
  row(y: number): number[] {
    const out: number[] = [];
    for (let x = 0; x < this.width; x++) {
      if (this.getPixel(x, y) !== 0) out.push(x);
    }
    return out;
  }
}

/** Kind of the RenderError thrown by `fn`, "other" for any other error, undefined if none */
export function renderErrorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isRenderError(err) ? err.kind : "other";
  }
  return undefined;
}

export function solidImage(width: number, height: number, pixel: Rgba): RgbaImage {
  const image = new RgbaImage(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      image.putPixel(x, y, pixel);
    }
  }
  return image;
}

/** Serves the same decoded image for every source and records each request */
export class FakeImageSource implements ImageSource {
  readonly requests: Array<{ source: string; maxWidth: number; maxHeight: number }> = [];

  constructor(private readonly image: RgbaImage = new RgbaImage(0, 0)) {}

  async loadThumbnail(source: string, maxWidth: number, maxHeight: number): Promise<RgbaImage> {
    this.requests.push({ source, maxWidth, maxHeight });
    return this.image.clone();
  }
}

/** Lays out every text as the same coverage block and records each request */
export class FakeGlyphs implements GlyphService {
  readonly requests: Array<{ text: string; maxScale: number; maxWidth: number; maxHeight: number }> =
    [];

  constructor(
    private readonly width = 0,
    private readonly height = 0,
    private readonly values: readonly number[] = []
  ) {}

  measure(): TextExtent {
    return { width: this.width, height: this.height };
  }

  layout(text: string, maxScale: number, maxWidth: number, maxHeight: number): GlyphCoverage {
    this.requests.push({ text, maxScale, maxWidth, maxHeight });
    return {
      width: this.width,
      height: this.height,
      scale: maxScale,
      coverage: Float32Array.from(this.values),
    };
  }
}
