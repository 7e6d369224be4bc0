/** An RGBA pixel, one byte per channel */
export type Rgba = readonly [number, number, number, number];

/**
 * Minimal pixel access every drawing primitive works against.
 * Implementations may throw on out-of-range access; primitives never issue one.
 */
export interface DrawingSurface<P> {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): P;
  putPixel(x: number, y: number, pixel: P): void;
}

export function inBounds<P>(surface: DrawingSurface<P>, x: number, y: number): boolean {
  return x >= 0 && x < surface.width && y >= 0 && y < surface.height;
}

/** Set pixel at (x, y) if it lies within the surface, otherwise do nothing */
export function drawIfInBounds<P>(
  surface: DrawingSurface<P>,
  x: number,
  y: number,
  pixel: P
): void {
  if (inBounds(surface, x, y)) {
    surface.putPixel(x, y, pixel);
  }
}

/** Row-major, 4-channel image buffer. New images are fully transparent. */
export class RgbaImage implements DrawingSurface<Rgba> {
  static readonly CHANNELS = 4;

  readonly data: Uint8ClampedArray;

  constructor(
    readonly width: number,
    readonly height: number,
    data?: Uint8ClampedArray
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Image size must be a non-negative integer, got ${width}x${height}`);
    }
    const length = width * height * RgbaImage.CHANNELS;
    if (data && data.length !== length) {
      throw new RangeError(`Expected ${length} bytes for ${width}x${height}, got ${data.length}`);
    }
    this.data = data ?? new Uint8ClampedArray(length);
  }

  /** Wrap raw RGBA bytes (e.g. decoder output) without copying */
  static fromRaw(width: number, height: number, bytes: Uint8Array): RgbaImage {
    return new RgbaImage(
      width,
      height,
      new Uint8ClampedArray(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    );
  }

  private offset(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || !inBounds(this, x, y)) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`);
    }
    return (y * this.width + x) * RgbaImage.CHANNELS;
  }

  getPixel(x: number, y: number): Rgba {
    const i = this.offset(x, y);
    const d = this.data;
    return [d[i], d[i + 1], d[i + 2], d[i + 3]];
  }

  putPixel(x: number, y: number, pixel: Rgba): void {
    const i = this.offset(x, y);
    this.data[i] = pixel[0];
    this.data[i + 1] = pixel[1];
    this.data[i + 2] = pixel[2];
    this.data[i + 3] = pixel[3];
  }

  clone(): RgbaImage {
    return new RgbaImage(this.width, this.height, this.data.slice());
  }

  /**
   * Copy `src` so its top-left corner lands at (x, y).
   * Only the part overlapping this image is copied.
   */
  copyFrom(src: RgbaImage, x: number, y: number): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + src.width);
    const y1 = Math.min(this.height, y + src.height);
    if (x1 <= x0 || y1 <= y0) return;

    const rowBytes = (x1 - x0) * RgbaImage.CHANNELS;
    for (let ty = y0; ty < y1; ty++) {
      const from = ((ty - y) * src.width + (x0 - x)) * RgbaImage.CHANNELS;
      const to = (ty * this.width + x0) * RgbaImage.CHANNELS;
      this.data.set(src.data.subarray(from, from + rowBytes), to);
    }
  }

  /** Copy out a sub-image; the requested window is clipped to this image */
  crop(x: number, y: number, w: number, h: number): RgbaImage {
    const x0 = Math.max(0, Math.min(x, this.width));
    const y0 = Math.max(0, Math.min(y, this.height));
    const x1 = Math.max(x0, Math.min(x + w, this.width));
    const y1 = Math.max(y0, Math.min(y + h, this.height));
    const out = new RgbaImage(x1 - x0, y1 - y0);
    out.copyFrom(this, -x0, -y0);
    return out;
  }
}
