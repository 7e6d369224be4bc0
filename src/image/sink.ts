import * as fs from "node:fs/promises";
import * as path from "node:path";
import sharp from "sharp";
import { RgbaImage } from "../raster/image.js";

/** Destination for finished frames, addressed by path */
export interface FrameSink {
  save(image: RgbaImage, filePath: string): Promise<void>;
}

/** Writes frames as lossless PNG, creating directories as needed */
export class PngFrameSink implements FrameSink {
  async save(image: RgbaImage, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
      raw: { width: image.width, height: image.height, channels: RgbaImage.CHANNELS },
    })
      .png()
      .toFile(filePath);
  }
}
