import sharp from "sharp";
import { RenderError } from "../errors.js";
import { RgbaImage } from "../raster/image.js";

/** Decodes image references into RGBA buffers */
export interface ImageSource {
  /**
   * Decode `source` and scale it down to fit `maxWidth × maxHeight`, keeping the aspect ratio.
   * Fails with `SourceUnavailable`.
   */
  loadThumbnail(source: string, maxWidth: number, maxHeight: number): Promise<RgbaImage>;
}

/** ImageSource over local files (any format sharp decodes) */
export class SharpImageSource implements ImageSource {
  async loadThumbnail(source: string, maxWidth: number, maxHeight: number): Promise<RgbaImage> {
    if (maxWidth < 1 || maxHeight < 1) return new RgbaImage(0, 0);
    try {
      const { data, info } = await sharp(source)
        .resize(Math.floor(maxWidth), Math.floor(maxHeight), {
          fit: "inside",
          withoutEnlargement: true,
        })
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      return RgbaImage.fromRaw(info.width, info.height, data);
    } catch (err) {
      throw new RenderError("SourceUnavailable", `Cannot load image ${source}`, { cause: err });
    }
  }
}
