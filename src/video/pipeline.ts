import * as path from "node:path";
import { RenderError } from "../errors.js";
import type { FrameSink } from "../image/sink.js";
import type { RgbaImage } from "../raster/image.js";
import type { VideoConfig } from "../schema/config.js";
import type { RenderDeps } from "../slide/element.js";
import type { Slide } from "../slide/slide.js";
import { frameNames } from "../utils/fs-helpers.js";
import { chunkSlides, segmentRole } from "./chunks.js";
import {
  type ScreenSize,
  composeStrip,
  cropCover,
  cropEnding,
  scrollPixels,
  scrollSeconds,
} from "./strip.js";

/** A still frame shown for a fixed time (cover or ending) */
export interface StillSegment {
  kind: "still";
  role: "cover" | "ending";
  frame: string;
  seconds: number;
}

/** A chunk strip scrolled right to left across the screen */
export interface ScrollSegment {
  kind: "scroll";
  chunk: number;
  frame: string;
  pixels: number;
  seconds: number;
}

export type VideoSegment = StillSegment | ScrollSegment;

/** Everything the downstream encoder needs; frame names are relative to `workDir` */
export interface VideoPlan {
  screen: ScreenSize;
  fps: number;
  backColor: string;
  swipePixelsPerSec: number;
  workDir: string;
  savePath: string;
  segments: VideoSegment[];
}

export interface PipelineDeps extends RenderDeps {
  sink: FrameSink;
}

export interface RenderVideoOptions {
  /** Checked before each chunk; a chunk in progress always completes */
  signal?: AbortSignal;
  log?: (message: string) => void;
}

/**
 * Render the frames of a scrolling slide video into `config.workDir`.
 *
 * Slides are split into overlapping chunks; each chunk is composed into one strip
 * saved as `NN.png`. The first chunk also yields `cover.png` and the last `ending.png`.
 * Segments come back in playback order.
 */
export async function renderVideoFrames(
  slides: readonly Slide[],
  config: VideoConfig,
  deps: PipelineDeps,
  options: RenderVideoOptions = {}
): Promise<VideoPlan> {
  const { signal, log } = options;
  const [, screenHeight] = config.screen;
  const chunks = chunkSlides(slides, config.step, config.overlap);
  if (chunks.length === 0) {
    throw new RenderError(
      "InsufficientSlides",
      `${slides.length} slides leave nothing to scroll with an overlap of ${config.overlap}`
    );
  }

  const segments: VideoSegment[] = [];
  const save = async (image: RgbaImage, name: string, index: number): Promise<void> => {
    await deps.sink.save(image, path.join(config.workDir, name));
    log?.(`${index + 1}/${chunks.length}: ${name} rendered`);
  };

  for (const [index, chunk] of chunks.entries()) {
    signal?.throwIfAborted();
    const names = frameNames(index);
    const role = segmentRole(index, chunks.length);
    const strip = await composeStrip(
      chunk,
      config.slideWidth,
      screenHeight,
      deps,
      config.separatorColor
    );

    if (role === "first" || role === "only") {
      await save(cropCover(strip, config.screen), names.cover, index);
      segments.push({ kind: "still", role: "cover", frame: names.cover, seconds: config.coverSec });
    }

    await save(strip, names.chunk, index);
    const pixels = scrollPixels(chunk.length, config.overlap, config.slideWidth);
    segments.push({
      kind: "scroll",
      chunk: index,
      frame: names.chunk,
      pixels,
      seconds: scrollSeconds(pixels, config.swipePixelsPerSec),
    });

    if (role === "last" || role === "only") {
      await save(cropEnding(strip, config.screen), names.ending, index);
      segments.push({ kind: "still", role: "ending", frame: names.ending, seconds: config.endingSec });
    }
  }

  return {
    screen: config.screen,
    fps: config.fps,
    backColor: config.backColor,
    swipePixelsPerSec: config.swipePixelsPerSec,
    workDir: config.workDir,
    savePath: config.savePath,
    segments,
  };
}
