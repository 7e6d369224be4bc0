import * as path from "node:path";
import { z } from "zod";
import {
  DEFAULT_BACK_COLOR,
  DEFAULT_COVER_SEC,
  DEFAULT_ENDING_SEC,
  DEFAULT_FPS,
  DEFAULT_STEP,
  DEFAULT_SWIPE_PX_PER_SEC,
  SCREEN_H,
  SCREEN_W,
  SLIDE_W,
} from "../constants.js";
import { RenderError } from "../errors.js";
import { type Color, ColorSchema } from "./color.js";

const PositiveInt = z.number().int().positive();

export const VideoConfigSchema = z.object({
  screen: z.tuple([PositiveInt, PositiveInt]).default([SCREEN_W, SCREEN_H]),
  fps: PositiveInt.default(DEFAULT_FPS),
  backColor: z.string().min(1).default(DEFAULT_BACK_COLOR),
  coverSec: z.number().int().nonnegative().default(DEFAULT_COVER_SEC),
  endingSec: z.number().int().nonnegative().default(DEFAULT_ENDING_SEC),
  swipePixelsPerSec: PositiveInt.default(DEFAULT_SWIPE_PX_PER_SEC),
  slideWidth: PositiveInt.default(SLIDE_W),
  step: PositiveInt.default(DEFAULT_STEP),
  workDir: z.string().min(1).optional(),
  savePath: z.string().min(1).optional(),
  font: z.string().min(1).optional(),
  separatorColor: ColorSchema.optional(),
});
export type VideoConfigInput = z.input<typeof VideoConfigSchema>;

/** Fully resolved video configuration; `overlap` is derived from screen and slide width */
export interface VideoConfig {
  readonly screen: readonly [number, number];
  readonly fps: number;
  readonly backColor: string;
  readonly coverSec: number;
  readonly endingSec: number;
  readonly swipePixelsPerSec: number;
  readonly slideWidth: number;
  readonly step: number;
  readonly overlap: number;
  readonly workDir: string;
  readonly savePath: string;
  readonly font?: string;
  readonly separatorColor?: Color;
}

/**
 * Validate a configuration document and derive `overlap`.
 * Throws ZodError on shape errors and RenderError("InvalidConfig") when the screen
 * width is not a multiple of the slide width or `step` does not exceed `overlap`.
 * `workDir` defaults to `./work`, `savePath` to `<workDir>/output`.
 */
export function buildVideoConfig(input: unknown = {}): VideoConfig {
  const parsed = VideoConfigSchema.parse(input);
  const [screenWidth] = parsed.screen;

  if (screenWidth % parsed.slideWidth !== 0) {
    throw new RenderError(
      "InvalidConfig",
      `Screen width must be a multiple of slide width; ${screenWidth} % ${parsed.slideWidth} != 0`
    );
  }
  const overlap = screenWidth / parsed.slideWidth;
  if (parsed.step <= overlap) {
    throw new RenderError(
      "InvalidConfig",
      `step (${parsed.step}) must be greater than overlap (${overlap})`
    );
  }

  const workDir = parsed.workDir ?? path.resolve("work");
  return Object.freeze({
    ...parsed,
    overlap,
    workDir,
    savePath: parsed.savePath ?? path.join(workDir, "output"),
  });
}
