import type { Color } from "./schema/color.js";
import type { Position } from "./slide/element.js";

/** Screen (video frame) dimensions (px) */
export const SCREEN_W = 1920;
export const SCREEN_H = 1080;

/** Width of a single slide inside the scrolling strip (px) */
export const SLIDE_W = 480;

/** Slides per rendered chunk, overlap included */
export const DEFAULT_STEP = 20;

export const DEFAULT_FPS = 60;

/** Horizontal scroll speed of the mid segments */
export const DEFAULT_SWIPE_PX_PER_SEC = 160;

/** Duration of the still cover and ending segments (s) */
export const DEFAULT_COVER_SEC = 4;
export const DEFAULT_ENDING_SEC = 4;

/** Background color handed to the encoder */
export const DEFAULT_BACK_COLOR = "white";

/** Corner radius of color-block elements (px) */
export const COLOR_BLOCK_RADIUS = 10;

/** Supersampling factor per axis for glyph coverage */
export const GLYPH_SUPERSAMPLE = 4;

/** Line segments used to flatten one quadratic/cubic glyph curve */
export const GLYPH_CURVE_STEPS = 8;

/** Fully transparent pixel, the initial content of every frame */
export const TRANSPARENT: readonly [number, number, number, number] = [0, 0, 0, 0];

/** Image / caption / caption layout for a 1080px tall slide */
export const POSITION_3_1: readonly [Position, Position, Position] = [
  { left: 1, top: 0, height: 520 },
  { left: 1, top: 520, height: 214 },
  { left: 1, top: 734, height: 346 },
];

export const COLOR_2_1: readonly [Color, Color] = [
  [245, 160, 50],
  [255, 225, 200],
];
export const COLOR_3_1: readonly [Color, Color, Color] = [
  [245, 165, 50],
  [255, 225, 150],
  [200, 250, 250],
];

export const BLACK: Color = [0, 0, 0];
