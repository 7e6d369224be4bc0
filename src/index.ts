// Constants
export {
  SCREEN_W,
  SCREEN_H,
  SLIDE_W,
  DEFAULT_STEP,
  DEFAULT_FPS,
  DEFAULT_SWIPE_PX_PER_SEC,
  DEFAULT_COVER_SEC,
  DEFAULT_ENDING_SEC,
  DEFAULT_BACK_COLOR,
  COLOR_BLOCK_RADIUS,
  GLYPH_SUPERSAMPLE,
  GLYPH_CURVE_STEPS,
  TRANSPARENT,
  POSITION_3_1,
  COLOR_2_1,
  COLOR_3_1,
  BLACK,
} from "./constants.js";

// Errors
export type { RenderErrorKind } from "./errors.js";
export { RenderError, isRenderError } from "./errors.js";

// Schemas
export type { Color } from "./schema/color.js";
export {
  ColorSchema,
  parseColor,
  colorFromBytes,
  colorToHex,
  toRgba,
  namedColorTable,
} from "./schema/color.js";
export type { VideoConfig, VideoConfigInput } from "./schema/config.js";
export { VideoConfigSchema, buildVideoConfig } from "./schema/config.js";
export type { InfoDocument, SlideData } from "./schema/operation.js";
export {
  PositionSchema,
  OperationSchema,
  InfoDocumentSchema,
  SlideDataSchema,
  parseInfo,
  parseSlideData,
} from "./schema/operation.js";

// Raster
export type { Rgba, DrawingSurface } from "./raster/image.js";
export { RgbaImage, inBounds, drawIfInBounds } from "./raster/image.js";
export type { BlendFn } from "./raster/line.js";
export { bresenhamLine, drawLineSegment, drawAntialiasedLineSegment } from "./raster/line.js";
export type { ConicVisitor } from "./raster/ellipse.js";
export {
  midpointCircle,
  midpointEllipse,
  drawHollowCircle,
  drawFilledCircle,
  drawHollowEllipse,
  drawFilledEllipse,
} from "./raster/ellipse.js";
export type { EdgePlotter } from "./raster/polygon.js";
export {
  scanlineIntersections,
  drawPolygonWith,
  drawPolygon,
  drawAntialiasedPolygon,
  drawHollowPolygon,
} from "./raster/polygon.js";
export {
  drawFilledRect,
  drawHollowRect,
  drawFilledRoundedRect,
  drawHollowRoundedRect,
} from "./raster/rect.js";
export { bezierSegmentCount, cubicBezierPoint, drawCubicBezierCurve } from "./raster/bezier.js";
export { drawCross } from "./raster/cross.js";
export {
  drawOnCopy,
  drawLineSegmentOnCopy,
  drawAntialiasedLineSegmentOnCopy,
  drawHollowCircleOnCopy,
  drawFilledCircleOnCopy,
  drawHollowEllipseOnCopy,
  drawFilledEllipseOnCopy,
  drawPolygonOnCopy,
  drawAntialiasedPolygonOnCopy,
  drawHollowPolygonOnCopy,
  drawFilledRectOnCopy,
  drawHollowRectOnCopy,
  drawFilledRoundedRectOnCopy,
  drawHollowRoundedRectOnCopy,
  drawCubicBezierCurveOnCopy,
  drawCrossOnCopy,
} from "./raster/copy.js";

// Text
export type { TextExtent, GlyphCoverage, GlyphService } from "./text/glyphs.js";
export { fitScale, drawTextCentered } from "./text/glyphs.js";
export { OpentypeGlyphService, loadFont, flattenPath, rasterizeEdges } from "./text/opentype-glyphs.js";

// Image collaborators
export type { ImageSource } from "./image/source.js";
export { SharpImageSource } from "./image/source.js";
export type { FrameSink } from "./image/sink.js";
export { PngFrameSink } from "./image/sink.js";

// Slides
export type {
  Position,
  Element,
  ImageElement,
  TextElement,
  ColorElement,
  RenderDeps,
} from "./slide/element.js";
export { positionToRect, renderElement } from "./slide/element.js";
export type {
  Slide,
  Operation,
  ImageOperation,
  TextOperation,
  ColorOperation,
} from "./slide/slide.js";
export {
  sortOperations,
  createSlide,
  addImage,
  addText,
  addColor,
  generateSlide,
  generateSlides,
} from "./slide/slide.js";
export { renderSlide } from "./slide/render.js";

// Video
export type { SegmentRole } from "./video/chunks.js";
export { chunkSlides, segmentRole } from "./video/chunks.js";
export type { ScreenSize } from "./video/strip.js";
export {
  composeStrip,
  cropCover,
  cropEnding,
  scrollPixels,
  scrollSeconds,
} from "./video/strip.js";
export type {
  StillSegment,
  ScrollSegment,
  VideoSegment,
  VideoPlan,
  PipelineDeps,
  RenderVideoOptions,
} from "./video/pipeline.js";
export { renderVideoFrames } from "./video/pipeline.js";

// Utils
export type { Point, Rect } from "./utils/geometry.js";
export {
  point,
  pointsEqual,
  rectAt,
  rectRight,
  rectBottom,
  intersectRects,
  rectArea,
  roundPixel,
} from "./utils/geometry.js";
export type { ChannelType } from "./utils/clamp.js";
export { clamp, weightedSum, interpolate } from "./utils/clamp.js";
export { readJSON, writeJSON, frameNames, isDirectory, isFile } from "./utils/fs-helpers.js";
export type { Command } from "./utils/command.js";
export { parseCommand } from "./utils/command.js";
