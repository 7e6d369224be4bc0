import { z } from "zod";
import { ColorSchema } from "./color.js";
import { VideoConfigSchema } from "./config.js";

export const PositionSchema = z.object({
  left: z.number().int(),
  top: z.number().int(),
  height: z.number().int().nonnegative(),
});

const ZIndex = z.number().int().default(0);

export const OperationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("image"), position: PositionSchema, zIndex: ZIndex }),
  z.object({
    kind: z.literal("text"),
    maxScale: z.number().positive(),
    color: ColorSchema,
    position: PositionSchema,
    zIndex: ZIndex,
  }),
  z.object({
    kind: z.literal("color"),
    color: ColorSchema,
    position: PositionSchema,
    zIndex: ZIndex,
  }),
]);

/** A render job: slide template, video configuration and the data file feeding it */
export const InfoDocumentSchema = z.object({
  operations: z.array(OperationSchema).min(1),
  config: VideoConfigSchema.default({}),
  data: z.string().min(1),
});
export type InfoDocument = z.infer<typeof InfoDocumentSchema>;

/** One row of strings per slide */
export const SlideDataSchema = z.array(z.array(z.string()));
export type SlideData = z.infer<typeof SlideDataSchema>;

/** Parse and validate a job document. Throws ZodError on invalid input. */
export function parseInfo(data: unknown): InfoDocument {
  return InfoDocumentSchema.parse(data);
}

/** Parse and validate a data document. Throws ZodError on invalid input. */
export function parseSlideData(data: unknown): SlideData {
  return SlideDataSchema.parse(data);
}

