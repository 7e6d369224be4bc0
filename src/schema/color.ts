import { readFileSync } from "node:fs";
import { z } from "zod";
import { RenderError } from "../errors.js";
import type { Rgba } from "../raster/image.js";

/** An opaque RGB color, one byte per channel */
export type Color = readonly [number, number, number];

const Byte = z.number().int().min(0).max(255);

const NamedColorTableSchema = z.record(z.tuple([Byte, Byte, Byte]));

const HEX_COLOR = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

const NAMED_COLORS_URL = new URL("../../data/named-colors.json", import.meta.url);

let namedColors: ReadonlyMap<string, Color> | null = null;

/** The CSS named-color table, read on first use and never mutated afterwards */
export function namedColorTable(): ReadonlyMap<string, Color> {
  if (namedColors === null) {
    const raw: unknown = JSON.parse(readFileSync(NAMED_COLORS_URL, "utf-8"));
    const table = NamedColorTableSchema.parse(raw);
    const map = new Map<string, Color>();
    for (const [name, rgb] of Object.entries(table)) {
      map.set(name, Object.freeze(rgb));
    }
    namedColors = map;
  }
  return namedColors;
}

/**
 * Parse `#RRGGBB` or a CSS color name (case-insensitive).
 * Throws RenderError("InvalidColor") for anything else.
 */
export function parseColor(text: string): Color {
  const value = text.trim();
  if (value.startsWith("#")) {
    const m = HEX_COLOR.exec(value);
    if (!m) {
      throw new RenderError("InvalidColor", `'${text}' starts with # but is not a #RRGGBB color`);
    }
    return [parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16)];
  }
  const named = namedColorTable().get(value.toLowerCase());
  if (!named) {
    throw new RenderError("InvalidColor", `'${text}' is neither a #RRGGBB color nor a known color name`);
  }
  return named;
}

/** Build a color from an RGB or RGBA byte array; alpha is dropped */
export function colorFromBytes(bytes: readonly number[]): Color {
  const [r = 0, g = 0, b = 0] = bytes;
  return [r, g, b];
}

/** The opaque pixel for a color */
export function toRgba(color: Color): Rgba {
  return [color[0], color[1], color[2], 255];
}

export function colorToHex(color: Color): string {
  return "#" + color.map((c) => c.toString(16).padStart(2, "0").toUpperCase()).join("");
}

/**
 * A color as written in job documents: `"#RRGGBB"`, a color name, or `[r, g, b]`.
 */
export const ColorSchema = z.union([
  z.tuple([Byte, Byte, Byte]).transform((rgb): Color => [rgb[0], rgb[1], rgb[2]]),
  z.string().transform((text, ctx): Color => {
    try {
      return parseColor(text);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  }),
]);
