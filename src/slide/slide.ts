import { RenderError } from "../errors.js";
import type { Color } from "../schema/color.js";
import type { Element, Position } from "./element.js";

/** An ordered list of elements; later elements paint over earlier ones */
export interface Slide {
  readonly elements: readonly Element[];
}

export interface ImageOperation {
  kind: "image";
  position: Position;
  zIndex: number;
}

export interface TextOperation {
  kind: "text";
  maxScale: number;
  color: Color;
  position: Position;
  zIndex: number;
}

export interface ColorOperation {
  kind: "color";
  color: Color;
  position: Position;
  zIndex: number;
}

/** Slide template entry; image and text operations take their content from a data row */
export type Operation = ImageOperation | TextOperation | ColorOperation;

/** Order by `zIndex`; operations with equal index keep their declaration order */
export function sortOperations(operations: readonly Operation[]): Operation[] {
  return [...operations].sort((a, b) => a.zIndex - b.zIndex);
}

export function createSlide(elements: readonly Element[] = []): Slide {
  return { elements: [...elements] };
}

export function addImage(slide: Slide, source: string, position: Position): Slide {
  return createSlide([...slide.elements, { kind: "image", source, position }]);
}

export function addText(
  slide: Slide,
  content: string,
  maxScale: number,
  color: Color,
  position: Position
): Slide {
  return createSlide([...slide.elements, { kind: "text", content, maxScale, color, position }]);
}

export function addColor(slide: Slide, color: Color, position: Position): Slide {
  return createSlide([...slide.elements, { kind: "color", color, position }]);
}

/**
 * Instantiate `operations` in the given order. Image and text operations each consume
 * the next string of `data`; color operations consume none. Unused strings are ignored.
 */
export function generateSlide(operations: readonly Operation[], data: readonly string[]): Slide {
  let next = 0;
  const take = (what: string): string => {
    const value = data[next];
    if (value === undefined) {
      throw new RenderError(
        "InsufficientData",
        `Not enough data for ${what} (operation needs item ${next + 1}, row has ${data.length})`
      );
    }
    next += 1;
    return value;
  };

  const elements = operations.map((op): Element => {
    switch (op.kind) {
      case "image":
        return { kind: "image", source: take("image"), position: op.position };
      case "text":
        return {
          kind: "text",
          content: take("text"),
          maxScale: op.maxScale,
          color: op.color,
          position: op.position,
        };
      case "color":
        return { kind: "color", color: op.color, position: op.position };
    }
  });
  return { elements };
}

/** Sort operations by z-index once, then generate one slide per data row */
export function generateSlides(
  operations: readonly Operation[],
  rows: ReadonlyArray<readonly string[]>
): Slide[] {
  const sorted = sortOperations(operations);
  return rows.map((row) => generateSlide(sorted, row));
}
