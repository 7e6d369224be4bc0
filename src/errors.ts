/** Failure categories surfaced by the renderer */
export type RenderErrorKind =
  | "InvalidColor"
  | "DegeneratePolygon"
  | "InsufficientData"
  | "InvalidConfig"
  | "InsufficientSlides"
  | "SourceUnavailable"
  | "InvalidFont";

/**
 * Error raised for malformed input and collaborator failures.
 * Out-of-canvas coordinates are never reported through this class; they are clipped.
 */
export class RenderError extends Error {
  constructor(
    public readonly kind: RenderErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

/** Narrow an unknown error to a RenderError, optionally of one kind */
export function isRenderError(
  err: unknown,
  kind?: RenderErrorKind
): err is RenderError {
  if (!(err instanceof RenderError)) return false;
  return kind === undefined || err.kind === kind;
}
