// backend/services/errors.ts

export type PipelineErrorKind =
  | "InputValidationError"
  | "ImageDecodeError"
  | "OcrCapabilityError"
  | "LlmCapabilityError"
  | "ResponseParseError";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Client-facing errors map to 4xx; the rest are upstream or server faults. */
  get clientFacing(): boolean {
    return this.kind === "InputValidationError" || this.kind === "ImageDecodeError";
  }
}

/** Bad file type, empty file, or no readable text on the label. */
export class InputValidationError extends PipelineError {
  readonly kind = "InputValidationError";
}

export class ImageDecodeError extends PipelineError {
  readonly kind = "ImageDecodeError";
}

export class OcrCapabilityError extends PipelineError {
  readonly kind = "OcrCapabilityError";
}

export class LlmCapabilityError extends PipelineError {
  readonly kind = "LlmCapabilityError";
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/** The model replied, but not with a JSON object. Absorbed into a fallback record. */
export class ResponseParseError extends PipelineError {
  readonly kind = "ResponseParseError";
  readonly rawReply: string;

  constructor(message: string, rawReply: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rawReply = rawReply;
  }
}

export type Result<T, E extends PipelineError = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends PipelineError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
