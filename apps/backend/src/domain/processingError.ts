/**
 * Classified pipeline failures.
 *
 * Codes and messages are part of the public API: clients see `code` and
 * `message`, never `cause`.
 */

export type ProcessingErrorCode =
  | "UnsupportedFormat"
  | "PayloadTooLarge"
  | "CorruptImage"
  | "DimensionOutOfRange"
  | "InvalidColor"
  | "SegmentationFailed"
  | "EncodingFailed"
  | "InternalError"
  | "RequestTimeout";

export const DEFAULT_MESSAGES: Record<ProcessingErrorCode, string> = {
  UnsupportedFormat: "Unsupported image format",
  PayloadTooLarge: "File too large",
  CorruptImage: "Invalid image file",
  DimensionOutOfRange: "Image dimensions out of range",
  InvalidColor: "Background color must be in hex format (#RRGGBB)",
  SegmentationFailed: "Background removal failed. Please try again with a different image.",
  EncodingFailed: "Failed to encode the processed image",
  InternalError: "Failed to process image. Please try again with a different image.",
  RequestTimeout: "Image processing did not finish in time",
};

export class ProcessingError extends Error {
  readonly code: ProcessingErrorCode;

  constructor(code: ProcessingErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = "ProcessingError";
    this.code = code;
  }
}

export interface ProcessingFailure {
  code: ProcessingErrorCode;
  message: string;
}

/** Wrap anything thrown into a classified error, keeping the original as `cause`. */
export function toProcessingError(error: unknown, fallback: ProcessingErrorCode = "InternalError"): ProcessingError {
  if (error instanceof ProcessingError) return error;
  return new ProcessingError(fallback, undefined, { cause: error });
}
