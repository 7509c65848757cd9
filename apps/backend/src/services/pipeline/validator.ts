/**
 * Upload Validator
 *
 * Rejects uploads before any decode-heavy or model work. Checks run in a
 * fixed order and stop at the first failure:
 *   1. declared format (filename extension, else MIME type)
 *   2. byte size (inclusive max)
 *   3. signature + header parse
 *   4. dimensions (inclusive min/max)
 */

import path from "node:path";
import {
  FORMAT_CONTAINER,
  isSupportedFormat,
  type ContainerFormat,
  type SupportedFormat,
  type UploadedImage,
} from "../../domain/image";
import { ProcessingError } from "../../domain/processingError";
import { detectContainerFormat } from "../imaging/formatSniffer";
import type { ImageIO } from "../imaging/sharpImageIO";
import type { PipelineConfig } from "./pipelineConfig";

export type UploadValidation =
  | { valid: true; format: ContainerFormat; width: number; height: number }
  | { valid: false; error: ProcessingError };

const MIME_FORMATS: Record<string, SupportedFormat> = {
  "image/png": "png",
  "image/jpeg": "jpeg",
  "image/jpg": "jpg",
  "image/webp": "webp",
  "image/bmp": "bmp",
  "image/x-ms-bmp": "bmp",
  "image/tiff": "tiff",
};

/**
 * Format token declared by the client: the filename extension when there is
 * one, otherwise the MIME type mapped to a token. Returns the raw extension
 * (possibly unsupported) so callers can reject it.
 */
export function declaredFormat(filename: string, mimeType?: string): string | undefined {
  const ext = path.extname(filename);
  if (ext.length > 1) {
    return ext.slice(1).toLowerCase();
  }
  if (mimeType) {
    return MIME_FORMATS[mimeType.toLowerCase()];
  }
  return undefined;
}

function formatList(config: PipelineConfig): string {
  return config.supportedFormats.join(", ");
}

/** Human-readable byte limit: "8MB", "1.5MB", "512KB". */
export function formatSizeLimit(bytes: number): string {
  const mb = bytes / 1024 / 1024;
  if (mb < 1) {
    return `${Math.round(bytes / 1024)}KB`;
  }
  return Number.isInteger(mb) ? `${mb}MB` : `${mb.toFixed(1)}MB`;
}

export async function validateUpload(
  upload: UploadedImage,
  config: PipelineConfig,
  imageIO: ImageIO,
): Promise<UploadValidation> {
  const declared = declaredFormat(upload.filename, upload.mimeType);
  if (!declared || !isSupportedFormat(declared) || !config.supportedFormats.includes(declared)) {
    return {
      valid: false,
      error: new ProcessingError(
        "UnsupportedFormat",
        `Unsupported image format. Supported formats: ${formatList(config)}`,
      ),
    };
  }

  if (upload.sizeBytes > config.maxUploadBytes) {
    return {
      valid: false,
      error: new ProcessingError(
        "PayloadTooLarge",
        `File too large. Maximum size: ${formatSizeLimit(config.maxUploadBytes)}`,
      ),
    };
  }

  const container = detectContainerFormat(upload.data);
  if (!container) {
    return { valid: false, error: new ProcessingError("CorruptImage") };
  }

  const acceptedContainers = new Set(config.supportedFormats.map((format) => FORMAT_CONTAINER[format]));
  if (!acceptedContainers.has(container)) {
    return {
      valid: false,
      error: new ProcessingError(
        "UnsupportedFormat",
        `Unsupported image format. Supported formats: ${formatList(config)}`,
      ),
    };
  }

  let width: number;
  let height: number;
  try {
    ({ width, height } = await imageIO.probe(upload.data, container));
  } catch (error) {
    return { valid: false, error: new ProcessingError("CorruptImage", undefined, { cause: error }) };
  }

  const { minDimension, maxWidth, maxHeight } = config;
  if (width < minDimension || height < minDimension || width > maxWidth || height > maxHeight) {
    return {
      valid: false,
      error: new ProcessingError(
        "DimensionOutOfRange",
        `Image dimensions ${width}x${height} out of range. Allowed: ${minDimension}x${minDimension} to ${maxWidth}x${maxHeight}px`,
      ),
    };
  }

  return { valid: true, format: container, width, height };
}
