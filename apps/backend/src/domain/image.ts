/**
 * Image domain types
 *
 * Rasters are interleaved 8-bit sRGB, row-major, top-left origin.
 * Every raster belongs to exactly one pipeline invocation.
 */

/** Upload tokens accepted by the service (file extensions, lower-cased). */
export const SUPPORTED_FORMATS = ["png", "jpg", "jpeg", "webp", "bmp", "tiff"] as const;

export type SupportedFormat = (typeof SUPPORTED_FORMATS)[number];

/** Container formats recognised by signature, whether or not we accept them. */
export type ContainerFormat = "png" | "jpeg" | "webp" | "bmp" | "tiff" | "gif";

export interface UploadedImage {
  data: Buffer;
  /** Client-supplied filename, used only for format detection and the download name */
  filename: string;
  mimeType?: string;
  sizeBytes: number;
}

export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  /** 3 = RGB, 4 = RGBA */
  channels: 3 | 4;
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface EncodedImage {
  data: Buffer;
  contentType: "image/png";
  width: number;
  height: number;
}

export function isSupportedFormat(value: string): value is SupportedFormat {
  return (SUPPORTED_FORMATS as readonly string[]).includes(value);
}

/** Container each upload token decodes as. */
export const FORMAT_CONTAINER: Record<SupportedFormat, ContainerFormat> = {
  png: "png",
  jpg: "jpeg",
  jpeg: "jpeg",
  webp: "webp",
  bmp: "bmp",
  tiff: "tiff",
};
