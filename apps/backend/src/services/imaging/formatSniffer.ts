/**
 * Container detection from magic bytes.
 *
 * The declared filename/MIME type is only a hint; the signature decides which
 * decoder runs.
 */

import type { ContainerFormat } from "../../domain/image";

const MIN_SIGNATURE_BYTES = 12;

const MAGIC_BYTES: Record<Exclude<ContainerFormat, "tiff">, number[]> = {
  png: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], // \x89PNG\r\n\x1a\n
  jpeg: [0xff, 0xd8, 0xff],
  gif: [0x47, 0x49, 0x46, 0x38], // GIF8
  webp: [0x52, 0x49, 0x46, 0x46], // RIFF (WEBP at offset 8)
  bmp: [0x42, 0x4d], // BM
};

const TIFF_LITTLE_ENDIAN = [0x49, 0x49, 0x2a, 0x00]; // II*\0
const TIFF_BIG_ENDIAN = [0x4d, 0x4d, 0x00, 0x2a]; // MM\0*
const WEBP_TAG = [0x57, 0x45, 0x42, 0x50]; // WEBP

function matchesAt(buffer: Uint8Array, magic: number[], offset = 0): boolean {
  for (let i = 0; i < magic.length; i++) {
    if (buffer[offset + i] !== magic[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Detect the container format of an encoded image.
 * Returns undefined for empty, truncated or unrecognised input.
 */
export function detectContainerFormat(buffer: Uint8Array): ContainerFormat | undefined {
  if (buffer.length < MIN_SIGNATURE_BYTES) {
    return undefined;
  }

  if (matchesAt(buffer, MAGIC_BYTES.png)) return "png";
  if (matchesAt(buffer, MAGIC_BYTES.jpeg)) return "jpeg";
  if (matchesAt(buffer, MAGIC_BYTES.gif)) return "gif";
  if (matchesAt(buffer, MAGIC_BYTES.webp) && matchesAt(buffer, WEBP_TAG, 8)) return "webp";
  if (matchesAt(buffer, TIFF_LITTLE_ENDIAN) || matchesAt(buffer, TIFF_BIG_ENDIAN)) return "tiff";
  if (matchesAt(buffer, MAGIC_BYTES.bmp)) return "bmp";

  return undefined;
}
