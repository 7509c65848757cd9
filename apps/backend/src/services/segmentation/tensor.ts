/**
 * Tensor pre/post-processing shared by the ONNX segmenters.
 */

import type { RasterImage } from "../../domain/image";
import type { ModelProfile } from "./modelProfiles";

/**
 * Interleaved RGB(A) bytes → NCHW float32.
 * Values are scaled by the largest channel value in the image, then
 * normalised with the profile's mean/std.
 */
export function toNormalizedTensor(
  pixels: Buffer,
  pixelCount: number,
  channels: number,
  profile: ModelProfile,
): Float32Array {
  let max = 0;
  for (let i = 0; i < pixelCount; i++) {
    const si = i * channels;
    max = Math.max(max, pixels[si], pixels[si + 1], pixels[si + 2]);
  }
  const scale = max > 0 ? max : 1;

  const tensor = new Float32Array(3 * pixelCount);
  for (let i = 0; i < pixelCount; i++) {
    const si = i * channels;
    for (let c = 0; c < 3; c++) {
      tensor[c * pixelCount + i] = (pixels[si + c] / scale - profile.mean[c]) / profile.std[c];
    }
  }
  return tensor;
}

/**
 * First `length` values of a model output → 0..255 mask, min-max normalised.
 * A constant prediction yields an all-zero mask.
 */
export function predictionToMask(prediction: Float32Array, length: number): Buffer {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < length; i++) {
    const v = prediction[i];
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const mask = Buffer.alloc(length);
  const range = max - min;
  if (!(range > 0)) {
    return mask;
  }

  for (let i = 0; i < length; i++) {
    mask[i] = Math.round(((prediction[i] - min) / range) * 255);
  }
  return mask;
}

/** Use `mask` (one byte per pixel) as the alpha channel of `image`. */
export function applyAlphaMask(image: RasterImage, mask: Buffer): RasterImage {
  const pixelCount = image.width * image.height;
  if (mask.length !== pixelCount) {
    throw new Error(`Mask size ${mask.length} does not match ${image.width}x${image.height}`);
  }

  const rgba = Buffer.alloc(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    const si = i * image.channels;
    const di = i * 4;
    rgba[di] = image.data[si];
    rgba[di + 1] = image.data[si + 1];
    rgba[di + 2] = image.data[si + 2];
    rgba[di + 3] = mask[i];
  }
  return { data: rgba, width: image.width, height: image.height, channels: 4 };
}
