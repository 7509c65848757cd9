/**
 * Solid-colour compositing (source-over).
 *
 * Per channel, with 8-bit alpha a:
 *   out = round((fg * a + bg * (255 - a)) / 255)
 * a = 255 yields fg exactly, a = 0 yields bg exactly. Output is opaque RGB.
 */

import type { RasterImage, Rgb } from "../../domain/image";

export function compositeOnColor(image: RasterImage, color: Rgb): RasterImage {
  const pixelCount = image.width * image.height;
  const out = Buffer.alloc(pixelCount * 3);
  const { channels, data } = image;

  for (let i = 0; i < pixelCount; i++) {
    const si = i * channels;
    const di = i * 3;
    const a = channels === 4 ? data[si + 3] : 255;

    if (a === 255) {
      out[di] = data[si];
      out[di + 1] = data[si + 1];
      out[di + 2] = data[si + 2];
    } else if (a === 0) {
      out[di] = color.r;
      out[di + 1] = color.g;
      out[di + 2] = color.b;
    } else {
      const inv = 255 - a;
      out[di] = Math.round((data[si] * a + color.r * inv) / 255);
      out[di + 1] = Math.round((data[si + 1] * a + color.g * inv) / 255);
      out[di + 2] = Math.round((data[si + 2] * a + color.b * inv) / 255);
    }
  }

  return { data: out, width: image.width, height: image.height, channels: 3 };
}

/** No colour: transparency is preserved and the image passes through untouched. */
export function composite(image: RasterImage, color?: Rgb): RasterImage {
  return color ? compositeOnColor(image, color) : image;
}
