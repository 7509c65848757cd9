/**
 * Sharp-based image IO
 *
 * Uses libvips via sharp for PNG, JPEG, WebP and TIFF. libvips as bundled by
 * sharp has no BMP loader, so BMP goes through bmp-js.
 *
 * All decoded rasters are RGBA (4 channels, 8-bit sRGB).
 */

import sharp from "sharp";
import { decode as decodeBmp } from "bmp-js";
import type { ContainerFormat, RasterImage } from "../../domain/image";

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ImageIO {
  /** Read dimensions from the encoded bytes; throws if the header does not parse. */
  probe(data: Buffer, format: ContainerFormat): Promise<ImageDimensions>;
  /** Fully decode to RGBA; throws on corrupt or truncated data. */
  decode(data: Buffer, format: ContainerFormat): Promise<RasterImage>;
  resize(image: RasterImage, width: number, height: number): Promise<RasterImage>;
  encodePng(image: RasterImage): Promise<Buffer>;
}

function rawInput(image: RasterImage) {
  return {
    raw: {
      width: image.width,
      height: image.height,
      channels: image.channels,
    },
  };
}

// BITMAPFILEHEADER (14) + biSize (4), then int32 width and height
const BMP_WIDTH_OFFSET = 18;
const BMP_HEIGHT_OFFSET = 22;

/**
 * Width and height straight from the BITMAPINFOHEADER. Height is negative for
 * top-down bitmaps.
 */
export function readBmpDimensions(data: Buffer): ImageDimensions {
  if (data.length < BMP_HEIGHT_OFFSET + 4) {
    throw new Error("Truncated BMP header");
  }
  const width = data.readInt32LE(BMP_WIDTH_OFFSET);
  const height = Math.abs(data.readInt32LE(BMP_HEIGHT_OFFSET));
  if (width <= 0 || height <= 0) {
    throw new Error(`Invalid BMP dimensions: ${width}x${height}`);
  }
  return { width, height };
}

/**
 * bmp-js emits ABGR quads; alpha is unreliable across BMP variants so the
 * result is always opaque.
 */
function bmpToRgba(data: Buffer): RasterImage {
  // bmp-js allocates width*height*4 from the header; even at 1 bit per pixel
  // the claimed size must fit in the file
  const { width, height } = readBmpDimensions(data);
  const pixelCount = width * height;
  if (pixelCount / 8 > data.length) {
    throw new Error(`BMP header claims ${width}x${height} but file has ${data.length} bytes`);
  }

  const bitmap = decodeBmp(data);
  if (bitmap.width !== width || Math.abs(bitmap.height) !== height) {
    throw new Error("Inconsistent BMP dimensions");
  }
  if (bitmap.data.length < pixelCount * 4) {
    throw new Error("Truncated BMP pixel data");
  }

  const rgba = Buffer.alloc(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    const si = i * 4;
    rgba[si] = bitmap.data[si + 3];
    rgba[si + 1] = bitmap.data[si + 2];
    rgba[si + 2] = bitmap.data[si + 1];
    rgba[si + 3] = 255;
  }

  return { data: rgba, width, height, channels: 4 };
}

export class SharpImageIO implements ImageIO {
  async probe(data: Buffer, format: ContainerFormat): Promise<ImageDimensions> {
    if (format === "bmp") {
      return readBmpDimensions(data);
    }

    const metadata = await sharp(data).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error("Invalid image dimensions");
    }
    return { width: metadata.width, height: metadata.height };
  }

  async decode(data: Buffer, format: ContainerFormat): Promise<RasterImage> {
    if (format === "bmp") {
      return bmpToRgba(data);
    }

    const { data: pixels, info } = await sharp(data)
      .toColourspace("srgb")
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 4) {
      throw new Error(`Unexpected channel count after decode: ${info.channels}`);
    }

    return { data: pixels, width: info.width, height: info.height, channels: 4 };
  }

  async resize(image: RasterImage, width: number, height: number): Promise<RasterImage> {
    const resized = await sharp(image.data, rawInput(image))
      .resize(width, height, {
        fit: "fill",
        kernel: sharp.kernel.lanczos3,
        fastShrinkOnLoad: false, // Maintain quality
      })
      .raw()
      .toBuffer();

    return {
      data: resized,
      width,
      height,
      channels: image.channels,
    };
  }

  async encodePng(image: RasterImage): Promise<Buffer> {
    return sharp(image.data, rawInput(image))
      .png({ compressionLevel: 6 }) // Balance compression vs speed
      .toBuffer();
  }
}
