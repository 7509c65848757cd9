import type { Logger } from "pino";
import type { RasterImage } from "../../domain/image";
import type { ImageIO } from "../imaging/sharpImageIO";

/**
 * Target size so that the longer side equals `bound`, aspect ratio kept.
 * Returns the input size when it already fits (never upscales).
 */
export function computeTargetSize(
  width: number,
  height: number,
  bound: number,
): { width: number; height: number } {
  if (Math.max(width, height) <= bound) {
    return { width, height };
  }

  if (width > height) {
    return { width: bound, height: Math.max(1, Math.floor((height * bound) / width)) };
  }
  return { width: Math.max(1, Math.floor((width * bound) / height)), height: bound };
}

export class Resizer {
  constructor(
    private readonly imageIO: ImageIO,
    private readonly maxDimension: number,
  ) {}

  /**
   * Downsample so the longer side fits the processing bound (Lanczos-3).
   * Images already within bound are returned as-is.
   */
  async fitWithinBound(image: RasterImage, logger?: Logger): Promise<RasterImage> {
    const target = computeTargetSize(image.width, image.height, this.maxDimension);
    if (target.width === image.width && target.height === image.height) {
      return image;
    }

    const resized = await this.imageIO.resize(image, target.width, target.height);
    logger?.info(
      {
        from: `${image.width}x${image.height}`,
        to: `${target.width}x${target.height}`,
        bound: this.maxDimension,
      },
      "Resized image for processing",
    );
    return resized;
  }
}
