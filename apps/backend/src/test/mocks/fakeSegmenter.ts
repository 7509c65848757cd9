/**
 * Deterministic stand-in for the ONNX segmenter.
 *
 * Marks the centred rectangle covering the middle half of each axis as
 * foreground (alpha 255), everything else as background (alpha 0).
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { RasterImage } from "../../domain/image";
import type { Segmenter, SegmenterHealth, SegmenterStatus } from "../../services/segmentation/segmenter";

export interface FakeSegmenterOptions {
  delayMs?: number;
  error?: Error;
  status?: SegmenterStatus;
  /** Return 3-channel output instead of RGBA. */
  rgbOnly?: boolean;
  /** Return an image of this width instead of the input's. */
  widthOverride?: number;
}

export function isForeground(x: number, y: number, width: number, height: number): boolean {
  return (
    x >= Math.floor(width / 4) &&
    x < Math.floor((3 * width) / 4) &&
    y >= Math.floor(height / 4) &&
    y < Math.floor((3 * height) / 4)
  );
}

export class FakeSegmenter implements Segmenter {
  calls = 0;
  maxConcurrent = 0;
  /** Input widths in the order segmentations started. */
  readonly startedWidths: number[] = [];
  private active = 0;

  constructor(private readonly options: FakeSegmenterOptions = {}) {}

  health(): SegmenterHealth {
    return { model: "fake", status: this.options.status ?? "ready" };
  }

  async warmup(): Promise<void> {}

  async segment(image: RasterImage): Promise<RasterImage> {
    this.calls++;
    this.startedWidths.push(image.width);
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    try {
      if (this.options.delayMs) {
        await sleep(this.options.delayMs);
      }
      if (this.options.error) {
        throw this.options.error;
      }
      return this.cutout(image);
    } finally {
      this.active--;
    }
  }

  private cutout(image: RasterImage): RasterImage {
    const { width, height } = image;
    const outWidth = this.options.widthOverride ?? width;
    const channels = this.options.rgbOnly ? 3 : 4;
    const out = Buffer.alloc(outWidth * height * channels);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < outWidth; x++) {
        const si = (y * width + Math.min(x, width - 1)) * image.channels;
        const di = (y * outWidth + x) * channels;
        out[di] = image.data[si];
        out[di + 1] = image.data[si + 1];
        out[di + 2] = image.data[si + 2];
        if (channels === 4) {
          out[di + 3] = isForeground(x, y, width, height) ? 255 : 0;
        }
      }
    }
    return { data: out, width: outWidth, height, channels };
  }
}
