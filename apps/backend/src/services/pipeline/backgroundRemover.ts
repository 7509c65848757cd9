/**
 * Background Remover
 *
 * Thin wrapper around the shared Segmenter. Owns the concurrency policy for
 * the shared session and the output contract: same size as the input, always
 * RGBA. Any failure is SegmentationFailed; nothing is retried here.
 */

import type { RasterImage } from "../../domain/image";
import { ProcessingError } from "../../domain/processingError";
import type { Segmenter } from "../segmentation/segmenter";

export interface BackgroundRemoverOptions {
  /** Run at most one segmentation at a time against the shared session. */
  serialize: boolean;
}

function withOpaqueAlpha(image: RasterImage): RasterImage {
  const pixelCount = image.width * image.height;
  const rgba = Buffer.alloc(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    image.data.copy(rgba, i * 4, i * 3, i * 3 + 3);
    rgba[i * 4 + 3] = 255;
  }
  return { data: rgba, width: image.width, height: image.height, channels: 4 };
}

export class BackgroundRemover {
  private readonly serialize: boolean;
  // Settles after the last queued segmentation; never rejects
  private queueTail: Promise<void> = Promise.resolve();

  constructor(
    private readonly segmenter: Segmenter,
    options: BackgroundRemoverOptions,
  ) {
    this.serialize = options.serialize;
  }

  async removeBackground(image: RasterImage): Promise<RasterImage> {
    let result: RasterImage;
    try {
      result = await (this.serialize ? this.enqueue(image) : this.segmenter.segment(image));
    } catch (error) {
      throw new ProcessingError("SegmentationFailed", undefined, { cause: error });
    }

    if (
      result.width !== image.width ||
      result.height !== image.height ||
      result.data.length !== result.width * result.height * result.channels
    ) {
      throw new ProcessingError("SegmentationFailed", undefined, {
        cause: new Error(
          `Segmenter returned ${result.width}x${result.height}x${result.channels} for ${image.width}x${image.height} input`,
        ),
      });
    }

    return result.channels === 4 ? result : withOpaqueAlpha(result);
  }

  /** Segment after every earlier queued image has finished, in arrival order. */
  private enqueue(image: RasterImage): Promise<RasterImage> {
    const run = this.queueTail.then(() => this.segmenter.segment(image));
    this.queueTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
