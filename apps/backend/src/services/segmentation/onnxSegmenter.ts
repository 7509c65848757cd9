/**
 * U²-Net family segmenter on onnxruntime-node.
 *
 * One InferenceSession per process, created on first use (or via warmup) and
 * shared by every request. A failed load is not memoised; the next call
 * retries it.
 *
 * Pre:  RGB resized (fill) to size×size, scaled by max pixel, mean/std normalised
 * Post: first output channel, min-max normalised, resized back, used as alpha
 */

import fs from "node:fs";
import { performance } from "node:perf_hooks";
import * as ort from "onnxruntime-node";
import sharp from "sharp";
import type { Logger } from "pino";
import type { RasterImage } from "../../domain/image";
import { MODEL_PROFILES, type ModelProfile, type SegmentationModel } from "./modelProfiles";
import type { Segmenter, SegmenterHealth, SegmenterStatus } from "./segmenter";
import { applyAlphaMask, predictionToMask, toNormalizedTensor } from "./tensor";

export interface OnnxSegmenterOptions {
  model: SegmentationModel;
  modelPath: string;
  logger: Logger;
}

export class OnnxSegmenter implements Segmenter {
  private readonly profile: ModelProfile;
  private readonly logger: Logger;
  private sessionPromise: Promise<ort.InferenceSession> | null = null;
  private status: SegmenterStatus = "idle";

  constructor(private readonly options: OnnxSegmenterOptions) {
    this.profile = MODEL_PROFILES[options.model];
    this.logger = options.logger.child({ component: "segmenter", model: options.model });
  }

  health(): SegmenterHealth {
    return { model: this.options.model, status: this.status };
  }

  async warmup(): Promise<void> {
    await this.getSession();
  }

  async segment(image: RasterImage): Promise<RasterImage> {
    const session = await this.getSession();
    const size = this.profile.inputSize;
    const started = performance.now();

    const { data: resized, info } = await sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    })
      .resize(size, size, { fit: "fill", kernel: sharp.kernel.lanczos3 })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    const tensor = toNormalizedTensor(resized, size * size, info.channels, this.profile);
    const inputName = session.inputNames[0];
    const results = await session.run({
      [inputName]: new ort.Tensor("float32", tensor, [1, 3, size, size]),
    });

    const outputName = session.outputNames[0];
    const output = results[outputName];
    if (!output || !(output.data instanceof Float32Array)) {
      throw new Error(`Unexpected model output (available: ${session.outputNames.join(", ")})`);
    }

    const maskHeight = output.dims[2] ?? size;
    const maskWidth = output.dims[3] ?? size;
    const smallMask = predictionToMask(output.data, maskWidth * maskHeight);
    const mask = await this.resizeMask(smallMask, maskWidth, maskHeight, image.width, image.height);

    this.logger.debug(
      { inferMs: Math.round(performance.now() - started), width: image.width, height: image.height },
      "Segmentation completed",
    );

    return applyAlphaMask(image, mask);
  }

  private async resizeMask(
    mask: Buffer,
    fromWidth: number,
    fromHeight: number,
    toWidth: number,
    toHeight: number,
  ): Promise<Buffer> {
    const { data, info } = await sharp(mask, { raw: { width: fromWidth, height: fromHeight, channels: 1 } })
      .resize(toWidth, toHeight, { fit: "fill", kernel: sharp.kernel.lanczos3 })
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels === 1) {
      return data;
    }

    const single = Buffer.alloc(toWidth * toHeight);
    for (let i = 0; i < single.length; i++) {
      single[i] = data[i * info.channels];
    }
    return single;
  }

  private getSession(): Promise<ort.InferenceSession> {
    if (!this.sessionPromise) {
      this.status = "loading";
      this.sessionPromise = this.createSession().then(
        (session) => {
          this.status = "ready";
          return session;
        },
        (error: unknown) => {
          this.status = "failed";
          this.sessionPromise = null;
          throw error;
        },
      );
    }
    return this.sessionPromise;
  }

  private async createSession(): Promise<ort.InferenceSession> {
    const { modelPath } = this.options;
    if (!fs.existsSync(modelPath)) {
      throw new Error(`Segmentation model not found: ${modelPath}`);
    }

    const started = performance.now();
    const session = await ort.InferenceSession.create(modelPath, {
      executionProviders: ["cpu"],
      graphOptimizationLevel: "all",
    });
    this.logger.info(
      { modelPath, loadMs: Math.round(performance.now() - started) },
      "Segmentation model loaded",
    );
    return session;
  }
}
