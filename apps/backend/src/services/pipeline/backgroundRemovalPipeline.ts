/**
 * Background Removal Pipeline (orchestrator)
 *
 * Validate → parse colour → Decode → Resize → Remove background → Composite → Encode
 *
 * Processing guarantees:
 * - Classified: every failure becomes exactly one ProcessingErrorCode
 * - All-or-nothing: a failed stage stops the run, no partial output
 * - No retries: resubmission is the caller's decision
 * - Colour is parsed before segmentation, so a bad colour never costs a model run
 */

import { performance } from "node:perf_hooks";
import type { Logger } from "pino";
import { parseHexColor } from "../../domain/color";
import type { EncodedImage, RasterImage, Rgb, UploadedImage } from "../../domain/image";
import {
  ProcessingError,
  toProcessingError,
  type ProcessingErrorCode,
  type ProcessingFailure,
} from "../../domain/processingError";
import type { ImageIO } from "../imaging/sharpImageIO";
import type { BackgroundRemover } from "./backgroundRemover";
import { composite } from "./compositor";
import { encodePng } from "./encoder";
import type { PipelineConfig } from "./pipelineConfig";
import { Resizer } from "./resizer";
import { validateUpload } from "./validator";

export interface StageTimings {
  validateMs: number;
  decodeMs: number;
  resizeMs: number;
  segmentMs: number;
  compositeMs: number;
  encodeMs: number;
  totalMs: number;
}

export type ProcessingResult =
  | { ok: true; image: EncodedImage; timings: StageTimings }
  | { ok: false; error: ProcessingFailure };

export interface ProcessOptions {
  /** Aborted by the caller's deadline; checked between stages. */
  signal?: AbortSignal;
  /** Request-scoped logger; defaults to the pipeline logger. */
  logger?: Logger;
}

export interface PipelineDependencies {
  imageIO: ImageIO;
  remover: BackgroundRemover;
  logger: Logger;
}

// Faults on our side or in the model; everything else is a client problem
const SERVER_SIDE_CODES = new Set<ProcessingErrorCode>(["SegmentationFailed", "EncodingFailed", "InternalError"]);

const elapsed = (since: number): number => Math.round(performance.now() - since);

export class BackgroundRemovalPipeline {
  private readonly resizer: Resizer;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDependencies,
  ) {
    this.resizer = new Resizer(deps.imageIO, config.maxProcessingDimension);
  }

  getConfig(): PipelineConfig {
    return this.config;
  }

  /**
   * Run one upload through the pipeline.
   *
   * @param colorSpec - `#RRGGBB` to fill the background with; omit to keep transparency
   */
  async process(upload: UploadedImage, colorSpec?: string, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const logger = options.logger ?? this.deps.logger;

    try {
      return await this.run(upload, colorSpec, options.signal, logger);
    } catch (error) {
      const classified = toProcessingError(error);
      if (SERVER_SIDE_CODES.has(classified.code)) {
        logger.error(
          { err: classified.cause ?? classified, code: classified.code, filename: upload.filename },
          "Image processing failed",
        );
      } else {
        logger.info(
          { code: classified.code, reason: classified.message, filename: upload.filename },
          "Image rejected",
        );
      }
      return { ok: false, error: { code: classified.code, message: classified.message } };
    }
  }

  private async run(
    upload: UploadedImage,
    colorSpec: string | undefined,
    signal: AbortSignal | undefined,
    logger: Logger,
  ): Promise<ProcessingResult> {
    const { imageIO, remover } = this.deps;
    const checkpoint = (): void => {
      if (signal?.aborted) {
        throw new ProcessingError("RequestTimeout");
      }
    };
    const startedAt = performance.now();

    let mark = performance.now();
    const validation = await validateUpload(upload, this.config, imageIO);
    if (!validation.valid) {
      throw validation.error;
    }
    const color: Rgb | undefined = colorSpec === undefined ? undefined : parseHexColor(colorSpec);
    const validateMs = elapsed(mark);
    checkpoint();

    mark = performance.now();
    let decoded: RasterImage;
    try {
      decoded = await imageIO.decode(upload.data, validation.format);
    } catch (error) {
      throw new ProcessingError("CorruptImage", undefined, { cause: error });
    }
    const decodeMs = elapsed(mark);
    checkpoint();

    mark = performance.now();
    const resized = await this.resizer.fitWithinBound(decoded, logger);
    const resizeMs = elapsed(mark);
    checkpoint();

    mark = performance.now();
    const cutout = await remover.removeBackground(resized);
    const segmentMs = elapsed(mark);
    checkpoint();

    mark = performance.now();
    const finalImage = composite(cutout, color);
    const compositeMs = elapsed(mark);

    mark = performance.now();
    const encoded = await encodePng(finalImage, imageIO);
    const encodeMs = elapsed(mark);
    checkpoint();

    const timings: StageTimings = {
      validateMs,
      decodeMs,
      resizeMs,
      segmentMs,
      compositeMs,
      encodeMs,
      totalMs: elapsed(startedAt),
    };

    logger.info(
      {
        filename: upload.filename,
        inputBytes: upload.sizeBytes,
        outputBytes: encoded.data.length,
        inputDimensions: `${validation.width}x${validation.height}`,
        outputDimensions: `${encoded.width}x${encoded.height}`,
        backgroundColor: colorSpec ?? null,
        ...timings,
      },
      "Image processed",
    );

    return { ok: true, image: encoded, timings };
  }
}
