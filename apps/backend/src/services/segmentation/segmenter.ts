import type { RasterImage } from "../../domain/image";

export type SegmenterStatus = "idle" | "loading" | "ready" | "failed";

export interface SegmenterHealth {
  model: string;
  status: SegmenterStatus;
}

/**
 * Background segmentation capability.
 * Implementations: OnnxSegmenter (U²-Net family via onnxruntime-node).
 */
export interface Segmenter {
  /**
   * Return the input with a per-pixel alpha channel, 0 where background was
   * detected. Output has the same width and height as the input.
   */
  segment(image: RasterImage): Promise<RasterImage>;

  /** Initialise the model session ahead of the first request. */
  warmup(): Promise<void>;

  /** Surfaced via `/health`. */
  health(): SegmenterHealth;
}
