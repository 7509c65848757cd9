import { SUPPORTED_FORMATS, type SupportedFormat } from "../../domain/image";

/**
 * Limits the pipeline enforces. Passed in at construction; the pipeline never
 * reads process state.
 */
export interface PipelineConfig {
  supportedFormats: readonly SupportedFormat[];
  /** Inclusive */
  maxUploadBytes: number;
  /** Inclusive lower bound for both width and height */
  minDimension: number;
  maxWidth: number;
  maxHeight: number;
  /** Longer side bound applied before segmentation */
  maxProcessingDimension: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  supportedFormats: SUPPORTED_FORMATS,
  maxUploadBytes: 8 * 1024 * 1024, // 8MB
  minDimension: 100,
  maxWidth: 4000,
  maxHeight: 4000,
  maxProcessingDimension: 2048,
};
