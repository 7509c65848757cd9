/**
 * Input geometry and normalisation for supported salient-object models.
 * Every profile expects an NCHW float32 RGB tensor of size×size.
 */

export const SEGMENTATION_MODELS = ["u2net", "u2netp", "silueta", "isnet-general-use"] as const;

export type SegmentationModel = (typeof SEGMENTATION_MODELS)[number];

export interface ModelProfile {
  inputSize: number;
  mean: readonly [number, number, number];
  std: readonly [number, number, number];
}

const IMAGENET_MEAN = [0.485, 0.456, 0.406] as const;
const IMAGENET_STD = [0.229, 0.224, 0.225] as const;

export const MODEL_PROFILES: Record<SegmentationModel, ModelProfile> = {
  u2net: { inputSize: 320, mean: IMAGENET_MEAN, std: IMAGENET_STD },
  u2netp: { inputSize: 320, mean: IMAGENET_MEAN, std: IMAGENET_STD },
  silueta: { inputSize: 320, mean: IMAGENET_MEAN, std: IMAGENET_STD },
  "isnet-general-use": { inputSize: 1024, mean: [0.5, 0.5, 0.5], std: [1, 1, 1] },
};
