/**
 * AppContext: composition root for the background removal service.
 *
 * Builds the long-lived objects once per process (logger, segmentation
 * session, pipeline, rate limiter) and hands them to the HTTP layer.
 */

import pino, { type Logger } from "pino";
import type { RuntimeConfig } from "../config";
import { IpRateLimiter } from "../middleware/ipRateLimiter";
import { SharpImageIO } from "../services/imaging/sharpImageIO";
import { BackgroundRemovalPipeline } from "../services/pipeline/backgroundRemovalPipeline";
import { BackgroundRemover } from "../services/pipeline/backgroundRemover";
import { OnnxSegmenter } from "../services/segmentation/onnxSegmenter";
import type { Segmenter } from "../services/segmentation/segmenter";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  segmenter: Segmenter;
  pipeline: BackgroundRemovalPipeline;
  rateLimiter: IpRateLimiter;

  // Shutdown state and helpers
  isShuttingDown: () => boolean;
  setShuttingDown: (value: boolean) => void;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(config: Pick<RuntimeConfig, "logLevel" | "logPretty">): Logger {
  if (config.logPretty) {
    return pino({
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: true, ignore: "pid,hostname" },
      },
    });
  }

  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level: config.logLevel, timestamp: pino.stdTimeFunctions.isoTime }, destination);
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export interface ContextOverrides {
  logger?: Logger;
  segmenter?: Segmenter;
}

/**
 * Wire services. The segmenter is the one object shared by every request.
 */
export function createContext(config: RuntimeConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config);

  const segmenter =
    overrides.segmenter ??
    new OnnxSegmenter({
      model: config.segmentationModel,
      modelPath: config.modelPath,
      logger,
    });

  const imageIO = new SharpImageIO();
  const remover = new BackgroundRemover(segmenter, { serialize: config.segmenterSerialize });
  const pipeline = new BackgroundRemovalPipeline(config.pipeline, {
    imageIO,
    remover,
    logger: logger.child({ component: "pipeline" }),
  });
  const rateLimiter = new IpRateLimiter(config.rateLimit);

  let shuttingDown = false;

  return {
    config,
    logger,
    segmenter,
    pipeline,
    rateLimiter,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
  };
}
