/**
 * Background Removal Route
 *
 * POST /remove-background (multipart/form-data)
 *   image            - required file field
 *   background_color - optional "#RRGGBB"; empty means keep transparency
 *
 * 200 returns the PNG as an attachment. Failures return JSON
 * `{ error: <code>, message }` with the status from HTTP_STATUS.
 */

import { randomUUID } from "node:crypto";
import path from "node:path";
import type { Express, NextFunction, Request, Response } from "express";
import multer from "multer";
import type { AppContext } from "../app/context";
import type { UploadedImage } from "../domain/image";
import type { ProcessingErrorCode, ProcessingFailure } from "../domain/processingError";
import { DEFAULT_MESSAGES } from "../domain/processingError";
import type { ProcessingResult } from "../services/pipeline/backgroundRemovalPipeline";
import { DeadlineExceededError, runWithDeadline } from "../utils/deadline";

export const HTTP_STATUS: Record<ProcessingErrorCode, number> = {
  InvalidColor: 400,
  PayloadTooLarge: 413,
  UnsupportedFormat: 415,
  CorruptImage: 422,
  DimensionOutOfRange: 422,
  SegmentationFailed: 500,
  EncodingFailed: 500,
  InternalError: 500,
  RequestTimeout: 503,
};

/** `removed_bg_<stem>.png`, with the stem reduced to filename-safe characters. */
export function downloadFilename(originalName: string): string {
  const stem = path.parse(path.basename(originalName)).name.replace(/[^A-Za-z0-9._-]/g, "_");
  return `removed_bg_${stem || "image"}.png`;
}

function sendFailure(res: Response, failure: ProcessingFailure): void {
  res.status(HTTP_STATUS[failure.code]).json({ error: failure.code, message: failure.message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function registerBackgroundRemovalRoutes(app: Express, ctx: AppContext): void {
  const { logger, pipeline, rateLimiter, config } = ctx;

  const upload = multer({
    storage: multer.memoryStorage(),
    // Inclusive: a file of exactly maxUploadBytes passes, one byte more is LIMIT_FILE_SIZE
    limits: { fileSize: config.pipeline.maxUploadBytes, files: 1 },
  });

  app.post(
    "/remove-background",
    (_req: Request, res: Response, next: NextFunction) => {
      if (ctx.isShuttingDown()) {
        res.status(503).json({
          error: "ShuttingDown",
          message: "Server is shutting down, please retry shortly",
        });
        return;
      }
      next();
    },
    rateLimiter.middleware(),
    upload.single("image"),
    async (req: Request, res: Response) => {
      const file = req.file;
      if (!file || file.originalname === "") {
        res.status(400).json({
          error: "NoImageProvided",
          message: "No image file provided. Upload one in the 'image' field.",
        });
        return;
      }

      const body: unknown = req.body;
      const rawColor = isRecord(body) ? body.background_color : undefined;
      if (rawColor !== undefined && typeof rawColor !== "string") {
        sendFailure(res, { code: "InvalidColor", message: DEFAULT_MESSAGES.InvalidColor });
        return;
      }
      const backgroundColor = rawColor === undefined || rawColor === "" ? undefined : rawColor;

      const requestId = randomUUID();
      const requestLogger = logger.child({ requestId });
      const uploaded: UploadedImage = {
        data: file.buffer,
        filename: file.originalname,
        mimeType: file.mimetype,
        sizeBytes: file.size,
      };

      let result: ProcessingResult;
      try {
        result = await runWithDeadline(config.requestTimeoutMs, (signal) =>
          pipeline.process(uploaded, backgroundColor, { signal, logger: requestLogger }),
        );
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          requestLogger.warn(
            { timeoutMs: error.timeoutMs, filename: file.originalname },
            "Image processing timed out",
          );
          sendFailure(res, { code: "RequestTimeout", message: DEFAULT_MESSAGES.RequestTimeout });
          return;
        }
        requestLogger.error({ err: error }, "Unexpected error in background removal route");
        sendFailure(res, { code: "InternalError", message: DEFAULT_MESSAGES.InternalError });
        return;
      }

      if (!result.ok) {
        sendFailure(res, result.error);
        return;
      }

      res.status(200);
      res.attachment(downloadFilename(file.originalname));
      res.setHeader("Content-Type", result.image.contentType);
      res.setHeader("Cache-Control", "no-cache, no-store, must-revalidate");
      res.setHeader("Pragma", "no-cache");
      res.setHeader("Expires", "0");
      res.setHeader("X-Request-Id", requestId);
      res.setHeader("X-Processing-Time-Ms", String(result.timings.totalMs));
      res.end(result.image.data);
    },
  );
}
