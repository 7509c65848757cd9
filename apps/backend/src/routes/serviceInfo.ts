/**
 * Service Info Routes
 *
 * GET /health   - liveness plus segmentation model state
 * GET /api-info - self-description for clients
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";

export const SERVICE_NAME = "background-removal-api";
export const SERVICE_VERSION = "1.0.0";

export function registerServiceInfoRoutes(app: Express, ctx: AppContext): void {
  const { config, segmenter } = ctx;

  app.get("/health", (_req: Request, res: Response) => {
    const model = segmenter.health();
    res.json({
      status: model.status === "failed" ? "degraded" : "healthy",
      service: SERVICE_NAME,
      segmenter: model,
    });
  });

  app.get("/api-info", (_req: Request, res: Response) => {
    const { pipeline, rateLimit } = config;
    res.json({
      name: "Background Removal API",
      version: SERVICE_VERSION,
      description: "Removes image backgrounds, optionally filling them with a solid colour",
      endpoints: {
        "/remove-background": {
          method: "POST",
          description: "Remove the background from an uploaded image",
          parameters: {
            image: "Image file (required)",
            background_color: "Hex colour #RRGGBB (optional, transparent when omitted)",
          },
          returns: "PNG image",
        },
        "/health": { method: "GET", description: "Health check" },
        "/api-info": { method: "GET", description: "This document" },
      },
      supported_formats: pipeline.supportedFormats,
      limits: {
        max_file_size_bytes: pipeline.maxUploadBytes,
        min_dimension: pipeline.minDimension,
        max_width: pipeline.maxWidth,
        max_height: pipeline.maxHeight,
        max_processing_dimension: pipeline.maxProcessingDimension,
        rate_limit: `${rateLimit.maxRequests} per ${rateLimit.windowSeconds}s`,
      },
    });
  });
}
