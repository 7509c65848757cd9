/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import type { AppContext } from "./context";
import { registerBackgroundRemovalRoutes } from "../routes/backgroundRemoval";
import { registerServiceInfoRoutes } from "../routes/serviceInfo";
import { formatSizeLimit } from "../services/pipeline/validator";

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { config, logger } = ctx;

  // Trust the first proxy hop so req.ip (and the rate limiter key) is the real client
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (config.corsOrigins === "*") {
      res.header("Access-Control-Allow-Origin", "*");
    } else if (origin && config.corsOrigins.includes(origin)) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Vary", "Origin");
    }
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    res.header("Access-Control-Expose-Headers", "Content-Disposition, X-Request-Id, X-Processing-Time-Ms");

    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }

    next();
  });

  registerServiceInfoRoutes(app, ctx);
  registerBackgroundRemovalRoutes(app, ctx);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "NotFound", message: "Route not found" });
  });

  // Upload errors raised by multer, plus anything a handler let through
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        res.status(413).json({
          error: "PayloadTooLarge",
          message: `File too large. Maximum size: ${formatSizeLimit(config.pipeline.maxUploadBytes)}`,
        });
        return;
      }
      res.status(400).json({ error: "InvalidRequest", message: err.message });
      return;
    }

    logger.error({ err, path: req.path }, "Unhandled request error");
    res.status(500).json({ error: "InternalError", message: "Internal server error" });
  });

  return app;
}
