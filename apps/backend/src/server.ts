/**
 * Background Removal Service (Entry Point)
 *
 * Thin shell: config, context creation, model warm-up, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { loadRuntimeConfig } from "./config";
import { createContext } from "./app/context";
import { createApp } from "./app/http";

const config = loadRuntimeConfig();
const ctx = createContext(config);
const { logger, segmenter, rateLimiter } = ctx;

const app = createApp(ctx);

if (config.segmenterPreload) {
  try {
    await segmenter.warmup();
  } catch (error) {
    // Requests retry the load; /health reports "degraded" until one succeeds
    logger.error({ err: error, modelPath: config.modelPath }, "Segmentation model warm-up failed");
  }
}

rateLimiter.startCleanup();

const server = app.listen(config.port, config.bindHost, () => {
  logger.info(
    { port: config.port, host: config.bindHost, model: config.segmentationModel },
    "Background removal service listening",
  );
});

const shutdown = (signal: NodeJS.Signals): void => {
  if (ctx.isShuttingDown()) return;
  logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

  // New uploads get 503; in-flight requests finish
  ctx.setShuttingDown(true);
  rateLimiter.stopCleanup();

  server.close((error) => {
    if (error) {
      logger.error({ err: error }, "Error closing HTTP server");
      process.exit(1);
    }
    logger.info("HTTP server closed, graceful shutdown complete");
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn({ timeoutMs: config.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, config.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
