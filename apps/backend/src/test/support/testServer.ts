import { once } from "node:events";
import type { Express } from "express";
import pino from "pino";
import { createContext, type AppContext } from "../../app/context";
import { createApp } from "../../app/http";
import { parseRuntimeConfig, type EnvInput } from "../../config";
import type { Segmenter } from "../../services/segmentation/segmenter";
import { FakeSegmenter } from "../mocks/fakeSegmenter";

export function createTestContext(env: EnvInput = {}, segmenter: Segmenter = new FakeSegmenter()): AppContext {
  const config = parseRuntimeConfig({ SEGMENTER_PRELOAD: "false", ...env }, "/tmp/cutout-test");
  return createContext(config, { logger: pino({ level: "silent" }), segmenter });
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function startServer(app: Express): Promise<RunningServer> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export interface TestServer extends RunningServer {
  ctx: AppContext;
}

export async function startTestServer(
  env: EnvInput = {},
  segmenter: Segmenter = new FakeSegmenter(),
): Promise<TestServer> {
  const ctx = createTestContext(env, segmenter);
  const running = await startServer(createApp(ctx));
  return { ...running, ctx };
}
