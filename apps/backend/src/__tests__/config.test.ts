import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { parseRateLimit, parseRuntimeConfig } from "../config";

describe("parseRateLimit", () => {
  it.each([
    ["1500 per hour", { maxRequests: 1500, windowSeconds: 3600 }],
    ["10 per minute", { maxRequests: 10, windowSeconds: 60 }],
    ["5/second", { maxRequests: 5, windowSeconds: 1 }],
    ["100 per days", { maxRequests: 100, windowSeconds: 86400 }],
    [" 3 PER Minute ", { maxRequests: 3, windowSeconds: 60 }],
  ])("parses %j", (value, expected) => {
    expect(parseRateLimit(value)).toEqual(expected);
  });

  it.each(["", "lots", "0 per hour", "10 per fortnight", "per hour"])("rejects %j", (value) => {
    expect(parseRateLimit(value)).toBeNull();
  });
});

describe("parseRuntimeConfig", () => {
  it("applies defaults", () => {
    const config = parseRuntimeConfig({}, "/srv/cutout");

    expect(config).toEqual({
      port: 8000,
      bindHost: "0.0.0.0",
      logLevel: "info",
      logPretty: false,
      pipeline: {
        supportedFormats: ["png", "jpg", "jpeg", "webp", "bmp", "tiff"],
        maxUploadBytes: 8 * 1024 * 1024,
        minDimension: 100,
        maxWidth: 4000,
        maxHeight: 4000,
        maxProcessingDimension: 2048,
      },
      segmentationModel: "u2net",
      modelPath: "/srv/cutout/models/u2net.onnx",
      segmenterPreload: true,
      segmenterSerialize: true,
      requestTimeoutMs: 60000,
      rateLimit: { maxRequests: 1500, windowSeconds: 3600 },
      corsOrigins: "*",
      gracefulShutdownMs: 10000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = parseRuntimeConfig(
      {
        PORT: "9000",
        LOG_PRETTY: "yes",
        MAX_FILE_SIZE: "1048576",
        ALLOWED_EXTENSIONS: "PNG, jpg ,",
        SEGMENTATION_MODEL: "isnet-general-use",
        MODEL_DIR: "/opt/models",
        SEGMENTER_SERIALIZE: "off",
        RATE_LIMIT: "20/minute",
        CORS_ORIGINS: "https://a.example, https://b.example",
      },
      "/srv/cutout",
    );

    expect(config.port).toBe(9000);
    expect(config.logPretty).toBe(true);
    expect(config.pipeline.maxUploadBytes).toBe(1048576);
    expect(config.pipeline.supportedFormats).toEqual(["png", "jpg"]);
    expect(config.modelPath).toBe("/opt/models/isnet-general-use.onnx");
    expect(config.segmenterSerialize).toBe(false);
    expect(config.rateLimit).toEqual({ maxRequests: 20, windowSeconds: 60 });
    expect(config.corsOrigins).toEqual(["https://a.example", "https://b.example"]);
  });

  it("resolves MODEL_PATH against the base directory", () => {
    const config = parseRuntimeConfig({ MODEL_PATH: "weights/custom.onnx", MODEL_DIR: "ignored" }, "/srv/cutout");
    expect(config.modelPath).toBe("/srv/cutout/weights/custom.onnx");
  });

  it.each([
    { ALLOWED_EXTENSIONS: "png,gif" },
    { ALLOWED_EXTENSIONS: " , " },
    { RATE_LIMIT: "often" },
    { SEGMENTATION_MODEL: "sam" },
    { PORT: "-1" },
    { LOG_LEVEL: "loud" },
  ])("rejects %j", (env) => {
    expect(() => parseRuntimeConfig(env, "/srv/cutout")).toThrow(ZodError);
  });
});
