import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";
import { SUPPORTED_FORMATS, type SupportedFormat } from "./domain/image";
import type { PipelineConfig } from "./services/pipeline/pipelineConfig";
import { SEGMENTATION_MODELS } from "./services/segmentation/modelProfiles";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const RATE_WINDOWS: Record<string, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
};

export interface RateLimitRule {
  maxRequests: number;
  windowSeconds: number;
}

/**
 * Parse "<n> per <second|minute|hour|day>" (also "<n>/<unit>").
 * Returns null for anything else.
 */
export function parseRateLimit(value: string): RateLimitRule | null {
  const match = value.trim().match(/^(\d+)\s*(?:per\s+|\/\s*)(second|minute|hour|day)s?$/i);
  if (!match) return null;
  const maxRequests = Number.parseInt(match[1], 10);
  if (maxRequests <= 0) return null;
  return { maxRequests, windowSeconds: RATE_WINDOWS[match[2].toLowerCase()] };
}

const formatList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0),
  )
  .pipe(z.array(z.enum(SUPPORTED_FORMATS)).nonempty());

const rateLimit = z.string().transform((value, ctx) => {
  const rule = parseRateLimit(value);
  if (!rule) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid RATE_LIMIT "${value}" (expected e.g. "1500 per hour")`,
    });
    return z.NEVER;
  }
  return rule;
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  BIND_HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: boolFromEnv(false),
  // Upload / image limits
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(8 * 1024 * 1024), // 8MB
  MIN_IMAGE_SIZE: z.coerce.number().int().positive().default(100),
  MAX_IMAGE_WIDTH: z.coerce.number().int().positive().default(4000),
  MAX_IMAGE_HEIGHT: z.coerce.number().int().positive().default(4000),
  MAX_PROCESSING_DIMENSION: z.coerce.number().int().positive().default(2048),
  ALLOWED_EXTENSIONS: formatList.default(SUPPORTED_FORMATS.join(",")),
  // Segmentation model
  SEGMENTATION_MODEL: z.enum(SEGMENTATION_MODELS).default("u2net"),
  MODEL_DIR: z.string().default("models"),
  MODEL_PATH: z.string().optional(),
  SEGMENTER_PRELOAD: boolFromEnv(true),
  SEGMENTER_SERIALIZE: boolFromEnv(true),
  // HTTP
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT: rateLimit.default("1500 per hour"),
  CORS_ORIGINS: z.string().default("*"),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
});

export type EnvInput = Record<string, string | undefined>;

export interface RuntimeConfig {
  port: number;
  bindHost: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  logPretty: boolean;
  pipeline: PipelineConfig;
  segmentationModel: z.infer<typeof envSchema>["SEGMENTATION_MODEL"];
  modelPath: string;
  segmenterPreload: boolean;
  segmenterSerialize: boolean;
  requestTimeoutMs: number;
  rateLimit: RateLimitRule;
  /** "*" or explicit origins */
  corsOrigins: "*" | string[];
  gracefulShutdownMs: number;
}

// Backend root (apps/backend), so relative paths do not depend on process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const BACKEND_ROOT = path.resolve(__dirname, "..");

/**
 * Validate an environment map into the runtime configuration.
 * Throws a ZodError listing every invalid variable.
 */
export function parseRuntimeConfig(env: EnvInput, baseDir: string = BACKEND_ROOT): RuntimeConfig {
  const parsed = envSchema.parse(env);

  const supportedFormats: SupportedFormat[] = parsed.ALLOWED_EXTENSIONS;
  const modelPath = parsed.MODEL_PATH?.trim()
    ? path.resolve(baseDir, parsed.MODEL_PATH.trim())
    : path.resolve(baseDir, parsed.MODEL_DIR, `${parsed.SEGMENTATION_MODEL}.onnx`);

  const corsRaw = parsed.CORS_ORIGINS.trim();
  const corsOrigins: RuntimeConfig["corsOrigins"] =
    corsRaw === "*"
      ? "*"
      : corsRaw
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0);

  return {
    port: parsed.PORT,
    bindHost: parsed.BIND_HOST,
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    pipeline: {
      supportedFormats,
      maxUploadBytes: parsed.MAX_FILE_SIZE,
      minDimension: parsed.MIN_IMAGE_SIZE,
      maxWidth: parsed.MAX_IMAGE_WIDTH,
      maxHeight: parsed.MAX_IMAGE_HEIGHT,
      maxProcessingDimension: parsed.MAX_PROCESSING_DIMENSION,
    },
    segmentationModel: parsed.SEGMENTATION_MODEL,
    modelPath,
    segmenterPreload: parsed.SEGMENTER_PRELOAD,
    segmenterSerialize: parsed.SEGMENTER_SERIALIZE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    rateLimit: parsed.RATE_LIMIT,
    corsOrigins,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}

/**
 * Load apps/backend/.env (if present) and parse process.env.
 */
export function loadRuntimeConfig(): RuntimeConfig {
  const envPath = path.resolve(BACKEND_ROOT, ".env");
  const envResult = loadEnv({ path: envPath });

  if (envResult.error) {
    console.warn(`[config] No .env loaded from ${envPath}: ${envResult.error.message}`);
  } else {
    console.log(`[config] Loaded environment from ${envPath}`);
  }

  return parseRuntimeConfig(process.env);
}
