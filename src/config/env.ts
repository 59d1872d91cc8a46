import { loadEnv, z } from "@/deps.ts";
import type { LogLevelName } from "@config/logging.ts";

/**
 * Environment Configuration
 * Loads and validates environment variables for different environments
 */

export interface Config {
  // Runtime
  environment: "development" | "staging" | "production" | "test";
  logLevel: LogLevelName;

  // Redis
  redisUrl: string;

  // Rate limiting
  enableRateLimiting: boolean;
  rateLimitPerMinute: number;
  rateLimitWindowSeconds: number;

  // Cache and retention
  cacheTtlSeconds: number;
  cacheLockLeaseMs: number;
  cacheLockWaitTimeoutMs: number;
  cachePollIntervalMs: number;
  jobTtlSeconds: number;

  // Processing
  jobWorkers: number;
  workerPoolSize: number;
  chunkTimeoutMs: number;
  queuePollIntervalMs: number;
  maxQueueSize: number;
  queueRejectionEnabled: boolean;

  // Documents
  defaultDpi: number;
  defaultChunkSize: number;
  maxPages: number;
  pageTextThreshold: number;
  maxImageSize: number; // in bytes
  maxPdfSize: number; // in bytes
}

const flag = (fallback: "true" | "false") =>
  z.enum(["true", "false"]).default(fallback).transform((value) => value === "true");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ENVIRONMENT: z.enum(["development", "staging", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "SILENT"]).default("INFO"),

  REDIS_URL: z.string().url().default("redis://localhost:6379"),

  ENABLE_RATE_LIMITING: flag("true"),
  RATE_LIMIT_PER_MINUTE: positiveInt(10),
  RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),

  CACHE_TTL_SECONDS: positiveInt(3600),
  CACHE_LOCK_LEASE_MS: positiveInt(600_000),
  CACHE_LOCK_WAIT_TIMEOUT_MS: positiveInt(120_000),
  CACHE_POLL_INTERVAL_MS: positiveInt(250),
  JOB_TTL_SECONDS: positiveInt(3600),

  JOB_WORKERS: positiveInt(2),
  WORKER_POOL_SIZE: positiveInt(4),
  CHUNK_TIMEOUT_MS: positiveInt(540_000),
  QUEUE_POLL_INTERVAL_MS: positiveInt(1000),
  MAX_QUEUE_SIZE: positiveInt(100),
  QUEUE_REJECTION_ENABLED: flag("true"),

  DEFAULT_DPI: positiveInt(300),
  DEFAULT_CHUNK_SIZE: positiveInt(10),
  MAX_PAGES: positiveInt(100),
  PAGE_TEXT_THRESHOLD: z.coerce.number().int().nonnegative().default(30),
  MAX_IMAGE_SIZE: positiveInt(10 * 1024 * 1024),
  MAX_PDF_SIZE: positiveInt(50 * 1024 * 1024),
});

/**
 * Load and validate environment configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`Invalid environment configuration: ${invalid}`);
  }

  const env = parsed.data;

  return {
    environment: env.ENVIRONMENT,
    logLevel: env.LOG_LEVEL,

    redisUrl: env.REDIS_URL,

    enableRateLimiting: env.ENABLE_RATE_LIMITING,
    rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    rateLimitWindowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,

    cacheTtlSeconds: env.CACHE_TTL_SECONDS,
    cacheLockLeaseMs: env.CACHE_LOCK_LEASE_MS,
    cacheLockWaitTimeoutMs: env.CACHE_LOCK_WAIT_TIMEOUT_MS,
    cachePollIntervalMs: env.CACHE_POLL_INTERVAL_MS,
    jobTtlSeconds: env.JOB_TTL_SECONDS,

    jobWorkers: env.JOB_WORKERS,
    workerPoolSize: env.WORKER_POOL_SIZE,
    chunkTimeoutMs: env.CHUNK_TIMEOUT_MS,
    queuePollIntervalMs: env.QUEUE_POLL_INTERVAL_MS,
    maxQueueSize: env.MAX_QUEUE_SIZE,
    queueRejectionEnabled: env.QUEUE_REJECTION_ENABLED,

    defaultDpi: env.DEFAULT_DPI,
    defaultChunkSize: env.DEFAULT_CHUNK_SIZE,
    maxPages: env.MAX_PAGES,
    pageTextThreshold: env.PAGE_TEXT_THRESHOLD,
    maxImageSize: env.MAX_IMAGE_SIZE,
    maxPdfSize: env.MAX_PDF_SIZE,
  };
}

/**
 * Validate cross-field constraints
 */
export function validateConfig(config: Config): void {
  if (config.defaultDpi < 72 || config.defaultDpi > 600) {
    throw new Error("DEFAULT_DPI must be between 72 and 600");
  }

  if (config.maxPdfSize > 50 * 1024 * 1024 || config.maxImageSize > 50 * 1024 * 1024) {
    throw new Error("Document size limits cannot exceed 50MB");
  }

  if (config.cacheLockWaitTimeoutMs <= config.cachePollIntervalMs) {
    throw new Error("CACHE_LOCK_WAIT_TIMEOUT_MS must be longer than CACHE_POLL_INTERVAL_MS");
  }
}

// Global configuration instance
let globalConfig: Config | null = null;

/**
 * Get global configuration (loads once, cached thereafter)
 */
export function getConfig(): Config {
  if (!globalConfig) {
    loadEnv();
    globalConfig = loadConfig();
    validateConfig(globalConfig);
  }
  return globalConfig;
}
