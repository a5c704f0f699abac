/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * Fails fast on startup if required vars are missing.
 */

import { createLogger, resolveLevel, type Logger } from "@hopline/logger";
import { CACHE_CONFIG, clampLength } from "@hopline/shared";
import type { Config, StorageConfig } from "./types.js";

type Env = NodeJS.ProcessEnv;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalFloat(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * "false" and "0" are false, anything else set is true.
 */
function optionalBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name];
  if (!value) return defaultValue;
  return !["false", "0", "no", "off"].includes(value.toLowerCase());
}

function parseEnvName(value: string): Config["env"] {
  switch (value) {
    case "test":
    case "staging":
    case "production":
      return value;
    default:
      return "development";
  }
}

function loadStorage(env: Env): StorageConfig {
  const driver = optional(env, "STORAGE_DRIVER", "redis").toLowerCase();
  if (driver === "memory") {
    return { driver: "memory" };
  }
  if (driver !== "redis") {
    throw new Error(`Unknown STORAGE_DRIVER: ${driver} (expected redis or memory)`);
  }
  return {
    driver: "redis",
    redisUrl: required(env, "REDIS_URL"),
    databaseUrl: required(env, "DATABASE_URL"),
  };
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: Env = process.env): Config {
  const port = optionalInt(env, "PORT", 3002);
  const limit = optionalInt(env, "RATE_LIMIT", 100);

  return {
    env: parseEnvName(optional(env, "NODE_ENV", "development")),

    // Server
    port,
    host: optional(env, "HOST", "0.0.0.0"),
    baseUrl: optional(env, "BASE_URL", `http://localhost:${port}`).replace(/\/+$/, ""),

    // Stores
    storage: loadStorage(env),
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 50),
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 100),

    // Cache TTL
    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", CACHE_CONFIG.DEFAULT_TTL_SECONDS),

    shortCodeLength: clampLength(optionalInt(env, "SHORT_CODE_LENGTH", 7)),

    rateLimit: {
      policy: optional(env, "RATE_LIMIT_POLICY", "sliding_window"),
      limit,
      windowMs: optionalInt(env, "RATE_LIMIT_WINDOW_MS", 60_000),
      capacity: optionalInt(env, "RATE_LIMIT_CAPACITY", limit),
      refillRate: optionalFloat(env, "RATE_LIMIT_REFILL_RATE", limit),
      failOpen: optionalBool(env, "RATE_LIMIT_FAIL_OPEN", true),
    },

    background: {
      concurrency: optionalInt(env, "BACKGROUND_CONCURRENCY", 32),
      queueLimit: optionalInt(env, "BACKGROUND_QUEUE_LIMIT", 1000),
    },

    analyticsQueue: env.ANALYTICS_QUEUE || null,

    logLevel: resolveLevel(env.LOG_LEVEL),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: Config, log: Logger = createLogger("config")): void {
  if (config.redisTimeoutMs > 100) {
    log.warn({ redisTimeoutMs: config.redisTimeoutMs }, "REDIS_TIMEOUT_MS is high, consider <=50ms");
  }

  if (config.dbTimeoutMs > 200) {
    log.warn({ dbTimeoutMs: config.dbTimeoutMs }, "DB_TIMEOUT_MS is high, consider <=100ms");
  }

  if (config.cacheTtlSeconds < 60) {
    log.warn({ cacheTtlSeconds: config.cacheTtlSeconds }, "CACHE_TTL_SECONDS is short, expect more database reads");
  }

  if (config.storage.driver === "memory" && config.env === "production") {
    log.warn("STORAGE_DRIVER=memory in production: records are lost on restart and limits are per-process");
  }

  if (!config.rateLimit.failOpen) {
    log.warn("RATE_LIMIT_FAIL_OPEN=false: a rate limiter outage will reject redirects");
  }

  if (config.background.concurrency < 1) {
    log.warn({ concurrency: config.background.concurrency }, "BACKGROUND_CONCURRENCY below 1, running one task at a time");
  }
}
