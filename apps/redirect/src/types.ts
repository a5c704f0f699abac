/**
 * Redirect Service Type Definitions
 */

import type { LogLevel } from "@hopline/logger";
import type { UrlRecord } from "@hopline/db";

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Where records, cache entries and rate limit counters live.
 *
 * `memory` keeps everything in this process and needs no external services.
 */
export type StorageConfig =
  | { driver: "memory" }
  | {
      driver: "redis";
      /** Redis connection URL, shared by cache and rate limiter */
      redisUrl: string;
      /** PostgreSQL connection URL */
      databaseUrl: string;
    };

export interface RateLimitSettings {
  /** fixed_window | sliding_window | token_bucket; anything else becomes sliding_window */
  policy: string;
  limit: number;
  windowMs: number;
  capacity: number;
  refillRate: number;
  failOpen: boolean;
}

export interface BackgroundSettings {
  /** Detached tasks allowed to run at once */
  concurrency: number;
  /** Tasks allowed to wait for a slot before new ones are dropped */
  queueLimit: number;
}

/**
 * Service configuration loaded from environment
 */
export interface Config {
  env: "development" | "test" | "staging" | "production";

  port: number;
  host: string;

  /** Prefix for returned short URLs, without a trailing slash */
  baseUrl: string;

  storage: StorageConfig;

  /** Redis operation deadline (ms) */
  redisTimeoutMs: number;

  /** Database query deadline (ms) */
  dbTimeoutMs: number;

  /** Positive cache TTL (seconds), jittered by ±8% on write */
  cacheTtlSeconds: number;

  /** Generated code length, clamped to 4-10 */
  shortCodeLength: number;

  rateLimit: RateLimitSettings;
  background: BackgroundSettings;

  /** BullMQ queue for access events; null logs them instead */
  analyticsQueue: string | null;

  logLevel: LogLevel;
}

// =============================================================================
// Resolver Types
// =============================================================================

export interface ShortenInput {
  originalUrl: string;
  customAlias?: string | null;
  /** Lifetime in seconds */
  expiresIn?: number | null;
  userId?: string | null;
}

export interface ShortenResult {
  record: UrlRecord;
  shortUrl: string;
  /** False when an existing record was returned */
  created: boolean;
}

/**
 * Fields a caller may change on an existing record. Absent fields are kept;
 * `expiresAt: null` clears the expiry.
 */
export interface UpdateInput {
  originalUrl?: string;
  expiresAt?: Date | null;
  isActive?: boolean;
}

// =============================================================================
// Health Check Types
// =============================================================================

export type DependencyStatus = "ok" | "error";

export interface ReadinessResponse {
  status: "ok" | "degraded" | "unhealthy";
  checks: {
    cache: DependencyStatus;
    db: DependencyStatus;
  };
}
