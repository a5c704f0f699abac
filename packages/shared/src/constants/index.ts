/**
 * Shared constants for code generation, URL validation and cache keys.
 */

export const SHORTCODE_CONFIG = {
  /** 62^7 = ~3.5 trillion combinations */
  DEFAULT_LENGTH: 7,
  MIN_LENGTH: 4,
  MAX_LENGTH: 10,

  /** Digits, then lowercase, then uppercase. The order is part of the encoding. */
  ALPHABET: "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ",

  /** Attempts 1..4 re-hash with a salt, later attempts are random */
  SALTED_ATTEMPTS: 4,
  MAX_ATTEMPTS: 10,

  CUSTOM_ALIAS: {
    MIN_LENGTH: 3,
    MAX_LENGTH: 50,
    PATTERN: /^[A-Za-z0-9_-]+$/,
  },
} as const;

export const URL_CONFIG = {
  MIN_LENGTH: 10,
  MAX_LENGTH: 2048,
  ALLOWED_PROTOCOLS: ["http:", "https:", "ftp:", "ftps:"] as const,
  /** Substrings that are never accepted anywhere in a destination URL */
  BLOCKED_PATTERNS: ["javascript:", "data:", "vbscript:", "file:", "about:"] as const,
  BLOCKED_HOSTS: ["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"] as const,
} as const;

/**
 * Aliases that would shadow routes or look like service endpoints.
 */
export const RESERVED_ALIASES: ReadonlySet<string> = new Set([
  "api",
  "admin",
  "www",
  "mail",
  "ftp",
  "localhost",
  "stats",
  "analytics",
  "dashboard",
  "health",
  "metrics",
  "docs",
  "swagger",
  "graphql",
  "webhook",
  "callback",
]);

export const CACHE_CONFIG = {
  KEY_PREFIX: "url:",
  DEFAULT_TTL_SECONDS: 3600,
  /** +/- fraction applied to every TTL so entries written together don't expire together */
  TTL_JITTER: 0.08,
} as const;

export const CACHE_KEYS = {
  url: (shortCode: string): string => `${CACHE_CONFIG.KEY_PREFIX}${shortCode}`,
} as const;

export const PAGINATION = {
  DEFAULT_PAGE_SIZE: 20,
  MAX_PAGE_SIZE: 100,
} as const;
