/**
 * @hopline/logger - structured logging for every hopline component.
 *
 * ```ts
 * import { createLogger } from "@hopline/logger";
 *
 * const log = createLogger("resolver");
 * log.warn({ code, err }, "cache read failed, falling back to repository");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const level = (raw ?? "").toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? "info";
}

const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "hopline";

// ============================================================================
// Logger Factory
// ============================================================================

export interface LoggerOptions {
  /** Overrides LOG_LEVEL for this logger only */
  level?: LogLevel;
  /** Extra fields bound to every line */
  bindings?: Record<string, unknown>;
}

/**
 * Create a logger for one component. Names come out as `hopline:<name>`.
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const pretty = NODE_ENV === "development" && process.env.LOG_PRETTY !== "false";

  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? resolveLevel(process.env.LOG_LEVEL),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie", "*.password"],
      censor: "[redacted]",
    },
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      component: name,
      env: NODE_ENV,
      ...options.bindings,
    },
  });
}

export { resolveLevel };

export type { Logger } from "pino";
