/**
 * PostgreSQL pool factory.
 *
 * Pool sizing is kept small: every query here is a single-row lookup or update.
 */

import { Pool } from "pg";
import { createLogger } from "@hopline/logger";

const log = createLogger("db");

export interface PoolOptions {
  connectionString: string;
  /** Statement and client-side query timeout in ms */
  timeoutMs: number;
  max?: number;
}

export function createPool(options: PoolOptions): Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    min: 2,
    max: options.max ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 2_000,
    statement_timeout: options.timeoutMs,
    query_timeout: options.timeoutMs,
  });

  // An idle client erroring must not crash the process
  pool.on("error", (err) => log.error({ err }, "idle client error"));

  return pool;
}
