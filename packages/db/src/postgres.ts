/**
 * PostgreSQL UrlRepository
 *
 * Raw SQL over a pg Pool, no ORM. Deleted rows (`deleted_at IS NOT NULL`)
 * are filtered at query level.
 */

import type { Pool, QueryResult, QueryResultRow } from "pg";
import { createLogger, type Logger } from "@hopline/logger";
import {
  DeadlineExceededError,
  conflictError,
  notFoundError,
  unavailableError,
  withDeadline,
} from "@hopline/shared";
import {
  rowToUrlRecord,
  type CreateUrlInput,
  type ListUrlsQuery,
  type ListUrlsResult,
  type SortField,
  type UrlRecord,
  type UrlRepository,
  type UrlRow,
} from "./types.js";

export type SqlPool = Pick<Pool, "query" | "end">;

export interface PostgresUrlRepositoryOptions {
  /** Client-side deadline per query in ms */
  timeoutMs?: number;
  /** Queries slower than this are logged */
  slowQueryMs?: number;
  logger?: Logger;
}

// =============================================================================
// SQL Queries
// =============================================================================

const COLUMNS = `id, short_code, original_url, custom_alias, user_id, created_at, updated_at,
  expires_at, is_active, click_count, last_accessed_at`;

const INSERT_QUERY = `
  INSERT INTO urls (short_code, original_url, custom_alias, user_id, expires_at)
  VALUES ($1, $2, $3, $4, $5)
  RETURNING ${COLUMNS}
`;

const LOOKUP_QUERY = `
  SELECT ${COLUMNS}
  FROM urls
  WHERE short_code = $1
    AND deleted_at IS NULL
  LIMIT 1
`;

const BY_ORIGINAL_QUERY = `
  SELECT ${COLUMNS}
  FROM urls
  WHERE original_url = $1
    AND user_id IS NOT DISTINCT FROM $2
    AND is_active = true
    AND deleted_at IS NULL
  ORDER BY created_at DESC
  LIMIT 1
`;

const UPDATE_QUERY = `
  UPDATE urls
  SET original_url = $2, custom_alias = $3, expires_at = $4, is_active = $5, updated_at = NOW()
  WHERE short_code = $1
    AND deleted_at IS NULL
  RETURNING ${COLUMNS}
`;

const SOFT_DELETE_QUERY = `
  UPDATE urls
  SET is_active = false, deleted_at = NOW(), updated_at = NOW()
  WHERE short_code = $1
    AND deleted_at IS NULL
    AND ($2::varchar IS NULL OR user_id = $2)
`;

const INCREMENT_CLICKS_QUERY = `
  UPDATE urls SET click_count = click_count + 1
  WHERE short_code = $1 AND deleted_at IS NULL
`;

const TOUCH_QUERY = `
  UPDATE urls SET last_accessed_at = $2
  WHERE short_code = $1 AND deleted_at IS NULL
`;

// Sees deleted rows too: a code is never handed out twice
const EXISTS_QUERY = `
  SELECT 1 FROM urls WHERE short_code = $1 OR custom_alias = $1 LIMIT 1
`;

const HEALTH_QUERY = "SELECT 1";

const SORT_COLUMNS: Record<SortField, string> = {
  created_at: "created_at",
  click_count: "click_count",
  last_accessed_at: "last_accessed_at",
};

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

// =============================================================================
// Repository
// =============================================================================

export class PostgresUrlRepository implements UrlRepository {
  private readonly pool: SqlPool;
  private readonly timeoutMs: number;
  private readonly slowQueryMs: number;
  private readonly log: Logger;

  constructor(pool: SqlPool, options: PostgresUrlRepositoryOptions = {}) {
    this.pool = pool;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.slowQueryMs = options.slowQueryMs ?? 30;
    this.log = options.logger ?? createLogger("db");
  }

  async create(input: CreateUrlInput): Promise<UrlRecord> {
    try {
      const result = await this.execute<UrlRow>("urls.create", INSERT_QUERY, [
        input.shortCode,
        input.originalUrl,
        input.customAlias,
        input.userId,
        input.expiresAt,
      ], true);
      return rowToUrlRecord(result.rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw conflictError("Short code or alias already exists", { shortCode: input.shortCode });
      }
      throw err;
    }
  }

  async getByShortCode(shortCode: string): Promise<UrlRecord | null> {
    const result = await this.execute<UrlRow>("urls.getByShortCode", LOOKUP_QUERY, [shortCode]);
    return result.rows.length > 0 ? rowToUrlRecord(result.rows[0]) : null;
  }

  async getByOriginalUrl(originalUrl: string, userId: string | null): Promise<UrlRecord | null> {
    const result = await this.execute<UrlRow>("urls.getByOriginalUrl", BY_ORIGINAL_QUERY, [originalUrl, userId]);
    return result.rows.length > 0 ? rowToUrlRecord(result.rows[0]) : null;
  }

  async update(record: UrlRecord): Promise<UrlRecord> {
    let result: QueryResult<UrlRow>;
    try {
      result = await this.execute<UrlRow>("urls.update", UPDATE_QUERY, [
        record.shortCode,
        record.originalUrl,
        record.customAlias,
        record.expiresAt,
        record.isActive,
      ], true);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw conflictError("Alias already exists", { customAlias: record.customAlias });
      }
      throw err;
    }
    if (result.rows.length === 0) {
      throw notFoundError();
    }
    return rowToUrlRecord(result.rows[0]);
  }

  async delete(shortCode: string, userId: string | null): Promise<void> {
    const result = await this.execute("urls.delete", SOFT_DELETE_QUERY, [shortCode, userId], true);
    if ((result.rowCount ?? 0) === 0) {
      throw notFoundError();
    }
  }

  async incrementClickCount(shortCode: string): Promise<void> {
    await this.execute("urls.incrementClickCount", INCREMENT_CLICKS_QUERY, [shortCode], true);
  }

  async updateLastAccessed(shortCode: string, at: Date): Promise<void> {
    await this.execute("urls.updateLastAccessed", TOUCH_QUERY, [shortCode, at], true);
  }

  async exists(shortCode: string): Promise<boolean> {
    const result = await this.execute("urls.exists", EXISTS_QUERY, [shortCode]);
    return result.rows.length > 0;
  }

  async list(query: ListUrlsQuery): Promise<ListUrlsResult> {
    const values: unknown[] = [];
    let where = "deleted_at IS NULL";
    if (query.userId !== undefined) {
      values.push(query.userId);
      where += ` AND user_id = $${values.length}`;
    }

    const direction = query.sortDesc ? "DESC" : "ASC";
    const offset = (query.page - 1) * query.pageSize;

    const [count, rows] = await Promise.all([
      this.execute<{ total: number }>("urls.count", `SELECT COUNT(*)::int AS total FROM urls WHERE ${where}`, values),
      this.execute<UrlRow>(
        "urls.list",
        `SELECT ${COLUMNS} FROM urls WHERE ${where}
         ORDER BY ${SORT_COLUMNS[query.sortBy]} ${direction} NULLS LAST, short_code ASC
         LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
        [...values, query.pageSize, offset]
      ),
    ]);

    return {
      items: rows.rows.map(rowToUrlRecord),
      totalCount: count.rows.length > 0 ? Number(count.rows[0].total) : 0,
    };
  }

  async ping(): Promise<boolean> {
    try {
      await this.execute("urls.ping", HEALTH_QUERY, []);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Run one statement under the query deadline. A read that times out may be
   * retried; a write that times out has an unknown outcome and may not.
   */
  private async execute<R extends QueryResultRow = QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[],
    isWrite = false
  ): Promise<QueryResult<R>> {
    const start = performance.now();
    try {
      return await withDeadline(this.pool.query<R>(text, values), this.timeoutMs, operation);
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        this.log.error({ operation, timeoutMs: this.timeoutMs }, "query deadline exceeded");
        throw unavailableError(
          isWrite ? "Database write timed out, outcome unknown" : "Database read timed out",
          { retryable: !isWrite, cause: err }
        );
      }
      throw err;
    } finally {
      const latency = performance.now() - start;
      if (latency > this.slowQueryMs) {
        this.log.warn({ operation, latencyMs: Math.round(latency) }, "slow query");
      }
    }
  }
}
