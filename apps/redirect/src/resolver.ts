/**
 * RedirectResolver - cache-aside resolution with authoritative re-validation.
 *
 * Resolve flow:
 * 1. Reject malformed codes before any I/O
 * 2. Read the cache (errors and deadline overruns count as a miss)
 * 3. Always load the record from the repository; the cache holds only the
 *    URL string, so expiry and the active flag come from the record
 * 4. Not found / expired / inactive: invalidate the cache entry in the background
 * 5. Success: click count, last-accessed, analytics and (on a miss) the cache
 *    write run in the background, after the caller has its answer
 *
 * Update and delete invalidate the cache before they return.
 */

import type { AnalyticsRecorder } from "@hopline/analytics";
import type { CacheStore } from "@hopline/cache";
import {
  canAccess,
  isExpired,
  type ListUrlsQuery,
  type SortField,
  type UrlRecord,
  type UrlRepository,
} from "@hopline/db";
import { createLogger, type Logger } from "@hopline/logger";
import {
  CACHE_CONFIG,
  CACHE_KEYS,
  conflictError,
  createCodeGenerator,
  ErrorCode,
  expiredError,
  forbiddenError,
  generateUniqueCode,
  inactiveError,
  invalidShortCodeError,
  isAppError,
  isValidShortCodeOrAlias,
  notFoundError,
  PAGINATION,
  sanitizeUrl,
  systemClock,
  unavailableError,
  validateCustomAlias,
  validateUrl,
  validationError,
  withDeadline,
  type ClientInfo,
  type Clock,
  type CodeGenerator,
  type PaginatedResponse,
} from "@hopline/shared";
import type { BackgroundTasks } from "./background.js";
import * as metrics from "./metrics.js";
import type { ShortenInput, ShortenResult, UpdateInput } from "./types.js";

export interface RedirectResolverOptions {
  repository: UrlRepository;
  cache: CacheStore;
  analytics: AnalyticsRecorder;
  background: BackgroundTasks;
  /** Prefix for short URLs, without a trailing slash */
  baseUrl: string;
  generator?: CodeGenerator;
  cacheTtlSeconds?: number;
  /** Deadline for each cache call in ms (0 disables) */
  cacheTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface ListInput {
  userId: string;
  page?: number;
  pageSize?: number;
  sortBy?: SortField;
  sortDesc?: boolean;
}

function outcomeOf(err: unknown): metrics.ResolveOutcome {
  if (!isAppError(err)) {
    return "error";
  }
  switch (err.code) {
    case ErrorCode.NOT_FOUND:
      return "not_found";
    case ErrorCode.EXPIRED:
      return "expired";
    case ErrorCode.INACTIVE:
      return "inactive";
    case ErrorCode.INVALID_SHORT_CODE:
      return "invalid";
    default:
      return "error";
  }
}

/**
 * Trim and default the scheme, then validate. Returns the URL to store.
 */
function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  const url = trimmed === "" ? "" : sanitizeUrl(trimmed);
  const check = validateUrl(url);
  if (!check.valid) {
    throw validationError(check.error ?? "Invalid URL", { field: "originalUrl" });
  }
  return url;
}

export class RedirectResolver {
  private readonly repository: UrlRepository;
  private readonly cache: CacheStore;
  private readonly analytics: AnalyticsRecorder;
  private readonly background: BackgroundTasks;
  private readonly baseUrl: string;
  private readonly generator: CodeGenerator;
  private readonly cacheTtlSeconds: number;
  private readonly cacheTimeoutMs: number;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(options: RedirectResolverOptions) {
    this.repository = options.repository;
    this.cache = options.cache;
    this.analytics = options.analytics;
    this.background = options.background;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.generator = options.generator ?? createCodeGenerator();
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? CACHE_CONFIG.DEFAULT_TTL_SECONDS;
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? 0;
    this.now = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("resolver");
  }

  shortUrl(shortCode: string): string {
    return `${this.baseUrl}/${shortCode}`;
  }

  // ===========================================================================
  // Shorten
  // ===========================================================================

  /**
   * Create a short URL, or return the caller's existing live record for the
   * same URL when the alias intent matches.
   *
   * @throws AppError(VALIDATION_ERROR | CONFLICT | INTERNAL_ERROR)
   */
  async shorten(input: ShortenInput): Promise<ShortenResult> {
    const originalUrl = normalizeUrl(input.originalUrl);
    const customAlias = input.customAlias ?? null;
    const userId = input.userId ?? null;

    if (customAlias !== null) {
      const check = validateCustomAlias(customAlias);
      if (!check.valid) {
        throw validationError(check.error ?? "Invalid custom alias", { field: "customAlias" });
      }
    }

    let expiresAt: Date | null = null;
    if (input.expiresIn !== undefined && input.expiresIn !== null) {
      if (!Number.isFinite(input.expiresIn) || input.expiresIn <= 0) {
        throw validationError("expiresIn must be a positive number of seconds", { field: "expiresIn" });
      }
      expiresAt = new Date(this.now() + input.expiresIn * 1000);
    }

    const existing = await this.repository.getByOriginalUrl(originalUrl, userId);
    if (existing && !isExpired(existing, new Date(this.now()))) {
      if (existing.customAlias !== customAlias) {
        throw conflictError("URL already shortened with a different alias", {
          shortCode: existing.shortCode,
        });
      }
      metrics.increment("shorten_reused");
      return { record: existing, shortUrl: this.shortUrl(existing.shortCode), created: false };
    }

    let shortCode: string;
    if (customAlias !== null) {
      if (await this.repository.exists(customAlias)) {
        throw conflictError("Custom alias already taken", { customAlias });
      }
      shortCode = customAlias;
    } else {
      shortCode = await generateUniqueCode(originalUrl, (code) => this.repository.exists(code), this.generator);
    }

    const record = await this.repository.create({ shortCode, originalUrl, customAlias, userId, expiresAt });

    metrics.increment("shorten_created");
    this.log.info({ shortCode, userId, custom: customAlias !== null }, "short url created");
    await this.warmCache(shortCode, originalUrl);

    return { record, shortUrl: this.shortUrl(shortCode), created: true };
  }

  // ===========================================================================
  // Resolve (hot path)
  // ===========================================================================

  /**
   * Map a short code to its destination URL.
   *
   * @throws AppError(INVALID_SHORT_CODE | NOT_FOUND | EXPIRED | INACTIVE), or
   *   whatever the repository raised
   */
  async resolve(shortCode: string, client?: ClientInfo): Promise<string> {
    const start = performance.now();
    try {
      const url = await this.lookup(shortCode, client);
      metrics.recordResolve("success", performance.now() - start);
      return url;
    } catch (err) {
      metrics.recordResolve(outcomeOf(err), performance.now() - start);
      throw err;
    }
  }

  private async lookup(shortCode: string, client: ClientInfo | undefined): Promise<string> {
    if (!isValidShortCodeOrAlias(shortCode)) {
      throw invalidShortCodeError(shortCode);
    }

    const cached = await this.readCache(shortCode);
    const record = await this.repository.getByShortCode(shortCode);

    if (!record) {
      if (cached !== null) this.scheduleInvalidation(shortCode);
      throw notFoundError();
    }
    if (isExpired(record, new Date(this.now()))) {
      if (cached !== null) this.scheduleInvalidation(shortCode);
      throw expiredError();
    }
    if (!record.isActive) {
      if (cached !== null) this.scheduleInvalidation(shortCode);
      throw inactiveError();
    }

    if (cached === null) {
      this.background.run("cache.populate", () =>
        withDeadline(
          this.cache.set(CACHE_KEYS.url(shortCode), record.originalUrl, this.cacheTtlSeconds),
          this.cacheTimeoutMs,
          "cache.set"
        )
      );
    }
    this.scheduleAccessSideEffects(shortCode, client);

    return cached ?? record.originalUrl;
  }

  private async readCache(shortCode: string): Promise<string | null> {
    try {
      const value = await withDeadline(this.cache.get(CACHE_KEYS.url(shortCode)), this.cacheTimeoutMs, "cache.get");
      metrics.increment(value === null ? "cache_miss" : "cache_hit");
      return value;
    } catch (err) {
      metrics.increment("cache_error");
      metrics.increment("cache_miss");
      this.log.warn({ err, shortCode }, "cache read failed, falling back to repository");
      return null;
    }
  }

  /** Seed the cache for a new code. Failures are logged, never raised. */
  private async warmCache(shortCode: string, originalUrl: string): Promise<void> {
    try {
      await withDeadline(
        this.cache.set(CACHE_KEYS.url(shortCode), originalUrl, this.cacheTtlSeconds),
        this.cacheTimeoutMs,
        "cache.set"
      );
    } catch (err) {
      metrics.increment("cache_error");
      this.log.warn({ err, shortCode }, "cache write after create failed");
    }
  }

  private scheduleAccessSideEffects(shortCode: string, client: ClientInfo | undefined): void {
    const accessedAt = new Date(this.now());

    this.background.run("repository.incrementClickCount", () => this.repository.incrementClickCount(shortCode));
    this.background.run("repository.updateLastAccessed", () =>
      this.repository.updateLastAccessed(shortCode, accessedAt)
    );
    if (client) {
      this.background.run("analytics.recordAccess", () => this.analytics.recordAccess(shortCode, client));
    }
  }

  private scheduleInvalidation(shortCode: string): void {
    this.background.run("cache.invalidate", () =>
      withDeadline(this.cache.delete(CACHE_KEYS.url(shortCode)), this.cacheTimeoutMs, "cache.delete")
    );
  }

  /**
   * Remove the cache entry before a mutation returns. A stale entry must not
   * outlive the change, so a failure here fails the call.
   */
  private async invalidate(shortCode: string): Promise<void> {
    try {
      await withDeadline(this.cache.delete(CACHE_KEYS.url(shortCode)), this.cacheTimeoutMs, "cache.delete");
    } catch (err) {
      this.log.error({ err, shortCode }, "cache invalidation failed after mutation");
      throw unavailableError("Cache invalidation failed; retry the request", { retryable: true, cause: err });
    }
  }

  // ===========================================================================
  // Management
  // ===========================================================================

  private async loadOwned(shortCode: string, userId: string | null): Promise<UrlRecord> {
    if (!isValidShortCodeOrAlias(shortCode)) {
      throw invalidShortCodeError(shortCode);
    }
    const record = await this.repository.getByShortCode(shortCode);
    if (!record) {
      throw notFoundError();
    }
    if (!canAccess(record, userId)) {
      throw forbiddenError();
    }
    return record;
  }

  /**
   * @throws AppError(INVALID_SHORT_CODE | NOT_FOUND | FORBIDDEN)
   */
  async getInfo(shortCode: string, userId: string | null = null): Promise<UrlRecord> {
    return this.loadOwned(shortCode, userId);
  }

  /**
   * Apply `changes` and drop the cached URL before returning.
   *
   * @throws AppError(INVALID_SHORT_CODE | VALIDATION_ERROR | NOT_FOUND | FORBIDDEN | UNAVAILABLE)
   */
  async update(shortCode: string, changes: UpdateInput, userId: string | null = null): Promise<UrlRecord> {
    const record = await this.loadOwned(shortCode, userId);

    const next: UrlRecord = { ...record };
    if (changes.originalUrl !== undefined) {
      next.originalUrl = normalizeUrl(changes.originalUrl);
    }
    if (changes.expiresAt !== undefined) {
      next.expiresAt = changes.expiresAt;
    }
    if (changes.isActive !== undefined) {
      next.isActive = changes.isActive;
    }

    const updated = await this.repository.update(next);
    await this.invalidate(shortCode);

    this.log.info({ shortCode, userId }, "short url updated");
    return updated;
  }

  /**
   * Soft-delete the record and drop the cached URL before returning.
   *
   * @throws AppError(INVALID_SHORT_CODE | NOT_FOUND | FORBIDDEN | UNAVAILABLE)
   */
  async delete(shortCode: string, userId: string | null = null): Promise<void> {
    const record = await this.loadOwned(shortCode, userId);

    await this.repository.delete(shortCode, record.userId === null ? null : userId);
    await this.invalidate(shortCode);

    this.log.info({ shortCode, userId }, "short url deleted");
  }

  /**
   * One page of the owner's live records.
   */
  async list(input: ListInput): Promise<PaginatedResponse<UrlRecord>> {
    const page = input.page ?? 1;
    const pageSize = input.pageSize ?? PAGINATION.DEFAULT_PAGE_SIZE;
    const sortBy = input.sortBy ?? "created_at";

    if (!Number.isInteger(page) || page < 1) {
      throw validationError("page must be a positive integer", { page });
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > PAGINATION.MAX_PAGE_SIZE) {
      throw validationError(`pageSize must be between 1 and ${PAGINATION.MAX_PAGE_SIZE}`, { pageSize });
    }

    const query: ListUrlsQuery = {
      userId: input.userId,
      page,
      pageSize,
      sortBy,
      sortDesc: input.sortDesc ?? true,
    };
    const { items, totalCount } = await this.repository.list(query);
    const totalPages = Math.ceil(totalCount / pageSize);

    return {
      items,
      pagination: {
        page,
        pageSize,
        totalItems: totalCount,
        totalPages,
        hasMore: page < totalPages,
      },
    };
  }
}
