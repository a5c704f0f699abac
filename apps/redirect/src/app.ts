/**
 * HTTP surface for the redirect service.
 *
 * Routes:
 *   GET    /health            - liveness, no dependencies
 *   GET    /health/ready      - cache and repository reachability
 *   GET    /metrics           - Prometheus text
 *   POST   /api/urls          - shorten
 *   GET    /api/urls          - list the caller's URLs
 *   GET    /api/urls/:code    - record details
 *   PATCH  /api/urls/:code    - update
 *   DELETE /api/urls/:code    - soft delete
 *   GET    /api/rate-limit    - the caller's rate limit state (not counted)
 *   GET    /:code             - redirect
 *
 * Redirects and every other /api/* route share one per-IP rate limit.
 *
 * The caller's identity arrives as X-User-Id from the auth layer in front of
 * this service.
 */

import { getConnInfo } from "@hono/node-server/conninfo";
import { Hono, type Context, type MiddlewareHandler } from "hono";
import { z } from "zod";
import type { CacheStore } from "@hopline/cache";
import { SORT_FIELDS, type UrlRecord, type UrlRepository } from "@hopline/db";
import { createLogger, type Logger } from "@hopline/logger";
import { ipKey, type RateLimitDecision, type RateLimiter } from "@hopline/ratelimit";
import {
  forbiddenError,
  internalError,
  isAppError,
  notFoundError,
  PAGINATION,
  rateLimitError,
  validationError,
  type ApiError,
  type ApiResponse,
  type AppError,
  type ClientInfo,
} from "@hopline/shared";
import * as metrics from "./metrics.js";
import type { RedirectResolver } from "./resolver.js";
import type { ReadinessResponse } from "./types.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const createUrlSchema = z.object({
  originalUrl: z.string({ required_error: "originalUrl is required" }),
  customAlias: z.string().nullable().optional(),
  /** Lifetime in seconds */
  expiresIn: z.number().int().positive().nullable().optional(),
});

const updateUrlSchema = z.object({
  originalUrl: z.string().optional(),
  expiresAt: z.string().datetime({ offset: true }).nullable().optional(),
  isActive: z.boolean().optional(),
});

const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(PAGINATION.MAX_PAGE_SIZE).default(PAGINATION.DEFAULT_PAGE_SIZE),
  sortBy: z.enum(SORT_FIELDS).default("created_at"),
  order: z.enum(["asc", "desc"]).default("desc"),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Redirects are never cached downstream: expiry and deactivation must take
 * effect on the next request.
 */
const CACHE_CONTROL = {
  REDIRECT: "private, no-cache",
  ERROR: "no-store",
} as const;

function toUrlResponse(record: UrlRecord, shortUrl: string) {
  return {
    shortCode: record.shortCode,
    shortUrl,
    originalUrl: record.originalUrl,
    customAlias: record.customAlias,
    userId: record.userId,
    isActive: record.isActive,
    clickCount: record.clickCount,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
    expiresAt: record.expiresAt?.toISOString() ?? null,
    lastAccessedAt: record.lastAccessedAt?.toISOString() ?? null,
  };
}

function ok<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

function errorResponse(err: AppError, headers: Record<string, string> = {}): Response {
  const body: ApiError = { success: false, error: err.toJSON() };
  return new Response(JSON.stringify(body), {
    status: err.status,
    headers: {
      "Content-Type": "application/json; charset=utf-8",
      "Cache-Control": CACHE_CONTROL.ERROR,
      ...headers,
    },
  });
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw validationError("Validation failed", { fields: result.error.flatten().fieldErrors });
  }
  return result.data;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw validationError("Request body must be valid JSON");
  }
}

function socketAddress(c: Context): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // No Node socket behind this request (app.request in tests, other runtimes)
    return undefined;
  }
}

/**
 * Client IP from common proxy headers, in priority order, then the socket.
 */
export function getClientIp(c: Context): string {
  const cfConnecting = c.req.header("cf-connecting-ip");
  if (cfConnecting) return cfConnecting;

  const forwardedFor = c.req.header("x-forwarded-for");
  if (forwardedFor) {
    // Comma-separated, first is the client
    const first = forwardedFor.split(",")[0]?.trim();
    if (first) return first;
  }

  const realIp = c.req.header("x-real-ip");
  if (realIp) return realIp;

  return socketAddress(c) || "unknown";
}

function getClientInfo(c: Context): ClientInfo {
  return {
    ip: getClientIp(c),
    userAgent: c.req.header("user-agent") ?? null,
    referer: c.req.header("referer") ?? null,
  };
}

function getUserId(c: Context): string | null {
  return c.req.header("x-user-id") || null;
}

function rateLimitHeaders(decision: RateLimitDecision): Record<string, string> {
  return {
    "X-RateLimit-Limit": String(decision.limit),
    "X-RateLimit-Remaining": String(decision.remaining),
    "X-RateLimit-Reset": String(Math.ceil(decision.resetAt / 1000)),
  };
}

// ============================================================================
// Application
// ============================================================================

export interface AppDependencies {
  resolver: RedirectResolver;
  limiter: RateLimiter;
  cache: Pick<CacheStore, "ping">;
  repository: Pick<UrlRepository, "ping">;
  logger?: Logger;
}

export function createApp(deps: AppDependencies): Hono {
  const { resolver, limiter, cache, repository } = deps;
  const log = deps.logger ?? createLogger("http");
  const app = new Hono();

  // --------------------------------------------------------------------------
  // Rate limiting
  // --------------------------------------------------------------------------

  const rateLimit: MiddlewareHandler = async (c, next) => {
    const decision = await limiter.check(ipKey(getClientIp(c)));
    if (decision.degraded) {
      metrics.increment("rate_limit_degraded");
    }

    const headers = rateLimitHeaders(decision);
    if (!decision.allowed) {
      metrics.increment("rate_limited");
      const retryAfter = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
      return errorResponse(rateLimitError({ retryAfterMs: decision.retryAfterMs }), {
        ...headers,
        "Retry-After": String(retryAfter),
      });
    }

    await next();
    for (const [name, value] of Object.entries(headers)) {
      c.res.headers.set(name, value);
    }
  };

  // --------------------------------------------------------------------------
  // Health & Monitoring
  // --------------------------------------------------------------------------

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/health/ready", async (c) => {
    const [cacheOk, dbOk] = await Promise.all([
      cache.ping().catch(() => false),
      repository.ping().catch(() => false),
    ]);

    const body: ReadinessResponse = {
      status: cacheOk && dbOk ? "ok" : dbOk ? "degraded" : "unhealthy",
      checks: {
        cache: cacheOk ? "ok" : "error",
        db: dbOk ? "ok" : "error",
      },
    };

    // Without the repository nothing resolves; without the cache everything still does
    return body.status === "unhealthy" ? c.json(body, 503) : c.json(body, 200);
  });

  app.get("/metrics", (c) => {
    c.header("Content-Type", "text/plain; version=0.0.4");
    return c.text(metrics.getMetrics());
  });

  // Registered ahead of the limiter so reading the state does not spend it
  app.get("/api/rate-limit", async (c) => {
    const info = await limiter.info(ipKey(getClientIp(c)));
    return c.json(ok(info));
  });

  // --------------------------------------------------------------------------
  // URL management
  // --------------------------------------------------------------------------

  app.use("/api/*", rateLimit);

  app.post("/api/urls", async (c) => {
    const body = parseBody(createUrlSchema, await readJson(c));

    const result = await resolver.shorten({
      originalUrl: body.originalUrl,
      customAlias: body.customAlias,
      expiresIn: body.expiresIn,
      userId: getUserId(c),
    });

    const payload = ok(toUrlResponse(result.record, result.shortUrl));
    return result.created ? c.json(payload, 201) : c.json(payload, 200);
  });

  app.get("/api/urls", async (c) => {
    const userId = getUserId(c);
    if (userId === null) {
      throw forbiddenError("X-User-Id is required to list URLs");
    }
    const query = parseBody(listQuerySchema, c.req.query());

    const page = await resolver.list({
      userId,
      page: query.page,
      pageSize: query.pageSize,
      sortBy: query.sortBy,
      sortDesc: query.order === "desc",
    });

    return c.json(
      ok({
        items: page.items.map((record) => toUrlResponse(record, resolver.shortUrl(record.shortCode))),
        pagination: page.pagination,
      })
    );
  });

  app.get("/api/urls/:code", async (c) => {
    const record = await resolver.getInfo(c.req.param("code"), getUserId(c));
    return c.json(ok(toUrlResponse(record, resolver.shortUrl(record.shortCode))));
  });

  app.patch("/api/urls/:code", async (c) => {
    const body = parseBody(updateUrlSchema, await readJson(c));
    if (body.originalUrl === undefined && body.expiresAt === undefined && body.isActive === undefined) {
      throw validationError("Nothing to update");
    }

    const record = await resolver.update(
      c.req.param("code"),
      {
        originalUrl: body.originalUrl,
        expiresAt: body.expiresAt === undefined ? undefined : body.expiresAt === null ? null : new Date(body.expiresAt),
        isActive: body.isActive,
      },
      getUserId(c)
    );
    return c.json(ok(toUrlResponse(record, resolver.shortUrl(record.shortCode))));
  });

  app.delete("/api/urls/:code", async (c) => {
    await resolver.delete(c.req.param("code"), getUserId(c));
    return c.body(null, 204);
  });

  // --------------------------------------------------------------------------
  // Redirect (the hot path)
  // --------------------------------------------------------------------------

  app.get("/:code", rateLimit, async (c) => {
    const url = await resolver.resolve(c.req.param("code"), getClientInfo(c));

    return new Response(null, {
      status: 302,
      headers: {
        Location: url,
        "Cache-Control": CACHE_CONTROL.REDIRECT,
        "Referrer-Policy": "strict-origin-when-cross-origin",
        "X-Content-Type-Options": "nosniff",
      },
    });
  });

  // --------------------------------------------------------------------------
  // Fallbacks
  // --------------------------------------------------------------------------

  app.notFound(() => errorResponse(notFoundError("Route not found")));

  app.onError((err) => {
    if (isAppError(err)) {
      if (err.status >= 500) {
        log.error({ err, code: err.code }, "request failed");
      }
      return errorResponse(err);
    }
    log.error({ err }, "unhandled error");
    return errorResponse(internalError("Internal server error", err));
  });

  return app;
}
