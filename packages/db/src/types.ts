/**
 * URL record model and repository contract.
 *
 * @see schema.sql for the table definition
 */

// =============================================================================
// TABLE: urls
// =============================================================================

export interface UrlRecord {
  id: string;
  /** Generated code or the custom alias, unique */
  shortCode: string;
  originalUrl: string;
  customAlias: string | null;
  /** Owner, null for anonymous links */
  userId: string | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date | null;
  isActive: boolean;
  clickCount: number;
  lastAccessedAt: Date | null;
}

export interface CreateUrlInput {
  shortCode: string;
  originalUrl: string;
  customAlias: string | null;
  userId: string | null;
  expiresAt: Date | null;
}

// =============================================================================
// QUERY TYPES
// =============================================================================

export const SORT_FIELDS = ["created_at", "click_count", "last_accessed_at"] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export interface ListUrlsQuery {
  /** Restrict to one owner; undefined lists every live record */
  userId?: string;
  page: number;
  pageSize: number;
  sortBy: SortField;
  sortDesc: boolean;
}

export interface ListUrlsResult {
  items: UrlRecord[];
  totalCount: number;
}

// =============================================================================
// REPOSITORY
// =============================================================================

/**
 * Durable store of URL records. Soft-deleted records are invisible to every
 * read except `exists`, which guards code uniqueness.
 */
export interface UrlRepository {
  /** @throws AppError(CONFLICT) when the code or alias is taken */
  create(input: CreateUrlInput): Promise<UrlRecord>;
  /** Null when the code is unknown or deleted. Inactive and expired records are returned. */
  getByShortCode(shortCode: string): Promise<UrlRecord | null>;
  /** Newest active record for the URL and owner, matching a null owner only to null */
  getByOriginalUrl(originalUrl: string, userId: string | null): Promise<UrlRecord | null>;
  /** Persist originalUrl, customAlias, expiresAt and isActive. @throws AppError(NOT_FOUND) */
  update(record: UrlRecord): Promise<UrlRecord>;
  /** Soft delete, restricted to `userId` when given. @throws AppError(NOT_FOUND) */
  delete(shortCode: string, userId: string | null): Promise<void>;
  incrementClickCount(shortCode: string): Promise<void>;
  updateLastAccessed(shortCode: string, at: Date): Promise<void>;
  exists(shortCode: string): Promise<boolean>;
  list(query: ListUrlsQuery): Promise<ListUrlsResult>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// =============================================================================
// MODEL HELPERS
// =============================================================================

export function isExpired(record: Pick<UrlRecord, "expiresAt">, now: Date = new Date()): boolean {
  return record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime();
}

/**
 * A record can be redirected to when it is active and not past its expiry.
 */
export function isResolvable(record: Pick<UrlRecord, "expiresAt" | "isActive">, now: Date = new Date()): boolean {
  return record.isActive && !isExpired(record, now);
}

/**
 * Anonymous callers and anonymous records are not checked; otherwise the ids must match.
 */
export function canAccess(record: Pick<UrlRecord, "userId">, userId: string | null): boolean {
  return userId === null || record.userId === null || record.userId === userId;
}

// =============================================================================
// DATABASE RESULT TYPES (for raw queries)
// =============================================================================

export type UrlRow = {
  id: string;
  short_code: string;
  original_url: string;
  custom_alias: string | null;
  user_id: string | null;
  created_at: Date;
  updated_at: Date;
  expires_at: Date | null;
  is_active: boolean;
  /** BIGINT arrives as a string from pg */
  click_count: string | number;
  last_accessed_at: Date | null;
};

export function rowToUrlRecord(row: UrlRow): UrlRecord {
  return {
    id: row.id,
    shortCode: row.short_code,
    originalUrl: row.original_url,
    customAlias: row.custom_alias,
    userId: row.user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    expiresAt: row.expires_at,
    isActive: row.is_active,
    clickCount: Number(row.click_count),
    lastAccessedAt: row.last_accessed_at,
  };
}
