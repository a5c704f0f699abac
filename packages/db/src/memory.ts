/**
 * In-memory UrlRepository for development and tests.
 *
 * Mirrors the PostgreSQL implementation's visibility rules: deleted records
 * stay in the map (so codes are never reused) but are hidden from reads.
 */

import { randomUUID } from "node:crypto";
import { conflictError, notFoundError, systemClock, type Clock } from "@hopline/shared";
import type { CreateUrlInput, ListUrlsQuery, ListUrlsResult, SortField, UrlRecord, UrlRepository } from "./types.js";

interface StoredRecord {
  record: UrlRecord;
  deletedAt: Date | null;
}

const copy = (record: UrlRecord): UrlRecord => ({ ...record });

function sortValue(record: UrlRecord, field: SortField): number | null {
  switch (field) {
    case "created_at":
      return record.createdAt.getTime();
    case "click_count":
      return record.clickCount;
    case "last_accessed_at":
      return record.lastAccessedAt?.getTime() ?? null;
  }
}

export class InMemoryUrlRepository implements UrlRepository {
  private readonly rows = new Map<string, StoredRecord>();
  private readonly now: Clock;

  constructor(clock: Clock = systemClock) {
    this.now = clock;
  }

  async create(input: CreateUrlInput): Promise<UrlRecord> {
    if (await this.exists(input.shortCode)) {
      throw conflictError("Short code or alias already exists", { shortCode: input.shortCode });
    }
    if (input.customAlias !== null && (await this.exists(input.customAlias))) {
      throw conflictError("Short code or alias already exists", { shortCode: input.customAlias });
    }

    const now = new Date(this.now());
    const record: UrlRecord = {
      id: randomUUID(),
      shortCode: input.shortCode,
      originalUrl: input.originalUrl,
      customAlias: input.customAlias,
      userId: input.userId,
      createdAt: now,
      updatedAt: now,
      expiresAt: input.expiresAt,
      isActive: true,
      clickCount: 0,
      lastAccessedAt: null,
    };
    this.rows.set(record.shortCode, { record, deletedAt: null });
    return copy(record);
  }

  async getByShortCode(shortCode: string): Promise<UrlRecord | null> {
    const live = this.live(shortCode);
    return live ? copy(live) : null;
  }

  async getByOriginalUrl(originalUrl: string, userId: string | null): Promise<UrlRecord | null> {
    let newest: UrlRecord | null = null;
    for (const { record, deletedAt } of this.rows.values()) {
      if (deletedAt !== null || !record.isActive) continue;
      if (record.originalUrl !== originalUrl || record.userId !== userId) continue;
      if (newest === null || record.createdAt.getTime() > newest.createdAt.getTime()) {
        newest = record;
      }
    }
    return newest ? copy(newest) : null;
  }

  async update(record: UrlRecord): Promise<UrlRecord> {
    const current = this.live(record.shortCode);
    if (!current) {
      throw notFoundError();
    }
    if (record.customAlias !== null && record.customAlias !== current.customAlias) {
      for (const { record: other } of this.rows.values()) {
        if (other.shortCode !== record.shortCode && other.customAlias === record.customAlias) {
          throw conflictError("Alias already exists", { customAlias: record.customAlias });
        }
      }
    }

    current.originalUrl = record.originalUrl;
    current.customAlias = record.customAlias;
    current.expiresAt = record.expiresAt;
    current.isActive = record.isActive;
    current.updatedAt = new Date(this.now());
    return copy(current);
  }

  async delete(shortCode: string, userId: string | null): Promise<void> {
    const stored = this.rows.get(shortCode);
    if (!stored || stored.deletedAt !== null || (userId !== null && stored.record.userId !== userId)) {
      throw notFoundError();
    }
    const now = new Date(this.now());
    stored.deletedAt = now;
    stored.record.isActive = false;
    stored.record.updatedAt = now;
  }

  async incrementClickCount(shortCode: string): Promise<void> {
    const live = this.live(shortCode);
    if (live) live.clickCount += 1;
  }

  async updateLastAccessed(shortCode: string, at: Date): Promise<void> {
    const live = this.live(shortCode);
    if (live) live.lastAccessedAt = at;
  }

  async exists(shortCode: string): Promise<boolean> {
    if (this.rows.has(shortCode)) return true;
    for (const { record } of this.rows.values()) {
      if (record.customAlias === shortCode) return true;
    }
    return false;
  }

  async list(query: ListUrlsQuery): Promise<ListUrlsResult> {
    const direction = query.sortDesc ? -1 : 1;
    const matching = [...this.rows.values()]
      .filter(({ record, deletedAt }) => deletedAt === null && (query.userId === undefined || record.userId === query.userId))
      .map(({ record }) => record)
      .sort((a, b) => {
        const left = sortValue(a, query.sortBy);
        const right = sortValue(b, query.sortBy);
        if (left !== right) {
          if (left === null) return 1;
          if (right === null) return -1;
          return (left - right) * direction;
        }
        return a.shortCode < b.shortCode ? -1 : a.shortCode > b.shortCode ? 1 : 0;
      });

    const offset = (query.page - 1) * query.pageSize;
    return {
      items: matching.slice(offset, offset + query.pageSize).map(copy),
      totalCount: matching.length,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  private live(shortCode: string): UrlRecord | undefined {
    const stored = this.rows.get(shortCode);
    return stored && stored.deletedAt === null ? stored.record : undefined;
  }
}
