/**
 * Cache Type Definitions
 */

/**
 * String key/value store with per-entry TTL.
 *
 * A cache is never authoritative: callers treat a thrown error the same as a miss.
 */
export interface CacheStore {
  /** Resolves null on a miss */
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}

export interface CacheStoreOptions {
  /** Fraction of the TTL to randomise by, in either direction (0 disables) */
  ttlJitter?: number;
}
