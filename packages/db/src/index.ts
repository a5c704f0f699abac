/**
 * @hopline/db - URL records and their repositories.
 *
 * ```ts
 * import { createPool, PostgresUrlRepository } from "@hopline/db";
 *
 * const repo = new PostgresUrlRepository(createPool({ connectionString, timeoutMs: 200 }), { timeoutMs: 200 });
 * const record = await repo.getByShortCode("aZ3kP9x");
 * ```
 */

export * from "./types.js";
export { createPool, type PoolOptions } from "./client.js";
export { PostgresUrlRepository, type PostgresUrlRepositoryOptions, type SqlPool } from "./postgres.js";
export { InMemoryUrlRepository } from "./memory.js";
