/**
 * Jest setup - runs before each test file is loaded.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
