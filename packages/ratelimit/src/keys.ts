/**
 * Rate limit key scheme: colon-joined segments such as `ip:<addr>`,
 * `user:<id>` or `endpoint:<method>:ip:<addr>`.
 */

import { isIP } from "node:net";

const MAPPED_DOTTED = /^(?:0{0,4}:){0,5}:?ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;
const MAPPED_HEX = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i;

/**
 * IPv4-mapped IPv6 addresses become dotted quads, other IPv6 is lowercased,
 * and anything unparseable is returned untouched.
 */
export function normalizeIp(ip: string): string {
  const trimmed = ip.trim();
  const family = isIP(trimmed);

  if (family === 4) return trimmed;
  if (family !== 6) return ip;

  const dotted = MAPPED_DOTTED.exec(trimmed);
  if (dotted) return dotted[1];

  const hex = MAPPED_HEX.exec(trimmed);
  if (hex) {
    const high = parseInt(hex[1], 16);
    const low = parseInt(hex[2], 16);
    return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
  }

  return trimmed.toLowerCase();
}

export const ipKey = (ip: string): string => `ip:${normalizeIp(ip)}`;

export const userKey = (userId: string): string => `user:${userId}`;

export const apiKeyKey = (apiKey: string): string => `api:${apiKey}`;

export const endpointKey = (endpoint: string, ip: string): string => `endpoint:${endpoint}:ip:${normalizeIp(ip)}`;

export const globalKey = (prefix: string): string => `global:${prefix}`;

export const compositeKey = (...parts: string[]): string => parts.join(":");

// Storage keys, one per representation
export const fixedWindowKey = (key: string, bucketStart: number): string => `fixed_window:${key}:${bucketStart}`;
export const slidingWindowKey = (key: string): string => `sliding_window:${key}`;
export const tokenBucketKey = (key: string): string => `token_bucket:${key}`;

export function bucketStart(nowMs: number, windowMs: number): number {
  return nowMs - (nowMs % windowMs);
}
