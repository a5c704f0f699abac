/**
 * Destination URL and custom alias validation.
 */

import { isIPv4 } from "node:net";
import { RESERVED_ALIASES, SHORTCODE_CONFIG, URL_CONFIG } from "../constants/index.js";

export interface ValidationResult {
  valid: boolean;
  /** Human-readable reason when invalid */
  error?: string;
}

const ok: ValidationResult = { valid: true };
const fail = (error: string): ValidationResult => ({ valid: false, error });

/**
 * Trim whitespace and assume https when no scheme was given.
 */
export function sanitizeUrl(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.includes("://") ? trimmed : `https://${trimmed}`;
}

function isPrivateIPv4(host: string): boolean {
  if (!isIPv4(host)) {
    return false;
  }
  const [a, b] = host.split(".").map(Number);
  return a === 10 || (a === 192 && b === 168) || (a === 172 && b >= 16 && b <= 31);
}

export function validateUrl(raw: string): ValidationResult {
  if (raw.length === 0) {
    return fail("URL cannot be empty");
  }
  if (raw.length < URL_CONFIG.MIN_LENGTH) {
    return fail(`URL too short (minimum ${URL_CONFIG.MIN_LENGTH} characters)`);
  }
  if (raw.length > URL_CONFIG.MAX_LENGTH) {
    return fail(`URL too long (maximum ${URL_CONFIG.MAX_LENGTH} characters)`);
  }

  const lower = raw.toLowerCase();
  if (URL_CONFIG.BLOCKED_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return fail("URL contains potentially malicious content");
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return fail("Invalid URL format");
  }

  if (!URL_CONFIG.ALLOWED_PROTOCOLS.some((protocol) => protocol === parsed.protocol)) {
    return fail(`Unsupported URL scheme: ${parsed.protocol.replace(/:$/, "")}`);
  }

  const host = parsed.hostname.toLowerCase();
  if (host.length === 0) {
    return fail("URL must have a valid host");
  }
  if (URL_CONFIG.BLOCKED_HOSTS.some((blocked) => blocked === host) || host.endsWith(".localhost")) {
    return fail("localhost URLs are not allowed");
  }
  if (isPrivateIPv4(host)) {
    return fail("private IP addresses are not allowed");
  }

  return ok;
}

/**
 * Check a user-chosen alias: 3-50 chars of [A-Za-z0-9_-], not a reserved word.
 */
export function validateCustomAlias(alias: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG.CUSTOM_ALIAS;

  if (alias.length < MIN_LENGTH) {
    return fail(`Custom alias too short (minimum ${MIN_LENGTH} characters)`);
  }
  if (alias.length > MAX_LENGTH) {
    return fail(`Custom alias too long (maximum ${MAX_LENGTH} characters)`);
  }
  if (!PATTERN.test(alias)) {
    return fail("Custom alias can only contain letters, numbers, hyphens and underscores");
  }
  if (RESERVED_ALIASES.has(alias.toLowerCase())) {
    return fail(`Custom alias '${alias}' is reserved`);
  }

  return ok;
}
