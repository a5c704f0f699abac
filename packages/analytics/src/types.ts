/**
 * Analytics Type Definitions
 */

import type { ClientInfo } from "@hopline/shared";

export const QUEUE_NAMES = {
  ACCESS_EVENTS: "access-events",
} as const;

/**
 * Receives one call per successful redirect. Callers never await it on the
 * request path.
 */
export interface AnalyticsRecorder {
  recordAccess(shortCode: string, client: ClientInfo): Promise<void>;
  close(): Promise<void>;
}

/**
 * Queue payload. Kept small: the IP is hashed and free-text headers truncated.
 */
export interface AccessEventPayload {
  /** `<epoch ms>-<8 hex>`, also used as the job id */
  eventId: string;
  shortCode: string;
  timestamp: number;
  ipHash: string | null;
  userAgent: string | null;
  referer: string | null;
}

export const PAYLOAD_LIMITS = {
  USER_AGENT: 512,
  REFERER: 2048,
  IP_HASH: 16,
} as const;
