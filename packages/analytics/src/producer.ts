/**
 * Access event recorders
 *
 * QueueAnalyticsRecorder pushes a compact event onto a BullMQ queue for an
 * out-of-process consumer. LoggingAnalyticsRecorder is used when no queue
 * is configured.
 */

import { Queue } from "bullmq";
import { createHash, randomUUID } from "node:crypto";
import { createLogger, type Logger } from "@hopline/logger";
import { systemClock, type ClientInfo, type Clock } from "@hopline/shared";
import { PAYLOAD_LIMITS, QUEUE_NAMES, type AccessEventPayload, type AnalyticsRecorder } from "./types.js";

// =============================================================================
// Payload
// =============================================================================

/**
 * Unsalted so the same visitor hashes the same way across events.
 */
export function hashIp(ip: string): string {
  return createHash("sha256").update(ip).digest("hex").slice(0, PAYLOAD_LIMITS.IP_HASH);
}

function truncate(value: string | null, maxLength: number): string | null {
  if (!value) return null;
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

export function buildAccessEvent(shortCode: string, client: ClientInfo, now: number): AccessEventPayload {
  return {
    eventId: `${now}-${randomUUID().slice(0, 8)}`,
    shortCode,
    timestamp: now,
    ipHash: client.ip ? hashIp(client.ip) : null,
    userAgent: truncate(client.userAgent, PAYLOAD_LIMITS.USER_AGENT),
    referer: truncate(client.referer, PAYLOAD_LIMITS.REFERER),
  };
}

// =============================================================================
// Queue
// =============================================================================

export interface AccessQueueOptions {
  redisUrl: string;
  queueName?: string;
}

export function createAccessQueue(options: AccessQueueOptions): Queue<AccessEventPayload> {
  return new Queue<AccessEventPayload>(options.queueName ?? QUEUE_NAMES.ACCESS_EVENTS, {
    connection: {
      url: options.redisUrl,
      // Required by BullMQ
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
    },
    defaultJobOptions: {
      // Lost events are acceptable; redelivery is not worth the write amplification
      attempts: 1,
      removeOnComplete: { age: 3600, count: 10_000 },
      removeOnFail: { age: 86_400 },
    },
  });
}

/** The part of a BullMQ queue the recorder uses */
export type AccessQueue = Pick<Queue<AccessEventPayload>, "add" | "close" | "on">;

export class QueueAnalyticsRecorder implements AnalyticsRecorder {
  private readonly queue: AccessQueue;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(queue: AccessQueue, options: { clock?: Clock; logger?: Logger } = {}) {
    this.queue = queue;
    this.now = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("analytics");

    this.queue.on("error", (err) => {
      this.log.error({ err }, "access queue error");
    });
  }

  /**
   * Rejects when the queue is unreachable; the caller's background runner logs it.
   */
  async recordAccess(shortCode: string, client: ClientInfo): Promise<void> {
    const payload = buildAccessEvent(shortCode, client, this.now());
    await this.queue.add("access", payload, { jobId: payload.eventId });
    this.log.debug({ eventId: payload.eventId, shortCode }, "access event queued");
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

// =============================================================================
// Logging fallback
// =============================================================================

export class LoggingAnalyticsRecorder implements AnalyticsRecorder {
  private readonly log: Logger;
  private readonly now: Clock;

  constructor(options: { clock?: Clock; logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger("analytics");
    this.now = options.clock ?? systemClock;
  }

  async recordAccess(shortCode: string, client: ClientInfo): Promise<void> {
    this.log.debug({ event: buildAccessEvent(shortCode, client, this.now()) }, "access");
  }

  async close(): Promise<void> {}
}
