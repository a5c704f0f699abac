/**
 * Bounded runner for detached side effects (click counts, analytics, cache
 * writes). Callers never await a task; failures are logged and counted,
 * never retried and never surfaced to the request that scheduled them.
 *
 * At most `concurrency` tasks run at once and at most `queueLimit` wait.
 * Anything beyond that is dropped.
 */

import { createLogger, type Logger } from "@hopline/logger";
import { DeadlineExceededError, withDeadline } from "@hopline/shared";
import * as metrics from "./metrics.js";

export type BackgroundTask = () => Promise<unknown>;

export interface BackgroundTasksOptions {
  concurrency: number;
  queueLimit: number;
  logger?: Logger;
}

interface Job {
  name: string;
  task: BackgroundTask;
}

export class BackgroundTasks {
  private readonly concurrency: number;
  private readonly queueLimit: number;
  private readonly log: Logger;

  private readonly queue: Job[] = [];
  private running = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: BackgroundTasksOptions) {
    this.concurrency = Math.max(1, options.concurrency);
    this.queueLimit = Math.max(0, options.queueLimit);
    this.log = options.logger ?? createLogger("background");
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Schedule `task`. Returns false when it was dropped.
   */
  run(name: string, task: BackgroundTask): boolean {
    if (this.closed) {
      this.drop(name, "shutting down");
      return false;
    }
    if (this.running < this.concurrency) {
      this.start({ name, task });
      return true;
    }
    if (this.queue.length < this.queueLimit) {
      this.queue.push({ name, task });
      return true;
    }
    this.drop(name, "queue full");
    return false;
  }

  /**
   * Resolves once nothing is running or queued.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting work and wait up to `timeoutMs` for what is in flight.
   * Resolves false when the deadline passed first.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.closed = true;
    try {
      await withDeadline(this.onIdle(), timeoutMs, "background.drain");
      return true;
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        this.log.warn({ active: this.running, pending: this.queue.length, timeoutMs }, "background drain timed out");
        return false;
      }
      throw err;
    }
  }

  private start(job: Job): void {
    this.running++;
    void this.execute(job);
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job.task();
    } catch (err) {
      metrics.increment("background_failed");
      this.log.warn({ err, task: job.name }, "background task failed");
    } finally {
      this.running--;
      this.next();
    }
  }

  private next(): void {
    const job = this.queue.shift();
    if (job) {
      this.start(job);
      return;
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private drop(name: string, reason: string): void {
    metrics.increment("background_dropped");
    this.log.warn({ task: name, reason, active: this.running, pending: this.queue.length }, "background task dropped");
  }
}
