/**
 * BackgroundTasks Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { BackgroundTasks } from "../src/background.js";
import * as metrics from "../src/metrics.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("BackgroundTasks", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("runs up to the concurrency limit and queues the rest", async () => {
    const tasks = new BackgroundTasks({ concurrency: 2, queueLimit: 1 });
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, i) => {
      tasks.run(`task-${i}`, async () => {
        started.push(i);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(tasks.active).toBe(2);
    expect(tasks.pending).toBe(1);

    gates[0].resolve();
    await gates[0].promise;
    await new Promise((r) => setImmediate(r));

    expect(started).toEqual([0, 1, 2]);
    expect(tasks.pending).toBe(0);

    gates[1].resolve();
    gates[2].resolve();
    await tasks.onIdle();
    expect(tasks.active).toBe(0);
  });

  it("drops work once the queue is full", () => {
    const tasks = new BackgroundTasks({ concurrency: 1, queueLimit: 1 });
    const gate = deferred();

    expect(tasks.run("first", () => gate.promise)).toBe(true);
    expect(tasks.run("second", () => gate.promise)).toBe(true);
    expect(tasks.run("third", () => gate.promise)).toBe(false);

    expect(metrics.counter("background_dropped")).toBe(1);
    gate.resolve();
  });

  it("counts failures and keeps going", async () => {
    const tasks = new BackgroundTasks({ concurrency: 1, queueLimit: 10 });
    const done: string[] = [];

    tasks.run("fails", async () => {
      throw new Error("boom");
    });
    tasks.run("succeeds", async () => {
      done.push("succeeds");
    });
    await tasks.onIdle();

    expect(done).toEqual(["succeeds"]);
    expect(metrics.counter("background_failed")).toBe(1);
  });

  it("drains in-flight work and refuses new tasks", async () => {
    const tasks = new BackgroundTasks({ concurrency: 2, queueLimit: 10 });
    let finished = false;

    tasks.run("slow", async () => {
      await new Promise((r) => setTimeout(r, 10));
      finished = true;
    });

    await expect(tasks.drain(1000)).resolves.toBe(true);
    expect(finished).toBe(true);
    expect(tasks.run("late", async () => undefined)).toBe(false);
  });

  it("gives up draining at the deadline", async () => {
    const tasks = new BackgroundTasks({ concurrency: 1, queueLimit: 10 });
    const gate = deferred();
    tasks.run("stuck", () => gate.promise);

    await expect(tasks.drain(20)).resolves.toBe(false);
    gate.resolve();
  });

  it("resolves onIdle immediately when nothing is running", async () => {
    const tasks = new BackgroundTasks({ concurrency: 1, queueLimit: 1 });

    await expect(tasks.onIdle()).resolves.toBeUndefined();
  });
});
