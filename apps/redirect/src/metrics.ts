/**
 * Metrics Module
 *
 * In-process counters and a latency histogram, rendered in Prometheus text
 * format on GET /metrics.
 *
 * Node.js is single-threaded, so plain increments are safe.
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Histogram buckets for resolve latency (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

const PREFIX = "hopline";

export const RESOLVE_OUTCOMES = ["success", "not_found", "expired", "inactive", "invalid", "error"] as const;

export type ResolveOutcome = (typeof RESOLVE_OUTCOMES)[number];

// =============================================================================
// State
// =============================================================================

const COUNTER_NAMES = [
  "cache_hit",
  "cache_miss",
  "cache_error",
  "shorten_created",
  "shorten_reused",
  "rate_limited",
  "rate_limit_degraded",
  "background_dropped",
  "background_failed",
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

const counters = new Map<CounterName, number>(COUNTER_NAMES.map((name) => [name, 0]));

const resolveOutcomes = new Map<ResolveOutcome, number>(RESOLVE_OUTCOMES.map((outcome) => [outcome, 0]));

const latencyHistogram = {
  buckets: new Array<number>(LATENCY_BUCKETS.length + 1).fill(0),
  sum: 0,
  count: 0,
};

// =============================================================================
// Public API
// =============================================================================

export function increment(name: CounterName): void {
  counters.set(name, (counters.get(name) ?? 0) + 1);
}

export function counter(name: CounterName): number {
  return counters.get(name) ?? 0;
}

/**
 * Record a latency observation in milliseconds.
 */
export function recordLatency(latencyMs: number): void {
  latencyHistogram.sum += latencyMs;
  latencyHistogram.count++;

  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    if (latencyMs <= LATENCY_BUCKETS[i]) {
      latencyHistogram.buckets[i]++;
      return;
    }
  }
  // +Inf bucket
  latencyHistogram.buckets[LATENCY_BUCKETS.length]++;
}

/**
 * Count one resolve call and observe its latency.
 */
export function recordResolve(outcome: ResolveOutcome, latencyMs: number): void {
  resolveOutcomes.set(outcome, (resolveOutcomes.get(outcome) ?? 0) + 1);
  recordLatency(latencyMs);
}

export function resolveCount(outcome: ResolveOutcome): number {
  return resolveOutcomes.get(outcome) ?? 0;
}

/**
 * Get current metrics in Prometheus text format.
 */
export function getMetrics(): string {
  const lines: string[] = [];

  const addCounter = (name: CounterName, help: string) => {
    lines.push(`# HELP ${PREFIX}_${name}_total ${help}`);
    lines.push(`# TYPE ${PREFIX}_${name}_total counter`);
    lines.push(`${PREFIX}_${name}_total ${counter(name)}`);
  };

  lines.push(`# HELP ${PREFIX}_resolve_total Resolve calls by outcome`);
  lines.push(`# TYPE ${PREFIX}_resolve_total counter`);
  for (const outcome of RESOLVE_OUTCOMES) {
    lines.push(`${PREFIX}_resolve_total{outcome="${outcome}"} ${resolveCount(outcome)}`);
  }

  addCounter("cache_hit", "Cache hits");
  addCounter("cache_miss", "Cache misses");
  addCounter("cache_error", "Cache reads that failed or timed out");
  addCounter("shorten_created", "Short URLs created");
  addCounter("shorten_reused", "Shorten calls answered with an existing record");
  addCounter("rate_limited", "Requests rejected by the rate limiter");
  addCounter("rate_limit_degraded", "Requests allowed because the rate limiter failed");
  addCounter("background_dropped", "Background tasks dropped because the queue was full");
  addCounter("background_failed", "Background tasks that failed");

  lines.push(`# HELP ${PREFIX}_resolve_latency_ms Resolve latency in milliseconds`);
  lines.push(`# TYPE ${PREFIX}_resolve_latency_ms histogram`);

  let cumulative = 0;
  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    cumulative += latencyHistogram.buckets[i];
    lines.push(`${PREFIX}_resolve_latency_ms_bucket{le="${LATENCY_BUCKETS[i]}"} ${cumulative}`);
  }
  cumulative += latencyHistogram.buckets[LATENCY_BUCKETS.length];
  lines.push(`${PREFIX}_resolve_latency_ms_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`${PREFIX}_resolve_latency_ms_sum ${latencyHistogram.sum}`);
  lines.push(`${PREFIX}_resolve_latency_ms_count ${latencyHistogram.count}`);

  return lines.join("\n");
}

/**
 * Get summary statistics (for debugging/admin).
 */
export function getSummary(): {
  totalResolves: number;
  cacheHitRate: number;
  avgLatencyMs: number;
  p99LatencyMs: number;
} {
  let totalResolves = 0;
  for (const value of resolveOutcomes.values()) {
    totalResolves += value;
  }

  const lookups = counter("cache_hit") + counter("cache_miss");

  return {
    totalResolves,
    cacheHitRate: lookups > 0 ? counter("cache_hit") / lookups : 0,
    avgLatencyMs: latencyHistogram.count > 0 ? latencyHistogram.sum / latencyHistogram.count : 0,
    p99LatencyMs: estimatePercentile(0.99),
  };
}

/**
 * Reset all metrics (for testing).
 */
export function reset(): void {
  for (const name of COUNTER_NAMES) {
    counters.set(name, 0);
  }
  for (const outcome of RESOLVE_OUTCOMES) {
    resolveOutcomes.set(outcome, 0);
  }
  latencyHistogram.buckets.fill(0);
  latencyHistogram.sum = 0;
  latencyHistogram.count = 0;
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Estimate percentile from histogram buckets.
 * Assumes uniform distribution within buckets.
 */
function estimatePercentile(percentile: number): number {
  if (latencyHistogram.count === 0) return 0;

  const targetCount = percentile * latencyHistogram.count;
  let cumulative = 0;

  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    cumulative += latencyHistogram.buckets[i];
    if (cumulative >= targetCount) {
      return LATENCY_BUCKETS[i];
    }
  }

  return LATENCY_BUCKETS[LATENCY_BUCKETS.length - 1];
}
