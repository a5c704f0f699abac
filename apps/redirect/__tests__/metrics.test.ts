/**
 * Metrics Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import * as metrics from "../src/metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("renders counters in Prometheus text format", () => {
    metrics.increment("cache_hit");
    metrics.increment("cache_hit");
    metrics.increment("rate_limited");

    const lines = metrics.getMetrics().split("\n");

    expect(lines).toContain("hopline_cache_hit_total 2");
    expect(lines).toContain("hopline_rate_limited_total 1");
    expect(lines).toContain("# TYPE hopline_cache_hit_total counter");
  });

  it("labels resolve calls by outcome and fills the latency histogram", () => {
    metrics.recordResolve("success", 3);
    metrics.recordResolve("not_found", 40);
    metrics.recordResolve("success", 2000);

    const lines = metrics.getMetrics().split("\n");

    expect(lines).toContain('hopline_resolve_total{outcome="success"} 2');
    expect(lines).toContain('hopline_resolve_total{outcome="not_found"} 1');
    expect(lines).toContain('hopline_resolve_total{outcome="expired"} 0');
    expect(lines).toContain('hopline_resolve_latency_ms_bucket{le="2"} 0');
    expect(lines).toContain('hopline_resolve_latency_ms_bucket{le="5"} 1');
    expect(lines).toContain('hopline_resolve_latency_ms_bucket{le="50"} 2');
    expect(lines).toContain('hopline_resolve_latency_ms_bucket{le="1000"} 2');
    expect(lines).toContain('hopline_resolve_latency_ms_bucket{le="+Inf"} 3');
    expect(lines).toContain("hopline_resolve_latency_ms_sum 2043");
    expect(lines).toContain("hopline_resolve_latency_ms_count 3");
  });

  it("summarises hit rate and latency", () => {
    metrics.increment("cache_hit");
    metrics.increment("cache_hit");
    metrics.increment("cache_hit");
    metrics.increment("cache_miss");
    metrics.recordResolve("success", 4);
    metrics.recordResolve("success", 8);

    expect(metrics.getSummary()).toEqual({
      totalResolves: 2,
      cacheHitRate: 0.75,
      avgLatencyMs: 6,
      p99LatencyMs: 10,
    });
  });
});
