import { describe, it, expect } from "vitest";
import { LatencyMetrics } from "../../src/internal/metrics/latency-metrics.js";

describe("LatencyMetrics", () => {
  it("computes nearest-rank percentiles over 1..100", () => {
    const m = new LatencyMetrics();
    for (let i = 1; i <= 100; i++) m.record(i);

    expect(m.count).toBe(100);
    expect(m.percentile(50)).toBe(50);
    expect(m.percentile(95)).toBe(95);
    expect(m.percentile(99)).toBe(99);
  });

  it("computes the mean", () => {
    const m = new LatencyMetrics();
    for (const v of [10, 20, 30, 40]) m.record(v);
    expect(m.mean).toBe(25);
  });

  it("has no statistics without samples", () => {
    expect(new LatencyMetrics().summary()).toEqual({ count: 0, mean: null, p50: null, p95: null, p99: null });
  });

  it("keeps every sample of a long run", () => {
    const m = new LatencyMetrics();
    for (let i = 0; i < 5000; i++) m.record(1);
    expect(m.count).toBe(5000);
  });

  it("summarizes two samples", () => {
    const m = new LatencyMetrics();
    m.record(100);
    m.record(200);

    expect(m.summary()).toEqual({ count: 2, mean: 150, p50: 100, p95: 200, p99: 200 });
  });

  it("does not depend on insertion order", () => {
    const m = new LatencyMetrics();
    for (const v of [40, 10, 30, 20]) m.record(v);
    expect(m.summary()).toMatchObject({ p50: 20, p95: 40 });
  });
});
