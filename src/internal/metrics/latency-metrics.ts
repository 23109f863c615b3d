export interface LatencySummary {
  count: number;
  mean: number | null;
  p50: number | null;
  p95: number | null;
  p99: number | null;
}

/**
 * Latency samples for one run, summarized as mean and nearest-rank percentiles.
 */
export class LatencyMetrics {
  private samples: number[] = [];

  record(durationMs: number): void {
    this.samples.push(durationMs);
  }

  get count(): number {
    return this.samples.length;
  }

  get mean(): number | null {
    if (this.samples.length === 0) return null;
    return this.samples.reduce((sum, s) => sum + s, 0) / this.samples.length;
  }

  percentile(p: number): number | null {
    if (this.samples.length === 0) return null;

    const sorted = [...this.samples].sort((a, b) => a - b);
    const rank = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, rank)] ?? null;
  }

  summary(): LatencySummary {
    return {
      count: this.count,
      mean: this.mean,
      p50: this.percentile(50),
      p95: this.percentile(95),
      p99: this.percentile(99),
    };
  }
}
