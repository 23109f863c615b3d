import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { AggregateMetrics, TypeCount } from "./aggregate.js";
import type { EvalResult } from "./types.js";

export interface EvalReport {
  timestamp: string;
  provider: string;
  model: string;
  total_items: number;
  correct_count: number;
  overall_accuracy: number;
  accuracy_by_type: Record<string, number>;
  counts_by_type: Record<string, TypeCount>;
  latency_store_ms_avg: number;
  latency_recall_ms_avg: number;
  latency_store_ms_p50: number | null;
  latency_store_ms_p95: number | null;
  latency_recall_ms_p50: number | null;
  latency_recall_ms_p95: number | null;
  memories_stored_avg: number;
  random_baseline: number;
  improvement_over_random: number;
  results: EvalResult[];
}

export function buildReport(
  run: { provider: string; model: string; timestamp?: string },
  metrics: AggregateMetrics,
  results: EvalResult[],
): EvalReport {
  return {
    timestamp: run.timestamp ?? new Date().toISOString(),
    provider: run.provider,
    model: run.model,
    total_items: metrics.totalItems,
    correct_count: metrics.correctCount,
    overall_accuracy: metrics.overallAccuracy,
    accuracy_by_type: metrics.accuracyByType,
    counts_by_type: metrics.countsByType,
    latency_store_ms_avg: metrics.latencyStore.mean ?? 0,
    latency_recall_ms_avg: metrics.latencyRecall.mean ?? 0,
    latency_store_ms_p50: metrics.latencyStore.p50,
    latency_store_ms_p95: metrics.latencyStore.p95,
    latency_recall_ms_p50: metrics.latencyRecall.p50,
    latency_recall_ms_p95: metrics.latencyRecall.p95,
    memories_stored_avg: metrics.memoriesStoredAvg,
    random_baseline: metrics.randomBaseline,
    improvement_over_random: metrics.improvementOverRandom,
    results: results.map((r) => ({ ...r })),
  };
}

export async function writeReport(path: string, report: EvalReport): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(report, null, 2), "utf-8");
}

/**
 * Plain-text run summary for the terminal.
 */
export function formatSummary(report: EvalReport): string {
  const lines: string[] = [
    `Overall Accuracy: ${report.overall_accuracy.toFixed(2)}% (${report.correct_count}/${report.total_items})`,
    "",
    "Accuracy by Question Type:",
    "-".repeat(40),
  ];

  for (const [type, accuracy] of Object.entries(report.accuracy_by_type)) {
    const counts = report.counts_by_type[type];
    const tally = counts ? ` (${counts.correct}/${counts.total})` : "";
    lines.push(`  ${type.padEnd(20)}: ${accuracy.toFixed(2).padStart(6)}%${tally}`);
  }

  lines.push(
    "",
    "Latency (avg):",
    `  Store:  ${report.latency_store_ms_avg.toFixed(1)} ms`,
    `  Recall: ${report.latency_recall_ms_avg.toFixed(1)} ms`,
    `  Memories stored per item: ${report.memories_stored_avg.toFixed(1)}`,
    "",
    `Random baseline (${Math.round(100 / report.random_baseline)} choices): ${report.random_baseline.toFixed(2)}%`,
    `Improvement over random: ${report.improvement_over_random.toFixed(2)}%`,
  );

  return lines.join("\n");
}
