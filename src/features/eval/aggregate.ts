import { LatencyMetrics, type LatencySummary } from "../../internal/metrics/latency-metrics.js";
import type { EvalResult } from "./types.js";

/** Choice slots in the ten-way benchmark design. */
export const CHOICE_SLOTS = 10;

export interface TypeCount {
  correct: number;
  total: number;
}

export interface AggregateMetrics {
  totalItems: number;
  correctCount: number;
  /** Percent, 0-100. */
  overallAccuracy: number;
  /** Percent per question type, keys in sorted order. */
  accuracyByType: Record<string, number>;
  countsByType: Record<string, TypeCount>;
  latencyStore: LatencySummary;
  latencyRecall: LatencySummary;
  memoriesStoredAvg: number;
  randomBaseline: number;
  improvementOverRandom: number;
}

function percent(correct: number, total: number): number {
  return total === 0 ? 0 : (correct / total) * 100;
}

export function aggregate(results: EvalResult[], choiceSlots = CHOICE_SLOTS): AggregateMetrics {
  const storeMetrics = new LatencyMetrics();
  const recallMetrics = new LatencyMetrics();
  const grouped = new Map<string, TypeCount>();
  let correctCount = 0;
  let memoriesStored = 0;

  for (const r of results) {
    storeMetrics.record(r.latency_store_ms);
    recallMetrics.record(r.latency_recall_ms);
    memoriesStored += r.num_memories_stored;
    if (r.correct) correctCount++;

    const group = grouped.get(r.question_type) ?? { correct: 0, total: 0 };
    group.total++;
    if (r.correct) group.correct++;
    grouped.set(r.question_type, group);
  }

  const accuracyByType: Record<string, number> = {};
  const countsByType: Record<string, TypeCount> = {};
  for (const type of [...grouped.keys()].sort()) {
    const group = grouped.get(type) ?? { correct: 0, total: 0 };
    accuracyByType[type] = percent(group.correct, group.total);
    countsByType[type] = group;
  }

  const overallAccuracy = percent(correctCount, results.length);
  const randomBaseline = 100 / choiceSlots;

  return {
    totalItems: results.length,
    correctCount,
    overallAccuracy,
    accuracyByType,
    countsByType,
    latencyStore: storeMetrics.summary(),
    latencyRecall: recallMetrics.summary(),
    memoriesStoredAvg: results.length === 0 ? 0 : memoriesStored / results.length,
    randomBaseline,
    improvementOverRandom: overallAccuracy - randomBaseline,
  };
}
