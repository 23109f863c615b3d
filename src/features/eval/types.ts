import type { EvalConfig } from "../../core/config/schema.js";

/**
 * One scored benchmark item.
 */
export interface EvalResult {
  question_id: string;
  question_type: string;
  correct: boolean;
  predicted_idx: number;
  correct_idx: number;
  latency_store_ms: number;
  latency_recall_ms: number;
  num_memories_stored: number;
}

/** Stages an item passes through, in order. */
export type ItemStage = "INIT" | "STORED" | "RECALLED" | "ANSWERED" | "SCORED";

export type DriverConfig = Pick<
  EvalConfig,
  | "recallLimit"
  | "recallMode"
  | "chunkSize"
  | "summaryMaxChars"
  | "batchStore"
  | "extractEntities"
  | "createEdges"
  | "cleanup"
  | "namespacePrefix"
>;

export const DEFAULT_DRIVER_CONFIG: DriverConfig = {
  recallLimit: 5,
  recallMode: "hybrid",
  chunkSize: 800,
  summaryMaxChars: 2000,
  batchStore: false,
  extractEntities: false,
  createEdges: false,
  cleanup: true,
  namespacePrefix: "locomo",
};
