export {
  EvalConfigSchema,
  LogLevel,
  ProviderName,
  RecallMode,
  loadConfig,
  type EvalConfig,
  type EvalConfigInput,
} from "./core/config/schema.js";
export {
  ConfigurationError,
  DatasetError,
  HarnessError,
  MemoryServiceError,
  ProviderError,
} from "./core/errors.js";
export { runEvaluation, type RunDependencies } from "./core/runner.js";
export { loadDataset, parseDataset, type LoadedDataset } from "./dataset/loader.js";
export { BenchmarkItemSchema, type BenchmarkItem, type Turn } from "./dataset/schema.js";
export {
  MemoryClient,
  type BatchOptions,
  type MemoryService,
  type MemoryType,
  type MemoryUnit,
  type RecalledMemory,
} from "./memory/client.js";
export * from "./providers/index.js";
export { charLength, chunkHaystack, chunkSession, groupTurns, type ChunkOptions } from "./features/chunking/chunker.js";
export { datetimePrefix, formatSessionDate } from "./features/chunking/datetime.js";
export { formatMemories, NO_MEMORIES_MARKER } from "./features/recall/formatter.js";
export { buildAnswerPrompt, parseChoiceIndex, selectAnswer } from "./features/answer/selector.js";
export { EvaluationDriver, type ProgressCallback } from "./features/eval/driver.js";
export { aggregate, CHOICE_SLOTS, type AggregateMetrics } from "./features/eval/aggregate.js";
export { buildReport, formatSummary, writeReport, type EvalReport } from "./features/eval/report.js";
export type { DriverConfig, EvalResult, ItemStage } from "./features/eval/types.js";
export { LatencyMetrics, type LatencySummary } from "./internal/metrics/latency-metrics.js";
export { createLogger, type Logger } from "./internal/logger.js";
