import type { EvalConfig } from "./config/schema.js";
import { ConfigurationError } from "./errors.js";
import { loadDataset } from "../dataset/loader.js";
import { aggregate } from "../features/eval/aggregate.js";
import { EvaluationDriver, type ProgressCallback } from "../features/eval/driver.js";
import { buildReport, writeReport, type EvalReport } from "../features/eval/report.js";
import type { Logger } from "../internal/logger.js";
import { MemoryClient, type MemoryService } from "../memory/client.js";
import { createProvider } from "../providers/factory.js";
import type { LLMProvider } from "../providers/types.js";

export interface RunDependencies {
  logger: Logger;
  /** Defaults to an HTTP client for `config.memoryUrl`. */
  memory?: MemoryService;
  /** Defaults to the provider named in the config. */
  provider?: LLMProvider;
  env?: Record<string, string | undefined>;
  onProgress?: ProgressCallback;
}

/**
 * Full run: resolve the provider, load the dataset, check the memory service,
 * evaluate every item and persist the report to `config.output`.
 */
export async function runEvaluation(config: EvalConfig, deps: RunDependencies): Promise<EvalReport> {
  const { logger } = deps;

  const provider = deps.provider ?? createProvider(config, deps.env);
  logger.info(`Provider: ${provider.name} (model ${provider.model})`);

  const dataset = await loadDataset(config.dataset, config.limit);
  logger.info(`Evaluating ${dataset.items.length} / ${dataset.total} items from ${config.dataset}`);

  const memory = deps.memory ?? new MemoryClient(config.memoryUrl, config.memoryApiKey, config.requestTimeoutMs);
  if (!(await memory.healthCheck())) {
    throw new ConfigurationError(`Memory service not responding at ${config.memoryUrl}`, "MEMORY_UNREACHABLE");
  }
  logger.info(`Connected to memory service at ${config.memoryUrl}`);

  const driver = new EvaluationDriver(memory, provider, logger, config);
  const results = await driver.run(dataset.items, deps.onProgress);

  const report = buildReport({ provider: config.provider, model: config.model }, aggregate(results), results);
  await writeReport(config.output, report);
  logger.info(`Report written to ${config.output}`);

  return report;
}
