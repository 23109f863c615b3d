import { Command, InvalidArgumentError, Option } from "commander";
import { LogLevel, ProviderName, RecallMode, loadConfig } from "../core/config/schema.js";
import { ConfigurationError, DatasetError } from "../core/errors.js";
import { runEvaluation } from "../core/runner.js";
import { loadDataset } from "../dataset/loader.js";
import { formatSummary } from "../features/eval/report.js";
import { createLogger } from "../internal/logger.js";

export const VERSION = "0.1.0";

/** Items evaluated when neither --limit nor --full is given. */
export const DEFAULT_QUICK_LIMIT = 50;

export interface RunOptions {
  dataset?: string;
  provider: string;
  model: string;
  apiBase?: string;
  apiKey?: string;
  ollamaUrl?: string;
  limit?: number;
  full: boolean;
  memoryUrl?: string;
  memoryApiKey?: string;
  output: string;
  recallLimit: number;
  recallMode: string;
  chunkSize: number;
  batchStore: boolean;
  extractEntities: boolean;
  createEdges: boolean;
  cleanup: boolean;
  logLevel: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Maps parsed flags onto the config shape. Without --full the run is capped.
 */
export function toConfigInput(opts: RunOptions): Record<string, unknown> {
  const { full, limit, ...rest } = opts;
  return {
    ...rest,
    limit: full ? undefined : (limit ?? DEFAULT_QUICK_LIMIT),
  };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("locomo-mc10")
    .description("Evaluate a long-term memory service on the LoCoMo-MC10 multiple-choice benchmark")
    .version(VERSION);

  program
    .command("run")
    .description("Store, recall, answer and score every item, then write a JSON report")
    .option("-d, --dataset <path>", "Newline-delimited JSON dataset (or LOCOMO_DATASET)")
    .addOption(new Option("-p, --provider <name>", "LLM provider").choices(ProviderName.options).default("openai"))
    .option("-m, --model <model>", "Model name", "gpt-4o-mini")
    .option("--api-base <url>", "API base URL (required for openai-compatible)")
    .option("--api-key <key>", "API key (or OPENAI_API_KEY, API_KEY, ANTHROPIC_API_KEY, BASETEN_API_KEY)")
    .option("--ollama-url <url>", "Ollama server URL (or OLLAMA_URL)")
    .option("-l, --limit <n>", "Limit number of items", parsePositiveInt)
    .option("--full", "Run every item in the dataset", false)
    .option("--memory-url <url>", "Memory service URL (or MEMORY_URL)")
    .option("--memory-api-key <key>", "Memory service API key (or MEMORY_API_KEY)")
    .option("-o, --output <path>", "Output file for results", "locomo_results.json")
    .option("--recall-limit <n>", "Memories recalled per question", parsePositiveInt, 5)
    .addOption(new Option("--recall-mode <mode>", "Retrieval strategy").choices(RecallMode.options).default("hybrid"))
    .option("--chunk-size <n>", "Target characters per dialogue chunk", parsePositiveInt, 800)
    .option("--batch-store", "Store each item's memories in one batch request", false)
    .option("--extract-entities", "Ask the service to extract entities (batch store only)", false)
    .option("--create-edges", "Ask the service to link memories (batch store only)", false)
    .option("--no-cleanup", "Keep each item's memories after scoring")
    .addOption(new Option("--log-level <level>", "Log level").choices(LogLevel.options).default("info"))
    .action(async (opts: RunOptions) => {
      const config = loadConfig(toConfigInput(opts));
      const logger = createLogger(config.logLevel);
      const report = await runEvaluation(config, { logger });
      process.stdout.write(`${formatSummary(report)}\n\nDetailed results saved to: ${config.output}\n`);
    });

  program
    .command("validate")
    .description("Load and validate a dataset without contacting any service")
    .requiredOption("-d, --dataset <path>", "Newline-delimited JSON dataset")
    .action(async (opts: { dataset: string }) => {
      const { items } = await loadDataset(opts.dataset);
      const byType = new Map<string, number>();
      for (const item of items) {
        byType.set(item.question_type, (byType.get(item.question_type) ?? 0) + 1);
      }
      const lines = [`${items.length} valid items`];
      for (const type of [...byType.keys()].sort()) {
        lines.push(`  ${type}: ${byType.get(type) ?? 0}`);
      }
      process.stdout.write(`${lines.join("\n")}\n`);
    });

  return program;
}

export function exitCodeFor(err: unknown): number {
  return err instanceof ConfigurationError || err instanceof DatasetError ? 2 : 1;
}
