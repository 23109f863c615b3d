import { performance } from "node:perf_hooks";
import { errorMessage } from "../../core/errors.js";
import type { BenchmarkItem } from "../../dataset/schema.js";
import type { Logger } from "../../internal/logger.js";
import type { MemoryService, MemoryUnit, RecalledMemory } from "../../memory/client.js";
import type { LLMProvider } from "../../providers/types.js";
import { chunkHaystack } from "../chunking/chunker.js";
import { selectAnswer } from "../answer/selector.js";
import { formatMemories } from "../recall/formatter.js";
import { DEFAULT_DRIVER_CONFIG, type DriverConfig, type EvalResult, type ItemStage } from "./types.js";

const PROGRESS_LOG_EVERY = 10;

export type ProgressCallback = (done: number, total: number, result: EvalResult) => void;

/**
 * Runs store, recall, answer and score for each item, one item at a time.
 * Every item gets its own memory namespace, which is purged afterwards
 * when `cleanup` is on.
 */
export class EvaluationDriver {
  private config: DriverConfig;

  constructor(
    private memory: MemoryService,
    private provider: LLMProvider,
    private logger: Logger,
    config: Partial<DriverConfig> = {},
  ) {
    this.config = { ...DEFAULT_DRIVER_CONFIG, ...config };
  }

  namespaceFor(item: Pick<BenchmarkItem, "question_id">): string {
    return `${this.config.namespacePrefix}_${item.question_id}`;
  }

  private stage(item: BenchmarkItem, stage: ItemStage): void {
    this.logger.debug?.(`Item ${item.question_id}: ${stage}`);
  }

  private async store(namespace: string, units: MemoryUnit[]): Promise<number> {
    if (units.length === 0) return 0;

    if (this.config.batchStore) {
      try {
        return await this.memory.rememberBatch(namespace, units, {
          extract_entities: this.config.extractEntities,
          create_edges: this.config.createEdges,
        });
      } catch (err) {
        this.logger.warn(`Memory batch store failed for ${namespace}: ${errorMessage(err)}`);
        return 0;
      }
    }

    let stored = 0;
    for (const unit of units) {
      try {
        await this.memory.remember(namespace, unit);
        stored++;
      } catch (err) {
        this.logger.warn(`Memory store failed for ${namespace}: ${errorMessage(err)}`);
      }
    }
    return stored;
  }

  private async recall(namespace: string, question: string): Promise<RecalledMemory[]> {
    try {
      return await this.memory.recall(namespace, question, this.config.recallLimit, this.config.recallMode);
    } catch (err) {
      this.logger.warn(`Memory recall failed for ${namespace}: ${errorMessage(err)}`);
      return [];
    }
  }

  private async teardown(namespace: string): Promise<void> {
    try {
      await this.memory.deleteUser(namespace, true);
    } catch (err) {
      this.logger.warn(`Memory teardown failed for ${namespace}: ${errorMessage(err)}`);
    }
  }

  async evaluateItem(item: BenchmarkItem): Promise<EvalResult> {
    this.stage(item, "INIT");
    const namespace = this.namespaceFor(item);

    try {
      const units = chunkHaystack(item, {
        chunkSize: this.config.chunkSize,
        summaryMaxChars: this.config.summaryMaxChars,
      });
      const storeStart = performance.now();
      const stored = await this.store(namespace, units);
      const storeMs = performance.now() - storeStart;
      this.stage(item, "STORED");

      const recallStart = performance.now();
      const memories = await this.recall(namespace, item.question);
      const recallMs = performance.now() - recallStart;
      this.stage(item, "RECALLED");

      const { predictedIdx } = await selectAnswer(
        this.provider,
        item.question,
        item.choices,
        formatMemories(memories),
        this.logger,
      );
      this.stage(item, "ANSWERED");

      const result: EvalResult = {
        question_id: item.question_id,
        question_type: item.question_type,
        correct: predictedIdx === item.correct_choice_index,
        predicted_idx: predictedIdx,
        correct_idx: item.correct_choice_index,
        latency_store_ms: storeMs,
        latency_recall_ms: recallMs,
        num_memories_stored: stored,
      };
      this.stage(item, "SCORED");
      return result;
    } finally {
      if (this.config.cleanup) await this.teardown(namespace);
    }
  }

  async run(items: BenchmarkItem[], onProgress?: ProgressCallback): Promise<EvalResult[]> {
    const results: EvalResult[] = [];

    for (const item of items) {
      const result = await this.evaluateItem(item);
      results.push(result);
      onProgress?.(results.length, items.length, result);

      if (results.length % PROGRESS_LOG_EVERY === 0 || results.length === items.length) {
        const correct = results.filter((r) => r.correct).length;
        this.logger.info(`Evaluated ${results.length}/${items.length} items (${correct} correct)`);
      }
    }

    return results;
  }
}
