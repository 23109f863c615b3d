import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig, type EvalConfig } from "../../src/core/config/schema.js";
import { ConfigurationError } from "../../src/core/errors.js";
import { runEvaluation } from "../../src/core/runner.js";
import { FakeMemoryService, createLogger, createScriptedProvider, makeItem } from "../helpers/fakes.js";

describe("runEvaluation", () => {
  let dir: string;
  let config: EvalConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "locomo-run-"));
    const dataset = join(dir, "mc10.jsonl");
    const items = [
      makeItem({ question_id: "q1" }),
      makeItem({ question_id: "q2", question_type: "temporal", correct_choice_index: 2 }),
    ];
    await writeFile(dataset, items.map((i) => JSON.stringify(i)).join("\n"));
    config = loadConfig({ dataset, memoryApiKey: "test-secret", output: join(dir, "out", "report.json") }, {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("evaluates the dataset and writes the report", async () => {
    const memory = new FakeMemoryService();
    const logger = createLogger();

    const report = await runEvaluation(config, { logger, memory, provider: createScriptedProvider() });

    expect(report).toMatchObject({
      provider: "openai",
      model: "gpt-4o-mini",
      total_items: 2,
      correct_count: 1,
      overall_accuracy: 50,
      accuracy_by_type: { single_hop: 100, temporal: 0 },
      memories_stored_avg: 2,
    });
    expect(JSON.parse(await readFile(config.output, "utf-8"))).toEqual(report);
    expect(memory.namespaces.size).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(`Report written to ${config.output}`);
  });

  it("honours the item limit", async () => {
    const report = await runEvaluation(
      { ...config, limit: 1 },
      { logger: createLogger(), memory: new FakeMemoryService(), provider: createScriptedProvider() },
    );

    expect(report.total_items).toBe(1);
    expect(report.results.map((r) => r.question_id)).toEqual(["q1"]);
  });

  it("forwards progress", async () => {
    const onProgress = vi.fn();

    await runEvaluation(config, {
      logger: createLogger(),
      memory: new FakeMemoryService(),
      provider: createScriptedProvider(),
      onProgress,
    });

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress.mock.calls.map((c) => c.slice(0, 2))).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it("stops before any item when the memory service is down", async () => {
    const memory = new FakeMemoryService();
    memory.healthy = false;
    const provider = createScriptedProvider();

    const run = runEvaluation(config, { logger: createLogger(), memory, provider });

    await expect(run).rejects.toBeInstanceOf(ConfigurationError);
    await expect(run).rejects.toThrow("Memory service not responding at http://127.0.0.1:3030");
    expect(memory.calls).toEqual([]);
    expect(provider.complete).not.toHaveBeenCalled();
  });

  it("stops when provider credentials are missing", async () => {
    const memory = new FakeMemoryService();

    await expect(runEvaluation(config, { logger: createLogger(), memory, env: {} })).rejects.toThrow(
      "openai provider needs an API key. Pass --api-key or set OPENAI_API_KEY.",
    );
    expect(memory.calls).toEqual([]);
  });
});
