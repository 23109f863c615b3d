import { describe, it, expect, vi } from "vitest";
import { ProviderError } from "../../src/core/errors.js";
import { buildAnswerPrompt, parseChoiceIndex, selectAnswer } from "../../src/features/answer/selector.js";
import { formatMemories, NO_MEMORIES_MARKER } from "../../src/features/recall/formatter.js";
import type { LLMProvider } from "../../src/providers/types.js";

const logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function providerReturning(impl: () => Promise<string>): LLMProvider {
  return { name: "openai", model: "test-model", complete: vi.fn(impl) };
}

describe("parseChoiceIndex", () => {
  it("takes the first digit", () => {
    expect(parseChoiceIndex("3. Answer is option 3")).toBe(3);
    expect(parseChoiceIndex("The answer is 7")).toBe(7);
    expect(parseChoiceIndex("Option 12")).toBe(1);
  });

  it("defaults to 0 without a digit", () => {
    expect(parseChoiceIndex("I'm not sure")).toBe(0);
    expect(parseChoiceIndex("")).toBe(0);
  });

  it("ignores non-ASCII digits", () => {
    expect(parseChoiceIndex("²")).toBe(0);
    expect(parseChoiceIndex("٣ then 4")).toBe(4);
  });
});

describe("formatMemories", () => {
  it("numbers memories from 1 with blank lines between", () => {
    const text = formatMemories([
      { content: "Priya hiked Mount Rainier", score: 0.9, tags: [] },
      { content: "Tomas paints", score: 0.4, tags: [] },
    ]);

    expect(text).toBe("[Memory 1]: Priya hiked Mount Rainier\n\n[Memory 2]: Tomas paints");
  });

  it("uses the marker when nothing was recalled", () => {
    expect(formatMemories([])).toBe(NO_MEMORIES_MARKER);
  });
});

describe("buildAnswerPrompt", () => {
  it("embeds context, question and numbered choices", () => {
    const prompt = buildAnswerPrompt("[Memory 1]: hello", "What was said?", ["hello", "goodbye"]);

    expect(prompt).toContain("RETRIEVED MEMORIES:\n[Memory 1]: hello\n");
    expect(prompt).toContain("QUESTION: What was said?\n");
    expect(prompt).toContain("OPTIONS:\n0. hello\n1. goodbye\n");
    expect(prompt.endsWith("Your answer (single digit 0-9):")).toBe(true);
  });
});

describe("selectAnswer", () => {
  it("returns the parsed choice", async () => {
    const provider = providerReturning(async () => "2");

    const result = await selectAnswer(provider, "q?", ["a", "b", "c"], "ctx", logger);

    expect(result).toEqual({ predictedIdx: 2, raw: "2" });
    expect(provider.complete).toHaveBeenCalledWith(buildAnswerPrompt("ctx", "q?", ["a", "b", "c"]));
  });

  it("treats an unparseable reply as choice 0", async () => {
    const provider = providerReturning(async () => "None of these");

    const result = await selectAnswer(provider, "q?", ["a", "b"], "ctx", logger);

    expect(result).toEqual({ predictedIdx: 0, raw: "None of these" });
  });

  it("maps provider failures to choice 0 and logs them", async () => {
    logger.warn.mockClear();
    const provider = providerReturning(async () => {
      throw new ProviderError("openai", "429 Too Many Requests", { status: 429 });
    });

    const result = await selectAnswer(provider, "q?", ["a", "b"], "ctx", logger);

    expect(result).toEqual({
      predictedIdx: 0,
      raw: null,
      error: "openai completion failed: 429 Too Many Requests",
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "LLM error, defaulting to choice 0: openai completion failed: 429 Too Many Requests",
    );
  });
});
