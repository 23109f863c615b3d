import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../src/core/errors.js";
import { loadConfig, resolveConfigEnvVars } from "../../src/core/config/schema.js";

const BASE = { dataset: "data/locomo_mc10.jsonl", memoryApiKey: "test-secret" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(BASE, {});

    expect(config).toEqual({
      provider: "openai",
      model: "gpt-4o-mini",
      ollamaUrl: "http://localhost:11434",
      dataset: "data/locomo_mc10.jsonl",
      memoryUrl: "http://127.0.0.1:3030",
      memoryApiKey: "test-secret",
      output: "locomo_results.json",
      recallLimit: 5,
      recallMode: "hybrid",
      chunkSize: 800,
      summaryMaxChars: 2000,
      batchStore: false,
      extractEntities: false,
      createEdges: false,
      cleanup: true,
      namespacePrefix: "locomo",
      requestTimeoutMs: 30000,
      logLevel: "info",
    });
  });

  it("fills memory settings from the environment", () => {
    const config = loadConfig(
      {},
      {
        MEMORY_API_KEY: "test-secret",
        MEMORY_URL: "https://memory.example.com",
        OLLAMA_URL: "http://gpu-box:11434",
        LOCOMO_DATASET: "/data/mc10.json",
      },
    );

    expect(config.memoryApiKey).toBe("test-secret");
    expect(config.memoryUrl).toBe("https://memory.example.com");
    expect(config.ollamaUrl).toBe("http://gpu-box:11434");
    expect(config.dataset).toBe("/data/mc10.json");
  });

  it("prefers explicit values over the environment", () => {
    const config = loadConfig(
      { ...BASE, memoryUrl: "https://explicit.example.com" },
      { MEMORY_URL: "https://env.example.com" },
    );

    expect(config.memoryUrl).toBe("https://explicit.example.com");
  });

  it("ignores empty environment values", () => {
    const config = loadConfig(BASE, { MEMORY_URL: "" });
    expect(config.memoryUrl).toBe("http://127.0.0.1:3030");
  });

  it("expands ${VAR} references", () => {
    const config = loadConfig({ dataset: "data.jsonl", memoryApiKey: "${KEY}" }, { KEY: "test-secret" });
    expect(config.memoryApiKey).toBe("test-secret");
  });

  it("rejects a missing memory API key", () => {
    expect(() => loadConfig({ dataset: "d.jsonl" }, {})).toThrow(ConfigurationError);
    expect(() => loadConfig({ dataset: "d.jsonl" }, {})).toThrow(/memoryApiKey/);
  });

  it("rejects a reference to an unset variable", () => {
    expect(() => loadConfig({ dataset: "d.jsonl", memoryApiKey: "${MISSING}" }, {})).toThrow(
      ConfigurationError,
    );
  });

  it("rejects a missing dataset", () => {
    expect(() => loadConfig({ memoryApiKey: "test-secret" }, {})).toThrow(/dataset/);
  });

  it("rejects plain http to a remote memory service", () => {
    expect(() => loadConfig({ ...BASE, memoryUrl: "http://memory.example.com" }, {})).toThrow(
      "Invalid configuration: memoryUrl: memoryUrl must use HTTPS (http allowed only for localhost)",
    );
  });

  it("allows http on localhost", () => {
    expect(loadConfig({ ...BASE, memoryUrl: "http://localhost:3030" }, {}).memoryUrl).toBe(
      "http://localhost:3030",
    );
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ ...BASE, provider: "cohere" }, {})).toThrow(/provider/);
  });

  it("bounds the recall limit", () => {
    expect(() => loadConfig({ ...BASE, recallLimit: 0 }, {})).toThrow(/recallLimit/);
    expect(() => loadConfig({ ...BASE, recallLimit: 51 }, {})).toThrow(/recallLimit/);
    expect(loadConfig({ ...BASE, recallLimit: 50 }, {}).recallLimit).toBe(50);
  });

  it("rejects a non-positive item limit", () => {
    expect(() => loadConfig({ ...BASE, limit: 0 }, {})).toThrow(/limit/);
  });

  it("tags errors with the config code", () => {
    try {
      loadConfig({}, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect((err as ConfigurationError).code).toBe("CONFIG_INVALID");
    }
  });
});

describe("resolveConfigEnvVars", () => {
  it("expands strings and leaves other values alone", () => {
    expect(
      resolveConfigEnvVars({ a: "${X}/path", b: 3, c: true, d: undefined }, { X: "/root" }),
    ).toEqual({ a: "/root/path", b: 3, c: true });
  });

  it("replaces unset variables with an empty string", () => {
    expect(resolveConfigEnvVars({ a: "pre-${NOPE}" }, {})).toEqual({ a: "pre-" });
  });
});
