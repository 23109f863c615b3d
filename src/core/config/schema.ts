import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const ProviderName = z.enum(["openai", "openai-compatible", "anthropic", "ollama", "baseten"]);
export type ProviderName = z.infer<typeof ProviderName>;

export const RecallMode = z.enum(["hybrid", "associative", "semantic"]);
export type RecallMode = z.infer<typeof RecallMode>;

export const LogLevel = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Validates that a URL uses HTTPS, with an exception for localhost in development.
 */
const httpsUrl = z
  .string()
  .url("memoryUrl must be a valid URL")
  .refine(
    (url) => {
      const parsed = new URL(url);
      if (parsed.protocol === "https:") return true;
      // Allow http only for localhost/127.0.0.1 (development)
      if (
        parsed.protocol === "http:" &&
        (parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1")
      ) {
        return true;
      }
      return false;
    },
    { message: "memoryUrl must use HTTPS (http allowed only for localhost)" },
  );

export const EvalConfigSchema = z.object({
  provider: ProviderName.default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  apiBase: z.string().url("apiBase must be a valid URL").optional(),
  apiKey: z.string().min(1).optional(),
  ollamaUrl: z.string().url("ollamaUrl must be a valid URL").default("http://localhost:11434"),
  dataset: z.string().min(1, "dataset path is required"),
  limit: z.number().int().positive().optional(),
  memoryUrl: httpsUrl.default("http://127.0.0.1:3030"),
  memoryApiKey: z.string().min(1, "memoryApiKey is required"),
  output: z.string().min(1).default("locomo_results.json"),
  recallLimit: z.number().int().min(1).max(50).default(5),
  recallMode: RecallMode.default("hybrid"),
  chunkSize: z.number().int().min(1).default(800),
  summaryMaxChars: z.number().int().min(1).default(2000),
  batchStore: z.boolean().default(false),
  extractEntities: z.boolean().default(false),
  createEdges: z.boolean().default(false),
  cleanup: z.boolean().default(true),
  namespacePrefix: z.string().min(1).default("locomo"),
  requestTimeoutMs: z.number().int().min(100).max(600_000).default(30_000),
  logLevel: LogLevel.default("info"),
});

export type EvalConfig = z.infer<typeof EvalConfigSchema>;
export type EvalConfigInput = z.input<typeof EvalConfigSchema>;

type Env = Record<string, string | undefined>;

function resolveEnvVars(value: string, env: Env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => env[envVar] ?? "");
}

export function resolveConfigEnvVars(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    resolved[key] = typeof value === "string" ? resolveEnvVars(value, env) : value;
  }
  return resolved;
}

/**
 * Builds the run configuration from CLI-level options, expanding `${VAR}`
 * references and filling memory-service settings from the environment.
 * Provider credentials are resolved later by the provider factory.
 */
export function loadConfig(raw: Record<string, unknown>, env: Env = process.env): EvalConfig {
  const resolved = resolveConfigEnvVars(raw, env);
  const withEnv: Record<string, unknown> = {
    memoryApiKey: env.MEMORY_API_KEY || undefined,
    memoryUrl: env.MEMORY_URL || undefined,
    ollamaUrl: env.OLLAMA_URL || undefined,
    dataset: env.LOCOMO_DATASET || undefined,
    ...resolved,
  };
  for (const key of Object.keys(withEnv)) {
    if (withEnv[key] === undefined || withEnv[key] === "") delete withEnv[key];
  }

  const parsed = EvalConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}
