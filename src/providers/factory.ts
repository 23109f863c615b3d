import type { EvalConfig } from "../core/config/schema.js";
import { ConfigurationError } from "../core/errors.js";
import { AnthropicProvider } from "./anthropic.js";
import { BasetenProvider } from "./baseten.js";
import { OllamaProvider } from "./ollama.js";
import { OpenAIProvider } from "./openai.js";
import type { LLMProvider } from "./types.js";

export type ProviderConfig = Pick<EvalConfig, "provider" | "model" | "apiBase" | "apiKey" | "ollamaUrl">;

type Env = Record<string, string | undefined>;

function requireKey(provider: string, key: string | undefined, envNames: string[]): string {
  if (!key) {
    throw new ConfigurationError(
      `${provider} provider needs an API key. Pass --api-key or set ${envNames.join(" or ")}.`,
      "PROVIDER_CREDENTIALS_MISSING",
    );
  }
  return key;
}

/**
 * Builds the provider named by `config.provider`. Missing credentials throw
 * `ConfigurationError` so the run stops before any item is evaluated.
 */
export function createProvider(config: ProviderConfig, env: Env = process.env): LLMProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIProvider({
        model: config.model,
        apiKey: requireKey("openai", config.apiKey ?? env.OPENAI_API_KEY, ["OPENAI_API_KEY"]),
      });
    case "openai-compatible": {
      if (!config.apiBase) {
        throw new ConfigurationError("--api-base is required for the openai-compatible provider");
      }
      return new OpenAIProvider({
        model: config.model,
        baseURL: config.apiBase,
        apiKey: requireKey("openai-compatible", config.apiKey ?? env.API_KEY ?? env.OPENAI_API_KEY, [
          "API_KEY",
          "OPENAI_API_KEY",
        ]),
      });
    }
    case "anthropic":
      return new AnthropicProvider({
        model: config.model,
        apiKey: requireKey("anthropic", config.apiKey ?? env.ANTHROPIC_API_KEY, ["ANTHROPIC_API_KEY"]),
      });
    case "ollama":
      return new OllamaProvider({ model: config.model, baseUrl: config.apiBase ?? config.ollamaUrl });
    case "baseten":
      return new BasetenProvider({
        model: config.model,
        endpoint: config.apiBase,
        apiKey: requireKey("baseten", config.apiKey ?? env.BASETEN_API_KEY, ["BASETEN_API_KEY"]),
      });
    default: {
      const unknown: never = config.provider;
      throw new ConfigurationError(`Unknown provider: ${String(unknown)}`, "PROVIDER_UNKNOWN");
    }
  }
}
