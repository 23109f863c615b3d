import { z } from "zod";
import { ProviderError, errorMessage } from "../core/errors.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type CompletionOptions,
  type LLMProvider,
} from "./types.js";

const OllamaChatResponse = z.object({
  message: z.object({ content: z.string() }).passthrough(),
}).passthrough();

/**
 * Locally hosted models behind an Ollama server. No credentials.
 */
export class OllamaProvider implements LLMProvider {
  readonly name = "ollama" as const;
  readonly model: string;
  private baseUrl: string;

  constructor(config: { model: string; baseUrl?: string }) {
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          stream: false,
          options: {
            temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
            num_predict: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          },
        }),
      });
    } catch (err) {
      throw new ProviderError(this.name, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      throw new ProviderError(this.name, `${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderError(this.name, `invalid JSON response: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = OllamaChatResponse.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.name, "response has no message content", { cause: parsed.error });
    }
    return parsed.data.message.content.trim();
  }
}
