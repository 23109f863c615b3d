import OpenAI from "openai";
import { ProviderError, errorMessage } from "../core/errors.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type CompletionOptions,
  type LLMProvider,
} from "./types.js";

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  /**
   * Any endpoint that speaks the chat-completions shape (Together, Groq, vLLM, ...).
   * Omit for api.openai.com.
   */
  baseURL?: string;
  client?: OpenAI;
}

/**
 * Chat-completions provider, used both for OpenAI itself and for
 * API-compatible endpoints reached through `baseURL`.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name: "openai" | "openai-compatible";
  readonly model: string;
  private client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.baseURL ? "openai-compatible" : "openai";
    this.model = options.model;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
      });
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      });
      return (response.choices[0]?.message?.content ?? "").trim();
    } catch (err) {
      throw new ProviderError(this.name, errorMessage(err), {
        status: err instanceof OpenAI.APIError ? err.status : undefined,
        cause: err,
      });
    }
  }
}
