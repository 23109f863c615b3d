import Anthropic from "@anthropic-ai/sdk";
import { ProviderError, errorMessage } from "../core/errors.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type CompletionOptions,
  type LLMProvider,
} from "./types.js";

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  client?: Anthropic;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic" as const;
  readonly model: string;
  private client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        messages: [{ role: "user", content: prompt }],
      });

      for (const block of response.content) {
        if (block.type === "text") return block.text.trim();
      }
      return "";
    } catch (err) {
      throw new ProviderError(this.name, errorMessage(err), {
        status: err instanceof Anthropic.APIError ? err.status : undefined,
        cause: err,
      });
    }
  }
}
