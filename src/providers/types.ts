import type { ProviderName } from "../core/config/schema.js";

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * A backend that turns a prompt into a short completion. `complete` resolves
 * with the raw text (which may hold no usable answer) or rejects with a
 * `ProviderError` when the call itself fails.
 */
export interface LLMProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

// Answer selection wants a single digit back.
export const DEFAULT_MAX_TOKENS = 10;
export const DEFAULT_TEMPERATURE = 0;
