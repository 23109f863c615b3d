export { createProvider, type ProviderConfig } from "./factory.js";
export { OpenAIProvider, type OpenAIProviderOptions } from "./openai.js";
export { AnthropicProvider, type AnthropicProviderOptions } from "./anthropic.js";
export { OllamaProvider } from "./ollama.js";
export { BasetenProvider, extractDeploymentText, type BasetenProviderOptions } from "./baseten.js";
export type { CompletionOptions, LLMProvider } from "./types.js";
