import { z } from "zod";
import { ProviderError, errorMessage } from "../core/errors.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type CompletionOptions,
  type LLMProvider,
} from "./types.js";

const ChoicesEnvelope = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }).passthrough() }).passthrough())
    .min(1),
});

const OutputEnvelope = z.object({ output: z.string() });

/**
 * Normalizes a deployment's predict response to plain text. Deployments answer
 * either with a chat-completions `choices` array or a bare `output` string;
 * anything else is returned serialized so the caller still sees it.
 */
export function extractDeploymentText(body: unknown): string {
  const choices = ChoicesEnvelope.safeParse(body);
  if (choices.success) {
    return (choices.data.choices[0]?.message.content ?? "").trim();
  }
  const output = OutputEnvelope.safeParse(body);
  if (output.success) {
    return output.data.output.trim();
  }
  return JSON.stringify(body);
}

export interface BasetenProviderOptions {
  apiKey: string;
  model: string;
  /** Full predict URL; defaults to the model's production deployment. */
  endpoint?: string;
}

export class BasetenProvider implements LLMProvider {
  readonly name = "baseten" as const;
  readonly model: string;
  private apiKey: string;
  private endpoint: string;

  constructor(options: BasetenProviderOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.endpoint =
      options.endpoint ?? `https://model-${encodeURIComponent(options.model)}.api.baseten.co/production/predict`;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Api-Key ${this.apiKey}`,
        },
        body: JSON.stringify({
          messages: [{ role: "user", content: prompt }],
          max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        }),
      });
    } catch (err) {
      throw new ProviderError(this.name, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ProviderError(this.name, `${response.status} ${response.statusText} - ${body}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderError(this.name, `invalid JSON response: ${errorMessage(err)}`, { cause: err });
    }
    return extractDeploymentText(body);
  }
}
