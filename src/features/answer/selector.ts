import { errorMessage } from "../../core/errors.js";
import type { Logger } from "../../internal/logger.js";
import type { LLMProvider } from "../../providers/types.js";

export const DEFAULT_CHOICE_INDEX = 0;

export function buildAnswerPrompt(context: string, question: string, choices: string[]): string {
  const choicesText = choices.map((choice, i) => `${i}. ${choice}`).join("\n");

  return `Based on the following conversation memories, answer the question by selecting the correct option.

RETRIEVED MEMORIES:
${context}

QUESTION: ${question}

OPTIONS:
${choicesText}

Instructions:
- Analyze the memories to find relevant information
- Select the option that best answers the question
- Respond with ONLY the option number (0-9)
- If unsure, make your best guess based on available information

Your answer (single digit 0-9):`;
}

/**
 * First ASCII digit in the text wins; no digit means the default index.
 * Never throws.
 */
export function parseChoiceIndex(text: string): number {
  for (const char of text) {
    if (char >= "0" && char <= "9") return Number(char);
  }
  return DEFAULT_CHOICE_INDEX;
}

export interface SelectionResult {
  predictedIdx: number;
  raw: string | null;
  error?: string;
}

/**
 * Asks the provider to pick a choice. Provider failures are logged and
 * mapped to the default index so the item still gets scored.
 */
export async function selectAnswer(
  provider: LLMProvider,
  question: string,
  choices: string[],
  context: string,
  logger: Logger,
): Promise<SelectionResult> {
  const prompt = buildAnswerPrompt(context, question, choices);

  try {
    const raw = await provider.complete(prompt);
    const predictedIdx = parseChoiceIndex(raw);
    logger.debug?.(`Answer: raw=${JSON.stringify(raw)} predicted=${predictedIdx}`);
    return { predictedIdx, raw };
  } catch (err) {
    const message = errorMessage(err);
    logger.warn(`LLM error, defaulting to choice ${DEFAULT_CHOICE_INDEX}: ${message}`);
    return { predictedIdx: DEFAULT_CHOICE_INDEX, raw: null, error: message };
  }
}
