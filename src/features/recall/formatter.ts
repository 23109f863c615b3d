import type { RecalledMemory } from "../../memory/client.js";

export const NO_MEMORIES_MARKER = "(No relevant memories found)";

/**
 * Renders recalled memories as numbered evidence blocks separated by blank lines.
 */
export function formatMemories(memories: RecalledMemory[]): string {
  if (!memories.length) return NO_MEMORIES_MARKER;

  return memories.map((m, i) => `[Memory ${i + 1}]: ${m.content}`).join("\n\n");
}
