import type { MemoryUnit } from "../../memory/client.js";
import type { Turn } from "../../dataset/schema.js";
import { datetimePrefix } from "./datetime.js";

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_SUMMARY_MAX_CHARS = 2000;

/** Length in code points, so astral characters such as emoji count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

function truncateChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join("");
}

export interface ChunkOptions {
  /** Target characters of turn content per chunk. A longer single turn gets a chunk of its own. */
  chunkSize?: number;
  summaryMaxChars?: number;
}

export interface SessionInput {
  /** Zero-based position of the session within its item. */
  index: number;
  turns: Turn[];
  summary?: string | null;
  datetime?: string | null;
}

/**
 * Groups turn contents into chunks without ever splitting a turn. A chunk is
 * flushed when the next turn would push it past `target` and it already holds
 * something, so an oversized turn ends up alone in its own chunk.
 */
export function groupTurns(contents: string[], target = DEFAULT_CHUNK_SIZE): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];
  let currentLen = 0;

  for (const content of contents) {
    const len = charLength(content);
    if (currentLen > 0 && currentLen + len > target) {
      chunks.push(current);
      current = [];
      currentLen = 0;
    }
    current.push(content);
    currentLen += len;
  }

  if (current.length > 0) chunks.push(current);
  return chunks;
}

/**
 * Turns one session into storable units: an optional Context unit for the
 * summary, then Conversation units for the dialogue in order.
 */
export function chunkSession(session: SessionInput, options: ChunkOptions = {}): MemoryUnit[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const summaryMaxChars = options.summaryMaxChars ?? DEFAULT_SUMMARY_MAX_CHARS;
  const sessionNo = session.index + 1;
  const sessionTag = `session_${sessionNo}`;
  const prefix = datetimePrefix(session.datetime);
  const units: MemoryUnit[] = [];

  const summary = session.summary;
  if (summary && summary.trim()) {
    units.push({
      content: `${prefix}Session ${sessionNo} Summary: ${truncateChars(summary, summaryMaxChars)}`,
      memory_type: "Context",
      tags: [sessionTag, "summary"],
    });
  }

  const contents = session.turns.map((t) => t.content.trim()).filter((c) => c.length > 0);
  for (const chunk of groupTurns(contents, chunkSize)) {
    units.push({
      content: `${prefix}Session ${sessionNo}:\n${chunk.join("\n")}`,
      memory_type: "Conversation",
      tags: [sessionTag, "dialogue"],
    });
  }

  return units;
}

export interface HaystackInput {
  haystack_sessions: Turn[][];
  haystack_session_summaries: Array<string | null>;
  haystack_session_datetimes?: Array<string | null> | null;
}

/**
 * Chunks every session of an item. Sessions and summaries are aligned by
 * index; whichever list is longer decides how many sessions there are.
 */
export function chunkHaystack(item: HaystackInput, options: ChunkOptions = {}): MemoryUnit[] {
  const sessions = item.haystack_sessions;
  const summaries = item.haystack_session_summaries;
  const datetimes = item.haystack_session_datetimes ?? [];
  const count = Math.max(sessions.length, summaries.length);
  const units: MemoryUnit[] = [];

  for (let i = 0; i < count; i++) {
    units.push(
      ...chunkSession(
        {
          index: i,
          turns: sessions[i] ?? [],
          summary: summaries[i] ?? null,
          datetime: datetimes[i] ?? null,
        },
        options,
      ),
    );
  }

  return units;
}
