import { readFile } from "node:fs/promises";
import { DatasetError, errorMessage } from "../core/errors.js";
import { BenchmarkItemSchema, type BenchmarkItem } from "./schema.js";

export interface LoadedDataset {
  items: BenchmarkItem[];
  /** Items in the file before any limit was applied. */
  total: number;
}

interface RawRecord {
  line: number;
  value: unknown;
}

function parseRecords(text: string): RawRecord[] {
  const trimmed = text.trimStart();

  // A plain JSON array is accepted alongside newline-delimited records.
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      throw new DatasetError(1, `invalid JSON array: ${errorMessage(err)}`, err);
    }
    if (!Array.isArray(parsed)) {
      throw new DatasetError(1, "expected a JSON array of items");
    }
    return parsed.map((value: unknown, i) => ({ line: i + 1, value }));
  }

  const records: RawRecord[] = [];
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? "";
    if (!line) continue;
    try {
      records.push({ line: i + 1, value: JSON.parse(line) });
    } catch (err) {
      throw new DatasetError(i + 1, `invalid JSON: ${errorMessage(err)}`, err);
    }
  }
  return records;
}

/**
 * Validates every record up front; the first bad record fails the whole load.
 */
export function parseDataset(text: string): BenchmarkItem[] {
  const seen = new Set<string>();
  const items: BenchmarkItem[] = [];

  for (const record of parseRecords(text)) {
    const parsed = BenchmarkItemSchema.safeParse(record.value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? issue.path.join(".") : "record";
      throw new DatasetError(record.line, `${where}: ${issue?.message ?? "invalid item"}`, parsed.error);
    }
    if (seen.has(parsed.data.question_id)) {
      throw new DatasetError(record.line, `duplicate question_id "${parsed.data.question_id}"`);
    }
    seen.add(parsed.data.question_id);
    items.push(parsed.data);
  }

  return items;
}

export async function loadDataset(path: string, limit?: number): Promise<LoadedDataset> {
  const items = parseDataset(await readFile(path, "utf-8"));
  return {
    items: limit !== undefined && limit < items.length ? items.slice(0, limit) : items,
    total: items.length,
  };
}
