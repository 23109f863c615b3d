import { z } from "zod";
import type { RecallMode } from "../core/config/schema.js";
import { MemoryServiceError } from "../core/errors.js";

export type MemoryType = "Context" | "Conversation";

/**
 * One storable unit, as sent to `/api/remember`.
 */
export interface MemoryUnit {
  content: string;
  memory_type: MemoryType;
  tags: string[];
}

export interface BatchOptions {
  extract_entities: boolean;
  create_edges: boolean;
}

export interface RecalledMemory {
  content: string;
  score: number;
  tags: string[];
}

const RememberResponseSchema = z
  .object({
    id: z.string().optional(),
    success: z.boolean().optional(),
  })
  .passthrough();

export type RememberResponse = z.infer<typeof RememberResponseSchema>;

const BatchResponseSchema = z
  .object({
    created: z.number().int().nonnegative().optional(),
  })
  .passthrough();

// The recall endpoint answers either with experience-wrapped entries or flat ones.
const RawMemorySchema = z
  .object({
    score: z.number().nullish(),
    content: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    experience: z
      .object({
        content: z.string().nullish(),
        tags: z.array(z.string()).nullish(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const RecallResponseSchema = z
  .object({
    memories: z.array(RawMemorySchema).default([]),
  })
  .passthrough();

export function normalizeRecalled(raw: z.infer<typeof RawMemorySchema>): RecalledMemory {
  return {
    content: raw.experience?.content ?? raw.content ?? "",
    score: raw.score ?? 0,
    tags: raw.experience?.tags ?? raw.tags ?? [],
  };
}

/**
 * What the evaluation driver needs from a memory backend.
 */
export interface MemoryService {
  remember(userId: string, unit: MemoryUnit): Promise<RememberResponse>;
  rememberBatch(userId: string, units: MemoryUnit[], options: BatchOptions): Promise<number>;
  recall(userId: string, query: string, limit: number, mode: RecallMode): Promise<RecalledMemory[]>;
  deleteUser(userId: string, purge: boolean): Promise<void>;
  healthCheck(): Promise<boolean>;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;

export class MemoryClient implements MemoryService {
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private apiKey: string,
    private timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private async fetchJson(url: string, body: unknown, label: string): Promise<unknown> {
    const res = await this.fetchRequest(url, { method: "POST", body: JSON.stringify(body) }, label);
    return res.json();
  }

  private async fetchRequest(url: string, init: RequestInit, label: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, {
        ...init,
        headers: {
          "X-API-Key": this.apiKey,
          "Content-Type": "application/json",
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new MemoryServiceError(label, res.status);
      }

      return res;
    } finally {
      clearTimeout(timeout);
    }
  }

  async healthCheck(timeoutMs = DEFAULT_HEALTH_TIMEOUT_MS): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(`${this.baseUrl}/health`, {
        method: "GET",
        headers: { "X-API-Key": this.apiKey },
        signal: controller.signal,
      });
      return res.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }

  async remember(userId: string, unit: MemoryUnit): Promise<RememberResponse> {
    const json = await this.fetchJson(
      `${this.baseUrl}/api/remember`,
      {
        user_id: userId,
        content: unit.content,
        memory_type: unit.memory_type,
        tags: unit.tags.length > 0 ? unit.tags : undefined,
      },
      "remember",
    );
    return RememberResponseSchema.parse(json ?? {});
  }

  /**
   * Stores several units in one request. Resolves to the number of memories
   * the service reports as created, or the number submitted when it does not say.
   */
  async rememberBatch(userId: string, units: MemoryUnit[], options: BatchOptions): Promise<number> {
    const json = await this.fetchJson(
      `${this.baseUrl}/api/remember/batch`,
      { user_id: userId, memories: units, options },
      "remember/batch",
    );
    return BatchResponseSchema.parse(json ?? {}).created ?? units.length;
  }

  async recall(userId: string, query: string, limit: number, mode: RecallMode): Promise<RecalledMemory[]> {
    const json = await this.fetchJson(
      `${this.baseUrl}/api/recall`,
      { user_id: userId, query, limit, mode },
      "recall",
    );
    return RecallResponseSchema.parse(json ?? {}).memories.map(normalizeRecalled);
  }

  async deleteUser(userId: string, purge = true): Promise<void> {
    await this.fetchRequest(
      `${this.baseUrl}/api/users/${encodeURIComponent(userId)}?purge=${purge}`,
      { method: "DELETE" },
      "delete_user",
    );
  }
}
