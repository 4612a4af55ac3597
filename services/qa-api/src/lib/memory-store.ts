import type { Pool } from "pg";

import type { MemoryHit } from "../types.js";
import { newId } from "./ids.js";
import { diceSimilarity } from "./similarity.js";

export type MemoryStore = {
  store(userId: string, content: string, metadata: Record<string, unknown>): Promise<void>;
  search(query: string, userId: string, topK: number): Promise<MemoryHit[]>;
};

export type MemoryRow = {
  id: string;
  user_id: string | null;
  content: string;
  metadata: unknown;
};

const CANDIDATE_LIMIT = 200;

function asMetadata(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function rankMemories(query: string, rows: MemoryRow[], topK: number): MemoryHit[] {
  return rows
    .map((row) => ({
      id: row.id,
      user_id: row.user_id,
      content: row.content,
      metadata: asMetadata(row.metadata),
      score: diceSimilarity(query, row.content),
    }))
    .sort((left, right) => right.score - left.score)
    .slice(0, topK);
}

export function createPgMemoryStore(db: Pool): MemoryStore {
  return {
    async store(userId, content, metadata) {
      await db.query(
        `INSERT INTO user_memory (id, user_id, content, metadata)
         VALUES ($1, $2, $3, $4::jsonb)`,
        [newId("mem"), userId, content, JSON.stringify(metadata)],
      );
    },

    async search(query, userId, topK) {
      const result = await db.query<MemoryRow>(
        `SELECT id, user_id, content, metadata
         FROM user_memory
         WHERE user_id = $1
         ORDER BY created_at DESC
         LIMIT $2`,
        [userId, CANDIDATE_LIMIT],
      );
      return rankMemories(query, result.rows, topK);
    },
  };
}
