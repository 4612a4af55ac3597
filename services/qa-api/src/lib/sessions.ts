import type { Pool } from "pg";

import type { SessionRecord } from "../types.js";

export type SessionPayload = Record<string, unknown> & {
  id?: string;
  title?: string;
};

type SessionRow = {
  session_id: string;
  title: string;
  payload: unknown;
  updated_at: Date | string;
};

const LIST_LIMIT = 100;

function asPayload(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function toRecord(row: SessionRow): SessionRecord {
  return {
    session_id: row.session_id,
    title: row.title,
    session: asPayload(row.payload),
    updated_at: new Date(row.updated_at).toISOString(),
  };
}

// Upsert on (user_id, session_id); a session without an id gets a timestamp id.
export async function saveSession(db: Pool, userId: string, session: SessionPayload): Promise<SessionRecord> {
  const sessionId = session.id ?? String(Date.now());
  const title = session.title ?? "新对话";
  const result = await db.query<SessionRow>(
    `
      INSERT INTO chat_session (user_id, session_id, title, payload, updated_at)
      VALUES ($1, $2, $3, $4::jsonb, now())
      ON CONFLICT (user_id, session_id)
      DO UPDATE SET title = EXCLUDED.title, payload = EXCLUDED.payload, updated_at = now()
      RETURNING session_id, title, payload, updated_at
    `,
    [userId, sessionId, title, JSON.stringify({ ...session, id: sessionId })],
  );
  const [row] = result.rows;
  if (!row) {
    throw new Error(`session ${sessionId} was not stored`);
  }
  return toRecord(row);
}

export async function listSessions(db: Pool, userId: string): Promise<SessionRecord[]> {
  const result = await db.query<SessionRow>(
    `
      SELECT session_id, title, payload, updated_at
      FROM chat_session
      WHERE user_id = $1
      ORDER BY updated_at DESC
      LIMIT $2
    `,
    [userId, LIST_LIMIT],
  );
  return result.rows.map(toRecord);
}

export async function getSession(db: Pool, userId: string, sessionId: string): Promise<SessionRecord | null> {
  const result = await db.query<SessionRow>(
    `
      SELECT session_id, title, payload, updated_at
      FROM chat_session
      WHERE user_id = $1 AND session_id = $2
    `,
    [userId, sessionId],
  );
  const [row] = result.rows;
  return row ? toRecord(row) : null;
}

export async function deleteSession(db: Pool, userId: string, sessionId: string): Promise<boolean> {
  const result = await db.query(`DELETE FROM chat_session WHERE user_id = $1 AND session_id = $2`, [userId, sessionId]);
  return (result.rowCount ?? 0) > 0;
}
