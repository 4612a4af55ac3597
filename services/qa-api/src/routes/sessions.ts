import type { FastifyInstance } from "fastify";

import { deleteSession, getSession, listSessions, saveSession } from "../lib/sessions.js";
import type { Services } from "../services.js";
import { SessionParamsSchema, SessionSaveRequestSchema, SessionUserParamsSchema } from "../validation.js";

export async function registerSessionRoutes(app: FastifyInstance, services: Services): Promise<void> {
  const { db } = services;

  app.post("/v1/sessions", async (request, reply) => {
    const parsed = SessionSaveRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const saved = await saveSession(db, parsed.data.user_id, parsed.data.session);
    return reply.send({ success: true, session_id: saved.session_id, updated_at: saved.updated_at });
  });

  app.get("/v1/sessions/:userId", async (request, reply) => {
    const parsed = SessionUserParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const sessions = await listSessions(db, parsed.data.userId);
    return reply.send({ sessions, total: sessions.length });
  });

  app.get("/v1/sessions/:userId/:sessionId", async (request, reply) => {
    const parsed = SessionParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const session = await getSession(db, parsed.data.userId, parsed.data.sessionId);
    if (!session) {
      return reply.notFound("session_not_found");
    }
    return reply.send(session);
  });

  app.delete("/v1/sessions/:userId/:sessionId", async (request, reply) => {
    const parsed = SessionParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const deleted = await deleteSession(db, parsed.data.userId, parsed.data.sessionId);
    if (!deleted) {
      return reply.notFound("session_not_found");
    }
    return reply.send({ success: true, session_id: parsed.data.sessionId });
  });
}
