import { Readable } from "node:stream";

import type { FastifyInstance } from "fastify";

import { errorMessage } from "../lib/logger.js";
import { toServerSentEvents } from "../lib/sse.js";
import type { Services } from "../services.js";
import { QueryRequestSchema } from "../validation.js";

export async function registerQueryRoutes(app: FastifyInstance, services: Services): Promise<void> {
  app.post("/v1/query", async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }

    try {
      const result = await services.qa.process(parsed.data);
      return reply.send(result);
    } catch (error) {
      request.log.error({ err: errorMessage(error), auth_subject: request.authContext.authSubject }, "query failed");
      return reply.code(500).send({ error: "query_failed" });
    }
  });

  app.post("/v1/query/stream", async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }

    const frames = toServerSentEvents(services.qa.processStream(parsed.data), request.log);
    reply
      .header("content-type", "text/event-stream; charset=utf-8")
      .header("cache-control", "no-cache")
      .header("x-accel-buffering", "no");
    return reply.send(Readable.from(frames));
  });

  app.get("/v1/query/examples", async () => ({
    examples: services.queryExamples,
    total: services.queryExamples.length,
  }));
}
