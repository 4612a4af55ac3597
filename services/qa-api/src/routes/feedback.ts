import type { FastifyInstance } from "fastify";

import { getFeedbackStats, recordFeedback } from "../lib/feedback.js";
import type { Services } from "../services.js";
import { FeedbackRequestSchema } from "../validation.js";

export async function registerFeedbackRoutes(app: FastifyInstance, services: Services): Promise<void> {
  app.post("/v1/feedback", async (request, reply) => {
    const parsed = FeedbackRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const result = await recordFeedback(services.db, parsed.data);
    request.log.info(
      { feedback_id: result.feedback_id, type: parsed.data.feedback_type, auth_subject: request.authContext.authSubject },
      "feedback recorded",
    );
    return reply.send(result);
  });

  app.get("/v1/feedback/stats", async () => getFeedbackStats(services.db));
}
