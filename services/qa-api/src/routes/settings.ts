import type { FastifyInstance } from "fastify";

import { ProviderConfigError } from "../lib/generation/registry.js";
import type { Services } from "../services.js";
import { ProviderUpdateSchema } from "../validation.js";

export async function registerSettingsRoutes(app: FastifyInstance, services: Services): Promise<void> {
  const { providers } = services;

  app.get("/v1/settings/llm/status", async () => providers.status());

  app.post("/v1/settings/llm/update", async (request, reply) => {
    const parsed = ProviderUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }

    try {
      const snapshot = await providers.reconfigure(parsed.data);
      return reply.send({
        success: true,
        message: `已切换到 ${snapshot.strategy.displayName}`,
        provider: snapshot.provider,
        model: snapshot.strategy.modelName,
      });
    } catch (error) {
      if (error instanceof ProviderConfigError) {
        return reply.badRequest(error.message);
      }
      throw error;
    }
  });

  app.post("/v1/settings/llm/test", async (request, reply) => {
    const parsed = ProviderUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    return reply.send(await providers.testConnection(parsed.data));
  });
}
