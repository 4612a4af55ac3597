import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import Fastify, { type FastifyInstance } from "fastify";

import { loadConfig, type AppConfig } from "./config.js";
import { closeDbPool } from "./lib/db.js";
import { buildLoggerOptions } from "./lib/logger.js";
import { authorizeRequest } from "./lib/request-context.js";
import { registerFeedbackRoutes } from "./routes/feedback.js";
import { registerKgRoutes } from "./routes/kg.js";
import { registerQueryRoutes } from "./routes/query.js";
import { registerSessionRoutes } from "./routes/sessions.js";
import { registerSettingsRoutes } from "./routes/settings.js";
import { createServices, type ServiceOverrides } from "./services.js";

export type BuildAppOptions = {
  logger?: boolean;
  config?: AppConfig;
  services?: ServiceOverrides;
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger ? buildLoggerOptions(config.logLevel) : false,
  });

  await app.register(cors, { origin: true });
  await app.register(sensible);

  const services = await createServices(config, app.log, options.services);

  app.addHook("onRequest", async (request, reply) => {
    const auth = authorizeRequest(request, config.apiKeys);
    if (!auth.ok) {
      return reply.unauthorized(auth.reason);
    }
    request.authContext = auth.context;
  });

  app.get("/health", async () => {
    const { strategy } = services.providers.current();
    return {
      status: "ok",
      service: "qa-api",
      graph_connected: services.graph.isConnected(),
      provider: strategy.id,
      model: strategy.modelName,
      admission: {
        capacity: services.admission.capacity,
        active: services.admission.active(),
        pending: services.admission.pending(),
      },
    };
  });

  await registerQueryRoutes(app, services);
  await registerKgRoutes(app, services);
  await registerSettingsRoutes(app, services);
  await registerFeedbackRoutes(app, services);
  await registerSessionRoutes(app, services);

  app.addHook("onClose", async () => {
    await services.graph.close();
    if (!options.services?.db) {
      await closeDbPool();
    }
  });

  return app;
}
