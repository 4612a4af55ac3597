import type { Pool } from "pg";

import type { AppConfig } from "./config.js";
import { createAdmissionController, type AdmissionController } from "./lib/admission.js";
import { createContextAssembler } from "./lib/context-assembler.js";
import { loadDataFiles, type DataFiles, type QueryExample } from "./lib/data-files.js";
import { getDbPool } from "./lib/db.js";
import { createEntityResolver } from "./lib/entity-resolver.js";
import { createProviderRegistry, type ProviderRegistry, type StrategyFactory } from "./lib/generation/registry.js";
import { createTemplateStrategy } from "./lib/generation/template.js";
import { createNeo4jGraphStore, type GraphStore } from "./lib/graph-store.js";
import type { Logger } from "./lib/logger.js";
import { createPgMemoryStore, type MemoryStore } from "./lib/memory-store.js";
import { createInMemoryPassageStore, type PassageStore } from "./lib/passage-store.js";
import { createQaService, type QaService } from "./lib/qa-service.js";

export type Services = {
  config: AppConfig;
  db: Pool;
  graph: GraphStore;
  providers: ProviderRegistry;
  admission: AdmissionController;
  qa: QaService;
  queryExamples: QueryExample[];
};

export type ServiceOverrides = {
  db?: Pool;
  graph?: GraphStore;
  memory?: MemoryStore;
  passages?: PassageStore;
  data?: DataFiles;
  providerFactory?: StrategyFactory;
};

export async function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Promise<Services> {
  const data = overrides.data ?? (await loadDataFiles(config.dataDir));
  const db =
    overrides.db ??
    getDbPool({
      connectionString: config.databaseUrl,
      maxConnections: config.databasePoolSize,
      connectTimeoutMs: config.databaseConnectTimeoutMs,
      logger,
    });

  const graph =
    overrides.graph ??
    createNeo4jGraphStore({
      uri: config.neo4j.uri,
      user: config.neo4j.user,
      password: config.neo4j.password,
      logger,
    });
  if (!overrides.graph && config.enableGraph) {
    await graph.connect();
  }

  const memory = overrides.memory ?? createPgMemoryStore(db);
  const passages = overrides.passages ?? createInMemoryPassageStore(data.passages);
  const resolver = createEntityResolver({ graph, lexicon: data.lexicon, logger });
  const template = createTemplateStrategy({
    cannedTopics: data.cannedTopics,
    charDelayMs: config.llm.streamCharDelayMs,
  });
  const providers = createProviderRegistry({
    config: config.llm,
    template,
    logger,
    factory: overrides.providerFactory,
  });
  const admission = createAdmissionController(config.maxConcurrentRequests);
  const assembler = createContextAssembler({ graph, passages, memory, resolver, logger });

  return {
    config,
    db,
    graph,
    providers,
    admission,
    qa: createQaService({ resolver, assembler, graph, providers, memory, admission, logger }),
    queryExamples: data.queryExamples,
  };
}
