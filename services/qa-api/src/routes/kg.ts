import type { FastifyInstance } from "fastify";

import { DEFAULT_NODE_COLOR, NODE_COLORS, NODE_LABELS, RELATION_TARGETS, type DiseaseRelation } from "../lib/graph-store.js";
import type { Services } from "../services.js";
import { KgGraphQuerySchema, KgNodeParamsSchema, KgSearchQuerySchema } from "../validation.js";

const RELATION_LABELS: Record<DiseaseRelation, string> = {
  has_symptom: "症状",
  common_drug: "常用药物",
  recommand_drug: "推荐药物",
  do_eat: "宜吃",
  no_eat: "忌吃",
  recommand_eat: "推荐食谱",
  need_check: "检查",
  belongs_to: "所属科室",
  cure_way: "治疗方法",
  acompany_with: "并发症",
};

export async function registerKgRoutes(app: FastifyInstance, services: Services): Promise<void> {
  const { graph } = services;

  app.get("/v1/kg/node/:nodeId", async (request, reply) => {
    const parsed = KgNodeParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const result = await graph.neighbors(parsed.data.nodeId);
    if (!result) {
      return reply.notFound("node_not_found");
    }
    return reply.send(result);
  });

  app.get("/v1/kg/search", async (request, reply) => {
    const parsed = KgSearchQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    const nodes = await graph.searchNodes(parsed.data.q, parsed.data.types, parsed.data.limit);
    return reply.send({ nodes, total: nodes.length, query: parsed.data.q });
  });

  app.get("/v1/kg/graph", async (request, reply) => {
    const parsed = KgGraphQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }
    return reply.send(await graph.graphData(parsed.data.limit));
  });

  app.get("/v1/kg/stats", async () => graph.stats());

  app.get("/v1/kg/types", async () => ({
    types: NODE_LABELS.map((type) => ({ type, color: NODE_COLORS[type] ?? DEFAULT_NODE_COLOR })),
  }));

  app.get("/v1/kg/relationships", async () => {
    const relations = Object.keys(RELATION_LABELS).filter(
      (relation): relation is DiseaseRelation => relation in RELATION_TARGETS,
    );
    return {
      relationships: relations.map((relation) => ({
        type: relation,
        label: RELATION_LABELS[relation],
        source: "Disease",
        target: RELATION_TARGETS[relation],
      })),
    };
  });
}
