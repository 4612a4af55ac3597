import type { Evidence, KGPath, MemoryHit } from "../types.js";
import type { EntityResolver } from "./entity-resolver.js";
import { createGraphKnowledge, renderPathFallback } from "./graph-knowledge.js";
import type { GraphStore } from "./graph-store.js";
import { errorMessage, type Logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";
import type { PassageStore } from "./passage-store.js";

export type ContextBundle = {
  memories: MemoryHit[];
  graphContext: string;
  graphPaths: KGPath[];
  evidence: Evidence[];
  evidenceEntities: string[];
};

export type AssembleOptions = {
  includeKgPaths: boolean;
  includeEvidence: boolean;
  maxAnswers: number;
};

export type ContextAssembler = {
  assemble(entities: string[], question: string, userId: string | undefined, options: AssembleOptions): Promise<ContextBundle>;
};

export type ContextAssemblerOptions = {
  graph: GraphStore;
  passages: PassageStore;
  memory: MemoryStore;
  resolver: EntityResolver;
  logger: Logger;
};

const MEMORY_TOP_K = 5;

export function createContextAssembler(options: ContextAssemblerOptions): ContextAssembler {
  const { graph, passages, memory, resolver, logger } = options;

  async function settle<T>(source: string, task: () => Promise<T>, empty: T): Promise<T> {
    try {
      return await task();
    } catch (error) {
      logger.error({ source, err: errorMessage(error) }, "context source failed");
      return empty;
    }
  }

  return {
    async assemble(entities, question, userId, assembleOptions) {
      const knowledge = createGraphKnowledge(graph);

      const [memories, graphPart, evidencePart] = await Promise.all([
        settle<MemoryHit[]>(
          "memory",
          async () => (userId ? memory.search(question, userId, MEMORY_TOP_K) : []),
          [],
        ),
        settle(
          "graph",
          async () => {
            const graphPaths =
              assembleOptions.includeKgPaths && entities.length > 0 ? await knowledge.findGraphPaths(entities) : [];
            const rendered =
              entities.length > 0 && graph.isConnected() ? await knowledge.renderGraphContext(entities) : "";
            return { graphPaths, graphContext: rendered || renderPathFallback(graphPaths) };
          },
          { graphPaths: [], graphContext: "" },
        ),
        settle(
          "evidence",
          async () => {
            if (!assembleOptions.includeEvidence) {
              return { evidence: [], evidenceEntities: [] };
            }
            const evidenceEntities = await resolver.resolveCurrentTurnOnly(question);
            const evidence = await passages.search(question, evidenceEntities, assembleOptions.maxAnswers + 2);
            return { evidence, evidenceEntities };
          },
          { evidence: [], evidenceEntities: [] },
        ),
      ]);

      logger.debug(
        {
          entities,
          evidenceEntities: evidencePart.evidenceEntities,
          paths: graphPart.graphPaths.length,
          evidence: evidencePart.evidence.length,
          memories: memories.length,
        },
        "context assembled",
      );

      return {
        memories,
        graphContext: graphPart.graphContext,
        graphPaths: graphPart.graphPaths,
        evidence: evidencePart.evidence,
        evidenceEntities: evidencePart.evidenceEntities,
      };
    },
  };
}
