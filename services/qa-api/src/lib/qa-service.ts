import type { AnswerSource, Evidence, QueryRequest, QueryResponse, StreamEvent } from "../types.js";
import type { AdmissionController } from "./admission.js";
import type { ContextAssembler, ContextBundle } from "./context-assembler.js";
import type { EntityResolver } from "./entity-resolver.js";
import type { ProviderRegistry } from "./generation/registry.js";
import type { GenerationInput, GenerationOutcome, GenerationStrategy } from "./generation/types.js";
import type { GraphStore } from "./graph-store.js";
import { newId } from "./ids.js";
import { errorMessage, type Logger } from "./logger.js";
import type { MemoryStore } from "./memory-store.js";

export const DISCLAIMER =
  "⚠️ 重要提示：本系统仅供医疗信息参考，不能替代专业医生的诊断和治疗建议。如有身体不适，请及时就医。紧急情况请拨打急救电话。";

export const WARNINGS = {
  noEvidence: "未找到直接相关的医学文献",
  noGraphContext: "知识图谱中未找到相关信息",
  graphDisconnected: "知识图谱服务未连接",
  timeout: "大模型调用超时，已使用知识图谱模板回答",
  transportError: "大模型调用失败，已使用知识图谱模板回答",
} as const;

const DEFAULT_CONFIDENCE = 0.7;
const MEMORY_ANSWER_CHARS = 1000;

export type QaService = {
  process(request: QueryRequest): Promise<QueryResponse>;
  processStream(request: QueryRequest): AsyncGenerator<StreamEvent>;
};

export type QaServiceDeps = {
  resolver: EntityResolver;
  assembler: ContextAssembler;
  graph: GraphStore;
  providers: ProviderRegistry;
  memory: MemoryStore;
  admission: AdmissionController;
  logger: Logger;
};

type PreparedQuery = {
  queryId: string;
  startedAt: number;
  strategy: GenerationStrategy;
  bundle: ContextBundle;
  input: GenerationInput;
};

export function answerSourceFor(outcome: GenerationOutcome, grounded: boolean): AnswerSource {
  if (outcome.strategyId === "template") {
    return grounded ? "knowledge_graph" : "template";
  }
  return grounded ? "mixed" : "llm_only";
}

export function confidenceScore(evidence: Evidence[]): number {
  const scores = evidence.map((item) => item.confidence).filter((score) => score > 0);
  if (scores.length === 0) {
    return DEFAULT_CONFIDENCE;
  }
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return Math.round(mean * 100) / 100;
}

export function collectWarnings(bundle: ContextBundle, graphConnected: boolean, outcome: GenerationOutcome): string[] {
  const warnings: string[] = [];
  if (bundle.evidence.length === 0) {
    warnings.push(WARNINGS.noEvidence);
  }
  if (!bundle.graphContext.trim()) {
    warnings.push(WARNINGS.noGraphContext);
  }
  if (!graphConnected) {
    warnings.push(WARNINGS.graphDisconnected);
  }
  if (outcome.kind === "fallback") {
    warnings.push(outcome.reason === "timeout" ? WARNINGS.timeout : WARNINGS.transportError);
  }
  return warnings;
}

export function createQaService(deps: QaServiceDeps): QaService {
  const { resolver, assembler, graph, providers, memory, admission, logger } = deps;

  async function prepare(request: QueryRequest, strategy: GenerationStrategy): Promise<PreparedQuery> {
    const queryId = newId("q");
    const startedAt = Date.now();
    const history = request.history ?? [];
    const entities = await resolver.resolve(request.query, history);
    const bundle = await assembler.assemble(entities, request.query, request.user_id, {
      includeKgPaths: request.include_kg_paths,
      includeEvidence: request.include_evidence,
      maxAnswers: request.max_answers,
    });
    logger.debug({ query_id: queryId, entities, provider: strategy.id }, "query context ready");

    return {
      queryId,
      startedAt,
      strategy,
      bundle,
      input: {
        question: request.query,
        history,
        entities,
        graphContext: bundle.graphContext,
        memories: bundle.memories,
        evidence: bundle.evidence,
        supplement: request.context,
        language: request.language,
      },
    };
  }

  function buildResponse(request: QueryRequest, prepared: PreparedQuery, outcome: GenerationOutcome): QueryResponse {
    const { bundle } = prepared;
    const response: QueryResponse = {
      query_id: prepared.queryId,
      answer: outcome.text,
      answer_source: answerSourceFor(outcome, bundle.graphContext.trim().length > 0),
      evidence: bundle.evidence.slice(0, request.max_answers),
      kg_paths: bundle.graphPaths,
      confidence_score: confidenceScore(bundle.evidence),
      warnings: collectWarnings(bundle, graph.isConnected(), outcome),
      disclaimer: DISCLAIMER,
      processing_time_ms: Date.now() - prepared.startedAt,
      model_used: outcome.model,
    };
    logger.info(
      {
        query_id: response.query_id,
        answer_source: response.answer_source,
        model: response.model_used,
        outcome: outcome.kind,
        evidence: response.evidence.length,
        ms: response.processing_time_ms,
      },
      "query answered",
    );
    return response;
  }

  // Detached: the answer never waits on the memory store.
  function remember(request: QueryRequest, response: QueryResponse): void {
    const userId = request.user_id;
    if (!userId) {
      return;
    }
    const content = `Q: ${request.query}\nA: ${response.answer.slice(0, MEMORY_ANSWER_CHARS)}`;
    void memory.store(userId, content, { query_id: response.query_id }).catch((error: unknown) => {
      logger.error({ query_id: response.query_id, err: errorMessage(error) }, "memory write failed");
    });
  }

  // The provider snapshot is taken before anything is emitted, so a concurrent reconfigure never changes a running request.
  async function* streamAnswer(request: QueryRequest): AsyncGenerator<StreamEvent> {
    const { strategy } = providers.current();

    yield { status: "searching", message: "正在检索知识图谱..." };
    const prepared = await prepare(request, strategy);

    yield { status: "evidence_found", count: Math.min(prepared.bundle.evidence.length, request.max_answers) };
    yield { status: "generating", message: "正在生成回答..." };

    let outcome: GenerationOutcome | null = null;
    for await (const chunk of prepared.strategy.stream(prepared.input)) {
      if (chunk.type === "fragment") {
        yield { status: "content", text: chunk.text };
      } else {
        outcome = chunk.outcome;
      }
    }
    if (!outcome) {
      throw new Error(`${prepared.strategy.id} stream ended without an outcome`);
    }

    const response = buildResponse(request, prepared, outcome);
    yield { status: "complete", response };
    // Only a consumer that took the complete event gets the turn remembered.
    remember(request, response);
  }

  return {
    process(request) {
      return admission.run(async () => {
        const prepared = await prepare(request, providers.current().strategy);
        const outcome = await prepared.strategy.complete(prepared.input);
        const response = buildResponse(request, prepared, outcome);
        remember(request, response);
        return response;
      });
    },

    processStream(request) {
      return admission.guard(() => streamAnswer(request));
    },
  };
}
