import assert from "node:assert/strict";
import test from "node:test";

import { createAdmissionController } from "../src/lib/admission.js";
import { createContextAssembler } from "../src/lib/context-assembler.js";
import { createEntityResolver } from "../src/lib/entity-resolver.js";
import { createHostedStrategy, ungroundedNotice, type ProviderTransport } from "../src/lib/generation/hosted.js";
import { createProviderRegistry, type StrategyFactory } from "../src/lib/generation/registry.js";
import { createTemplateStrategy, renderGraphAnswer, TEMPLATE_NOTICE } from "../src/lib/generation/template.js";
import { createSilentLogger } from "../src/lib/logger.js";
import { createInMemoryPassageStore } from "../src/lib/passage-store.js";
import { confidenceScore, createQaService, DISCLAIMER, WARNINGS } from "../src/lib/qa-service.js";
import type { QueryRequest, StreamEvent } from "../src/types.js";
import {
  createFakeGraphStore,
  createFakeMemoryStore,
  SAMPLE_DISEASES,
  sampleData,
  testConfig,
  type FakeGraphStore,
  type FakeMemoryStore,
} from "./helpers/fakes.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

type Harness = {
  graph?: FakeGraphStore;
  memory?: FakeMemoryStore;
  transport?: ProviderTransport;
  hostedAtStartup?: boolean;
};

function buildService(options: Harness = {}) {
  const logger = createSilentLogger();
  const data = sampleData();
  const graph = options.graph ?? createFakeGraphStore(SAMPLE_DISEASES);
  const memory = options.memory ?? createFakeMemoryStore();
  const resolver = createEntityResolver({ graph, lexicon: data.lexicon, logger });
  const template = createTemplateStrategy({ cannedTopics: data.cannedTopics, charDelayMs: 0 });
  const transport = options.transport;
  const factory: StrategyFactory | undefined = transport
    ? (provider, settings) =>
        createHostedStrategy({
          id: provider,
          modelName: settings.model,
          displayName: "GPT-4",
          transport,
          fallback: template,
          timeoutMs: 50,
          logger,
        })
    : undefined;
  const llm = testConfig().llm;
  const providers = createProviderRegistry({
    config: options.hostedAtStartup ? { ...llm, provider: "openai", openai: { apiKey: "test-secret", model: "gpt-4" } } : llm,
    template,
    logger,
    factory,
  });
  const admission = createAdmissionController(2);
  const assembler = createContextAssembler({
    graph,
    passages: createInMemoryPassageStore(data.passages),
    memory,
    resolver,
    logger,
  });
  const qa = createQaService({ resolver, assembler, graph, providers, memory, admission, logger });
  return { qa, graph, memory, providers, admission };
}

function request(overrides: Partial<QueryRequest> = {}): QueryRequest {
  return {
    query: "偏头痛怎么办",
    max_answers: 3,
    include_kg_paths: true,
    include_evidence: true,
    language: "zh",
    ...overrides,
  };
}

async function drain(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const collected: StreamEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

function contentOf(events: StreamEvent[]): string {
  return events.flatMap((event) => (event.status === "content" ? [event.text] : [])).join("");
}

function completionOf(events: StreamEvent[]) {
  const last = events.at(-1);
  assert.equal(last?.status, "complete");
  if (last?.status !== "complete") {
    throw new Error("stream did not complete");
  }
  return last.response;
}

test("a grounded template answer frames the graph context", async () => {
  const { qa } = buildService();

  const response = await qa.process(request());

  assert.match(response.query_id, /^q_[0-9a-f]{12}$/);
  assert.equal(response.answer_source, "knowledge_graph");
  assert.equal(response.model_used, "mock-llm");
  assert.ok(response.answer.startsWith("## 关于您的问题"));
  assert.ok(response.answer.includes("【偏头痛】\n简介：反复发作的单侧搏动性头痛"));
  assert.deepEqual(
    response.evidence.map((item) => item.source),
    ["头痛诊疗共识摘要"],
  );
  assert.equal(response.confidence_score, 0.9);
  assert.equal(response.kg_paths.length, 1);
  assert.deepEqual(response.warnings, []);
  assert.equal(response.disclaimer, DISCLAIMER);
});

test("an ungrounded template answer uses a canned topic and warns", async () => {
  const { qa } = buildService();

  const response = await qa.process(request({ query: "血糖高怎么办" }));

  assert.equal(response.answer_source, "template");
  assert.equal(response.answer, `## 糖尿病\n控制饮食。${TEMPLATE_NOTICE}`);
  assert.deepEqual(response.evidence, []);
  assert.deepEqual(response.kg_paths, []);
  assert.equal(response.confidence_score, 0.7);
  assert.deepEqual(response.warnings, [WARNINGS.noEvidence, WARNINGS.noGraphContext]);
});

test("a hosted answer is mixed when grounded and llm_only otherwise", async () => {
  const { qa } = buildService({
    hostedAtStartup: true,
    transport: {
      complete: async () => "模型回答",
      stream: async function* () {
        yield "模型回答";
      },
    },
  });

  const grounded = await qa.process(request());
  const ungrounded = await qa.process(request({ query: "血糖高怎么办" }));

  assert.equal(grounded.answer_source, "mixed");
  assert.equal(grounded.answer, "模型回答");
  assert.equal(grounded.model_used, "gpt-4");
  assert.equal(ungrounded.answer_source, "llm_only");
  assert.equal(ungrounded.answer, `模型回答${ungroundedNotice("GPT-4")}`);
});

test("a failing provider degrades to the template and says so", async () => {
  const { qa } = buildService({
    hostedAtStartup: true,
    transport: {
      complete: async () => {
        throw new Error("502 bad gateway");
      },
      stream: async function* () {
        throw new Error("502 bad gateway");
      },
    },
  });

  const response = await qa.process(request());

  assert.equal(response.answer_source, "knowledge_graph");
  assert.equal(response.model_used, "mock-llm");
  assert.ok(response.answer.startsWith("## 关于您的问题"));
  assert.deepEqual(response.warnings, [WARNINGS.transportError]);
});

test("a disconnected graph still answers from lexicon terms and passages", async () => {
  const graph = createFakeGraphStore(SAMPLE_DISEASES, { connected: false });
  const { qa } = buildService({ graph });

  const response = await qa.process(request());

  assert.equal(response.answer_source, "template");
  assert.equal(response.answer, `## 头痛\n头痛的常见原因。${TEMPLATE_NOTICE}`);
  assert.deepEqual(response.kg_paths, []);
  assert.equal(response.evidence.length, 1);
  assert.deepEqual(response.warnings, [WARNINGS.noGraphContext, WARNINGS.graphDisconnected]);
});

test("a symptom with a duration is grounded through the disease it points to", async () => {
  const { qa } = buildService();

  const response = await qa.process(request({ query: "头痛两天了" }));

  assert.equal(response.answer_source, "knowledge_graph");
  assert.ok(response.answer.includes("【偏头痛】"));
  assert.deepEqual(
    response.evidence.map((item) => item.source),
    ["头痛诊疗共识摘要"],
  );
  assert.equal(response.confidence_score, 0.9);
  assert.deepEqual(response.warnings, []);
});

test("a disconnected graph and a timed-out provider still yield a template answer", async () => {
  const graph = createFakeGraphStore(SAMPLE_DISEASES, { connected: false });
  const { qa } = buildService({
    graph,
    hostedAtStartup: true,
    transport: {
      complete: (_messages, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
      stream: async function* () {
        yield "unused";
      },
    },
  });

  const response = await qa.process(request());

  assert.equal(response.answer_source, "template");
  assert.equal(response.answer, `## 头痛\n头痛的常见原因。${TEMPLATE_NOTICE}`);
  assert.equal(response.model_used, "mock-llm");
  assert.deepEqual(response.warnings, [WARNINGS.noGraphContext, WARNINGS.graphDisconnected, WARNINGS.timeout]);
});

test("evidence is cut to max_answers while confidence covers all of it", async () => {
  const { qa } = buildService();

  const response = await qa.process(request({ query: "偏头痛和流感", max_answers: 1 }));

  assert.deepEqual(
    response.evidence.map((item) => item.source),
    ["头痛诊疗共识摘要"],
  );
  assert.equal(response.confidence_score, 0.8);
});

test("switches turn off paths and evidence", async () => {
  const { qa } = buildService();

  const response = await qa.process(request({ include_kg_paths: false, include_evidence: false }));

  assert.deepEqual(response.kg_paths, []);
  assert.deepEqual(response.evidence, []);
  assert.equal(response.answer_source, "knowledge_graph");
  assert.deepEqual(response.warnings, [WARNINGS.noEvidence]);
});

test("answers are remembered only for a known user", async () => {
  const { qa, memory } = buildService();

  await qa.process(request({ query: "血糖高怎么办" }));
  assert.deepEqual(memory.writes, []);

  const response = await qa.process(request({ query: "血糖高怎么办", user_id: "u1" }));
  assert.deepEqual(memory.writes, [
    {
      userId: "u1",
      content: `Q: 血糖高怎么办\nA: ${response.answer}`,
      metadata: { query_id: response.query_id },
    },
  ]);
});

test("a failing memory write does not fail the answer", async () => {
  const { qa } = buildService({ memory: createFakeMemoryStore([], { failStore: true }) });

  const response = await qa.process(request({ user_id: "u1" }));
  await flush();

  assert.equal(response.answer_source, "knowledge_graph");
});

test("confidence ignores unscored evidence and defaults without any", () => {
  const base = {
    source: "s",
    source_type: "other" as const,
    snippet: "",
    pmid: null,
    doi: null,
    url: null,
    publication_date: null,
    section: null,
  };

  assert.equal(confidenceScore([]), 0.7);
  assert.equal(confidenceScore([{ ...base, confidence: 0 }]), 0.7);
  assert.equal(confidenceScore([{ ...base, confidence: 0.9 }, { ...base, confidence: 0.6 }, { ...base, confidence: 0 }]), 0.75);
});

test("the stream reports progress, spells the answer and completes", async () => {
  const { qa } = buildService();

  const events = await drain(qa.processStream(request({ query: "偏头痛和流感", max_answers: 1 })));
  const response = completionOf(events);

  assert.deepEqual(events.slice(0, 3), [
    { status: "searching", message: "正在检索知识图谱..." },
    { status: "evidence_found", count: 1 },
    { status: "generating", message: "正在生成回答..." },
  ]);
  assert.ok(events.slice(3, -1).every((event) => event.status === "content"));
  assert.equal(contentOf(events), response.answer);
  assert.equal(response.answer_source, "knowledge_graph");
  assert.equal(response.evidence.length, 1);
});

test("a streamed provider failure spells the template answer", async () => {
  const { qa } = buildService({
    hostedAtStartup: true,
    transport: {
      complete: async () => "unused",
      stream: async function* () {
        throw new Error("401 unauthorized");
      },
    },
  });

  const events = await drain(qa.processStream(request()));
  const response = completionOf(events);

  assert.equal(contentOf(events), response.answer);
  assert.ok(response.answer.startsWith("## 关于您的问题"));
  assert.equal(response.model_used, "mock-llm");
  assert.deepEqual(response.warnings, [WARNINGS.transportError]);
});

test("a stream failing after some text ends with the same answer as the sync path", async () => {
  const { qa } = buildService({
    hostedAtStartup: true,
    transport: {
      complete: async () => {
        throw new Error("connection reset");
      },
      stream: async function* () {
        yield "部分";
        throw new Error("connection reset");
      },
    },
  });

  const events = await drain(qa.processStream(request()));
  const streamed = completionOf(events);
  const synced = await qa.process(request());

  assert.equal(contentOf(events), `部分${streamed.answer}`);
  assert.equal(streamed.answer, synced.answer);
  assert.equal(streamed.answer_source, "knowledge_graph");
  assert.equal(streamed.model_used, "mock-llm");
  assert.deepEqual(streamed.warnings, [WARNINGS.transportError]);
});

test("a stream stalling mid-answer times out and frees its permit", async () => {
  const { qa, admission } = buildService({
    hostedAtStartup: true,
    transport: {
      complete: async () => "unused",
      stream: async function* (_messages, signal) {
        yield "开始";
        yield await new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
      },
    },
  });

  const events = await drain(qa.processStream(request()));
  const response = completionOf(events);
  await flush();

  assert.ok(response.answer.startsWith("## 关于您的问题"));
  assert.equal(response.model_used, "mock-llm");
  assert.deepEqual(response.warnings, [WARNINGS.timeout]);
  assert.equal(admission.active(), 0);
});

test("a streamed answer is remembered only after the complete event is delivered", async () => {
  const { qa, memory } = buildService();
  const stream = qa.processStream(request({ user_id: "u1" }));

  let event = await stream.next();
  while (!event.done && event.value.status !== "complete") {
    assert.deepEqual(memory.writes, []);
    event = await stream.next();
  }
  assert.equal(event.done, false);
  assert.deepEqual<FakeMemoryStore["writes"]>(memory.writes, []);

  assert.equal((await stream.next()).done, true);
  assert.equal(memory.writes.length, 1);
  assert.equal(memory.writes[0]?.userId, "u1");
});

test("a stream closed as the complete event arrives is not remembered", async () => {
  const { qa, memory, admission } = buildService();
  const stream = qa.processStream(request({ user_id: "u1" }));

  let event = await stream.next();
  while (!event.done && event.value.status !== "complete") {
    event = await stream.next();
  }
  await stream.return(undefined);
  await flush();

  assert.deepEqual(memory.writes, []);
  assert.equal(admission.active(), 0);
});

test("a stream closed early neither remembers nor keeps its permit", async () => {
  const { qa, memory, admission } = buildService();
  const stream = qa.processStream(request({ user_id: "u1" }));

  let event = await stream.next();
  while (!event.done && event.value.status !== "content") {
    event = await stream.next();
  }
  assert.equal(admission.active(), 1);
  await stream.return(undefined);
  await flush();

  assert.deepEqual(memory.writes, []);
  assert.equal(admission.active(), 0);
});

test("a stream keeps the provider it started with", async () => {
  const { qa, providers } = buildService({
    transport: {
      complete: async () => "模型回答",
      stream: async function* () {
        yield "模型回答";
      },
    },
  });

  const stream = qa.processStream(request());
  const first = await stream.next();
  await providers.reconfigure({ provider: "openai", api_key: "test-secret" });
  const rest = await drain(stream);

  assert.deepEqual(first, { value: { status: "searching", message: "正在检索知识图谱..." }, done: false });
  assert.equal(completionOf(rest).model_used, "mock-llm");
  assert.equal((await qa.process(request())).model_used, "gpt-4");
});

test("the grounded template answer matches the rendered context", async () => {
  const { qa } = buildService();

  const response = await qa.process(request({ include_kg_paths: false }));

  assert.equal(
    response.answer,
    renderGraphAnswer(
      "\n【偏头痛】\n简介：反复发作的单侧搏动性头痛\n症状：头痛, 畏光\n就诊科室：神经内科\n常用药物：布洛芬\n",
    ),
  );
});
