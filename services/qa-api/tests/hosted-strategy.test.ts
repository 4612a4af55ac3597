import assert from "node:assert/strict";
import test from "node:test";

import { createHostedStrategy, ungroundedNotice, type ProviderTransport } from "../src/lib/generation/hosted.js";
import { createTemplateStrategy } from "../src/lib/generation/template.js";
import type { GenerationChunk, GenerationInput, PromptMessage } from "../src/lib/generation/types.js";
import { createSilentLogger } from "../src/lib/logger.js";
import { sampleData } from "./helpers/fakes.js";

const template = createTemplateStrategy({ cannedTopics: sampleData().cannedTopics, charDelayMs: 0 });

function input(overrides: Partial<GenerationInput> = {}): GenerationInput {
  return {
    question: "偏头痛怎么办",
    history: [],
    entities: ["偏头痛"],
    graphContext: "\n【偏头痛】\n简介：反复发作的单侧搏动性头痛\n",
    memories: [],
    evidence: [],
    language: "zh",
    ...overrides,
  };
}

function transport(overrides: Partial<ProviderTransport>): ProviderTransport {
  return {
    complete: overrides.complete ?? (async () => "ok"),
    stream:
      overrides.stream ??
      async function* () {
        yield "ok";
      },
  };
}

function hosted(providerTransport: ProviderTransport, timeoutMs = 50) {
  return createHostedStrategy({
    id: "openai",
    modelName: "gpt-4",
    displayName: "GPT-4",
    transport: providerTransport,
    fallback: template,
    timeoutMs,
    logger: createSilentLogger(),
  });
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

async function collect(chunks: AsyncIterable<GenerationChunk>): Promise<GenerationChunk[]> {
  const collected: GenerationChunk[] = [];
  for await (const chunk of chunks) {
    collected.push(chunk);
  }
  return collected;
}

function fragmentsOf(chunks: GenerationChunk[]): string[] {
  return chunks.flatMap((chunk) => (chunk.type === "fragment" ? [chunk.text] : []));
}

function outcomeOf(chunks: GenerationChunk[]) {
  const last = chunks.at(-1);
  assert.equal(last?.type, "done");
  return last?.type === "done" ? last.outcome : null;
}

test("a grounded completion is returned as is", async () => {
  let sent: PromptMessage[] = [];
  const strategy = hosted(
    transport({
      complete: async (messages) => {
        sent = messages;
        return "根据资料回答";
      },
    }),
  );

  const outcome = await strategy.complete(input());

  assert.deepEqual(outcome, { kind: "completed", text: "根据资料回答", strategyId: "openai", model: "gpt-4" });
  assert.equal(sent[0]?.role, "system");
  assert.equal(sent.at(-1)?.role, "user");
  assert.ok(sent.at(-1)?.content.includes("**医疗知识图谱信息**：\n\n【偏头痛】"));
});

test("the ungrounded prompt never names the knowledge graph", async () => {
  let sent: PromptMessage[] = [];
  const strategy = hosted(
    transport({
      complete: async (messages) => {
        sent = messages;
        return "通用回答";
      },
    }),
  );

  await strategy.complete(input({ graphContext: "" }));

  assert.equal(sent.length, 2);
  assert.deepEqual(
    sent.filter((message) => message.content.includes("知识图谱")),
    [],
  );
});

test("an ungrounded completion carries the general-knowledge notice", async () => {
  const strategy = hosted(transport({ complete: async () => "通用回答" }));

  const outcome = await strategy.complete(input({ graphContext: "" }));

  assert.equal(outcome.text, `通用回答${ungroundedNotice("GPT-4")}`);
  assert.equal(outcome.strategyId, "openai");
});

test("a transport failure degrades to the template answer", async () => {
  const strategy = hosted(
    transport({
      complete: async () => {
        throw new Error("boom");
      },
    }),
  );
  const request = input();

  assert.deepEqual(await strategy.complete(request), {
    kind: "fallback",
    reason: "transport_error",
    text: template.render(request),
    strategyId: "template",
    model: "mock-llm",
    error: "boom",
  });
});

test("an empty completion counts as a transport failure", async () => {
  const strategy = hosted(transport({ complete: async () => "  " }));

  const outcome = await strategy.complete(input());

  assert.equal(outcome.kind, "fallback");
  if (outcome.kind === "fallback") {
    assert.equal(outcome.reason, "transport_error");
    assert.equal(outcome.error, "provider returned an empty completion");
  }
});

test("a slow completion times out, aborts the call and degrades", async () => {
  const seen: { signal?: AbortSignal } = {};
  const strategy = hosted(
    transport({
      complete: (_messages, signal) => {
        seen.signal = signal;
        return untilAborted(signal);
      },
    }),
    20,
  );

  const outcome = await strategy.complete(input());

  assert.equal(outcome.kind, "fallback");
  if (outcome.kind === "fallback") {
    assert.equal(outcome.reason, "timeout");
    assert.equal(outcome.error, "openai generation timed out after 20ms");
  }
  assert.equal(seen.signal?.aborted, true);
});

test("stream forwards provider fragments in order", async () => {
  const strategy = hosted(
    transport({
      stream: async function* () {
        yield "你";
        yield "好";
      },
    }),
  );

  const chunks = await collect(strategy.stream(input()));

  assert.deepEqual(fragmentsOf(chunks), ["你", "好"]);
  assert.deepEqual(outcomeOf(chunks), { kind: "completed", text: "你好", strategyId: "openai", model: "gpt-4" });
});

test("an ungrounded stream ends with the notice as its last fragment", async () => {
  const strategy = hosted(
    transport({
      stream: async function* () {
        yield "答";
      },
    }),
  );

  const chunks = await collect(strategy.stream(input({ graphContext: "" })));

  assert.deepEqual(fragmentsOf(chunks), ["答", ungroundedNotice("GPT-4")]);
  assert.equal(outcomeOf(chunks)?.text, `答${ungroundedNotice("GPT-4")}`);
});

test("a stream failing before its first fragment spells the template answer", async () => {
  const strategy = hosted(
    transport({
      stream: async function* () {
        throw new Error("401 unauthorized");
      },
    }),
  );
  const request = input();

  const chunks = await collect(strategy.stream(request));
  const outcome = outcomeOf(chunks);

  assert.equal(fragmentsOf(chunks).join(""), template.render(request));
  assert.equal(outcome?.kind, "fallback");
  assert.equal(outcome?.strategyId, "template");
  assert.equal(outcome?.model, "mock-llm");
});

test("waiting for the first fragment is bounded by the timeout", async () => {
  const seen: { signal?: AbortSignal } = {};
  const strategy = hosted(
    transport({
      stream: async function* (_messages, signal) {
        seen.signal = signal;
        yield await untilAborted(signal);
      },
    }),
    20,
  );

  const chunks = await collect(strategy.stream(input()));
  const outcome = outcomeOf(chunks);

  assert.equal(outcome?.kind, "fallback");
  if (outcome?.kind === "fallback") {
    assert.equal(outcome.reason, "timeout");
  }
  assert.equal(seen.signal?.aborted, true);
});

test("a stream failing after some text degrades to the template answer", async () => {
  const strategy = hosted(
    transport({
      stream: async function* () {
        yield "部分";
        throw new Error("connection reset");
      },
    }),
  );
  const request = input();

  const chunks = await collect(strategy.stream(request));

  assert.equal(fragmentsOf(chunks).join(""), `部分${template.render(request)}`);
  assert.deepEqual(outcomeOf(chunks), {
    kind: "fallback",
    reason: "transport_error",
    text: template.render(request),
    strategyId: "template",
    model: "mock-llm",
    error: "connection reset",
  });
});

test("a stream stalling after its first fragment times out and degrades", async () => {
  const seen: { signal?: AbortSignal } = {};
  const strategy = hosted(
    transport({
      stream: async function* (_messages, signal) {
        seen.signal = signal;
        yield "开始";
        yield await untilAborted(signal);
      },
    }),
    20,
  );
  const request = input();

  const chunks = await collect(strategy.stream(request));

  assert.equal(fragmentsOf(chunks)[0], "开始");
  assert.deepEqual(outcomeOf(chunks), {
    kind: "fallback",
    reason: "timeout",
    text: template.render(request),
    strategyId: "template",
    model: "mock-llm",
    error: "openai generation timed out after 20ms",
  });
  assert.equal(seen.signal?.aborted, true);
});

test("returning the stream early aborts the provider call", async () => {
  const seen: { signal?: AbortSignal } = {};
  const strategy = hosted(
    transport({
      stream: async function* (_messages, signal) {
        seen.signal = signal;
        yield "a";
        yield "b";
      },
    }),
  );

  const stream = strategy.stream(input());
  const first = await stream.next();
  await stream.return(undefined);

  assert.deepEqual(first.value, { type: "fragment", text: "a" });
  assert.equal(seen.signal?.aborted, true);
});

test("ping sends a short greeting", async () => {
  let sent: PromptMessage[] = [];
  const strategy = hosted(
    transport({
      complete: async (messages) => {
        sent = messages;
        return "pong";
      },
    }),
  );

  assert.equal(await strategy.ping(), "pong");
  assert.deepEqual(sent, [{ role: "user", content: "你好" }]);
});
