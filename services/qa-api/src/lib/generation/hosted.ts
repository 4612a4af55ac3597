import { errorMessage, type Logger } from "../logger.js";
import { buildPromptMessages } from "./prompts.js";
import type { TemplateStrategy } from "./template.js";
import type {
  FallbackReason,
  GenerationChunk,
  GenerationInput,
  GenerationOutcome,
  GenerationStrategy,
  HostedProviderId,
  PromptMessage,
} from "./types.js";
import { hasGraphContext } from "./types.js";

// Wire access to one hosted model. Both calls must honour the abort signal.
export type ProviderTransport = {
  complete(messages: PromptMessage[], signal: AbortSignal): Promise<string>;
  stream(messages: PromptMessage[], signal: AbortSignal): AsyncIterable<string>;
};

export type HostedStrategy = GenerationStrategy & {
  readonly id: HostedProviderId;
  ping(): Promise<string>;
};

export type HostedStrategyOptions = {
  id: HostedProviderId;
  modelName: string;
  displayName: string;
  transport: ProviderTransport;
  fallback: TemplateStrategy;
  timeoutMs: number;
  logger: Logger;
};

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function ungroundedNotice(displayName: string): string {
  return `

---
🤖 **来源说明**：知识图谱中未找到相关信息，本回答由 AI 大模型（${displayName}）基于通用医学知识生成。
⚠️ **重要提示**：AI 生成内容仅供参考，可能存在误差，请以专业医生诊断为准。如有身体不适，请及时就医。`;
}

export function createHostedStrategy(options: HostedStrategyOptions): HostedStrategy {
  const { transport, fallback, timeoutMs, logger } = options;
  const label = `${options.id} generation`;

  function degrade(input: GenerationInput, error: unknown): Extract<GenerationOutcome, { kind: "fallback" }> {
    const reason: FallbackReason = error instanceof TimeoutError ? "timeout" : "transport_error";
    if (reason === "timeout") {
      logger.warn({ provider: options.id, timeoutMs }, "provider call timed out, using template answer");
    } else {
      logger.error({ provider: options.id, err: errorMessage(error) }, "provider call failed, using template answer");
    }
    return {
      kind: "fallback",
      reason,
      text: fallback.render(input),
      strategyId: "template",
      model: fallback.modelName,
      error: errorMessage(error),
    };
  }

  function finish(input: GenerationInput, text: string): string {
    return hasGraphContext(input) ? text : text + ungroundedNotice(options.displayName);
  }

  function release(iterator: AsyncIterator<string>): void {
    if (!iterator.return) {
      return;
    }
    iterator.return().catch((error: unknown) => {
      logger.debug({ provider: options.id, err: errorMessage(error) }, "provider stream closed with error");
    });
  }

  return {
    id: options.id,
    modelName: options.modelName,
    displayName: options.displayName,

    async complete(input) {
      const messages = buildPromptMessages(input);
      try {
        const text = await withTimeout((signal) => transport.complete(messages, signal), timeoutMs, label);
        if (!text.trim()) {
          throw new Error("provider returned an empty completion");
        }
        return { kind: "completed", text: finish(input, text), strategyId: options.id, model: options.modelName };
      } catch (error) {
        return degrade(input, error);
      }
    },

    async *stream(input): AsyncGenerator<GenerationChunk> {
      const messages = buildPromptMessages(input);
      const controller = new AbortController();
      const iterator = transport.stream(messages, controller.signal)[Symbol.asyncIterator]();

      // Each fragment, not only the first, must arrive within the timeout.
      const next = () => withTimeout(() => iterator.next(), timeoutMs, label);

      let text = "";
      let failure: { error: unknown } | null = null;
      let finished = false;
      try {
        for (let step = await next(); !step.done; step = await next()) {
          if (step.value) {
            text += step.value;
            yield { type: "fragment", text: step.value };
          }
        }
        finished = true;
      } catch (error) {
        failure = { error };
      } finally {
        if (!finished) {
          controller.abort();
          release(iterator);
        }
      }

      if (failure) {
        if (text) {
          logger.warn({ provider: options.id, err: errorMessage(failure.error) }, "provider stream failed after partial output");
        }
        const outcome = degrade(input, failure.error);
        yield* fallback.spell(outcome.text);
        yield { type: "done", outcome };
        return;
      }

      if (!text.trim()) {
        const outcome = degrade(input, new Error("provider returned an empty stream"));
        yield* fallback.spell(outcome.text);
        yield { type: "done", outcome };
        return;
      }

      const completed = finish(input, text);
      if (completed !== text) {
        yield { type: "fragment", text: completed.slice(text.length) };
      }
      yield { type: "done", outcome: { kind: "completed", text: completed, strategyId: options.id, model: options.modelName } };
    },

    async ping() {
      return withTimeout(
        (signal) => transport.complete([{ role: "user", content: "你好" }], signal),
        timeoutMs,
        `${options.id} connection test`,
      );
    },
  };
}
