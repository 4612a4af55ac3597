import { setTimeout as sleep } from "node:timers/promises";

import type { CannedTopic } from "../data-files.js";
import type { GenerationChunk, GenerationInput, GenerationOutcome, GenerationStrategy } from "./types.js";
import { hasGraphContext } from "./types.js";

export const TEMPLATE_MODEL = "mock-llm";

export const TEMPLATE_NOTICE = "\n\n---\n📚 **提示**：本回答基于医疗知识图谱生成，未使用AI大模型。\n";

const REFERENCE_DISCLAIMER =
  "⚠️ **重要提示**：以上信息仅供参考，不能替代专业医生的诊断和治疗建议。如有身体不适，请及时就医。";

export type TemplateStrategy = GenerationStrategy & {
  render(input: GenerationInput): string;
  spell(text: string): AsyncGenerator<GenerationChunk>;
};

export type TemplateStrategyOptions = {
  cannedTopics: CannedTopic[];
  charDelayMs: number;
};

export function renderGraphAnswer(graphContext: string): string {
  return (
    `## 关于您的问题\n\n根据医疗知识库的信息，为您提供以下参考：\n\n${graphContext}\n` +
    TEMPLATE_NOTICE +
    REFERENCE_DISCLAIMER
  );
}

export function matchCannedTopic(question: string, topics: CannedTopic[]): CannedTopic | null {
  return topics.find((topic) => topic.keywords.some((keyword) => question.includes(keyword))) ?? null;
}

export function renderGenericAnswer(input: GenerationInput): string {
  const subject = input.entities.length > 0 ? input.entities.join(", ") : "您所询问内容";
  const references = input.evidence
    .slice(0, 3)
    .map((item, index) => `${index + 1}. ${item.section ?? "医学文献"} [来源: ${item.source}]`);
  const referenceBlock = references.length > 0 ? `\n### 相关参考资料\n${references.join("\n")}\n` : "";

  return `## 关于您的问题

感谢您的咨询。

目前知识库中暂无关于"${subject}"的详细信息。

**建议**：
1. 尝试使用更具体的医学术语进行查询
2. 如有身体不适，请及时前往医院就诊
3. 可以咨询专业医生获取准确的诊断和治疗建议
${referenceBlock}
⚠️ 本系统仅供医疗信息参考，不能替代专业医生的诊断和治疗建议。`;
}

export function createTemplateStrategy(options: TemplateStrategyOptions): TemplateStrategy {
  function render(input: GenerationInput): string {
    if (hasGraphContext(input)) {
      return renderGraphAnswer(input.graphContext);
    }
    const topic = matchCannedTopic(input.question, options.cannedTopics);
    if (topic) {
      return topic.answer + TEMPLATE_NOTICE;
    }
    return renderGenericAnswer(input) + TEMPLATE_NOTICE;
  }

  async function* spell(text: string): AsyncGenerator<GenerationChunk> {
    for (const char of Array.from(text)) {
      if (options.charDelayMs > 0) {
        await sleep(options.charDelayMs);
      }
      yield { type: "fragment", text: char };
    }
  }

  function outcome(input: GenerationInput): GenerationOutcome {
    return { kind: "completed", text: render(input), strategyId: "template", model: TEMPLATE_MODEL };
  }

  return {
    id: "template",
    modelName: TEMPLATE_MODEL,
    displayName: "模板回复",
    render,
    spell,

    async complete(input) {
      return outcome(input);
    },

    async *stream(input) {
      const done = outcome(input);
      yield* spell(done.text);
      yield { type: "done", outcome: done };
    },
  };
}
