import type { ChatMessage } from "../../types.js";
import type { GenerationInput, PromptMessage } from "./types.js";
import { hasGraphContext } from "./types.js";

const HISTORY_WINDOW = 6;

const GROUNDED_SYSTEM =
  "你是一个专业、严谨的医疗信息助手。请根据提供的医疗知识图谱信息，为用户提供准确、专业的医疗健康建议。如果有对话历史，请结合上下文理解用户意图。";

const UNGROUNDED_SYSTEM =
  "你是一个专业、严谨的医疗信息助手。请根据你的医学专业知识，为用户提供准确、专业的医疗健康建议。如果有对话历史，请结合上下文理解用户意图。";

const ANSWER_STRUCTURE = `如果用户提问的是医学相关的问题，请提供结构化的回答，包括：
1. 简要回答（概括主要信息）
2. 详细说明（分点列出症状/治疗/预防等相关信息）
3. 就医建议（何时需要就医，看什么科室）
4. 注意事项（饮食、用药等）
否则不用提供结构化回答，简要回答即可。`;

const ENGLISH_INSTRUCTION = "请使用英文回答（Please write the whole answer in English）。";

export function recentHistory(history: ChatMessage[]): ChatMessage[] {
  return history.slice(-HISTORY_WINDOW);
}

function historyBlock(history: ChatMessage[]): string {
  const recent = recentHistory(history);
  if (recent.length === 0) {
    return "";
  }
  const lines = recent.map((message) => `${message.role === "user" ? "用户" : "助手"}：${message.content}`);
  return `\n**对话历史**：\n${lines.join("\n")}\n\n`;
}

function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

export function renderMemories(input: GenerationInput): string {
  if (input.memories.length === 0) {
    return "";
  }
  const lines = input.memories.map((memory) => `- (${roundScore(memory.score)}) ${memory.content}`);
  return `用户历史记忆：\n${lines.join("\n")}\n`;
}

export function renderEvidence(input: GenerationInput): string {
  if (input.evidence.length === 0) {
    return "";
  }
  const lines = input.evidence.slice(0, 5).map((item) => `- [${item.source}] ${item.snippet}`);
  return `医学文献证据：\n${lines.join("\n")}\n`;
}

function supportingBlocks(input: GenerationInput): string {
  const blocks = [renderEvidence(input), renderMemories(input)].filter(Boolean);
  if (input.supplement?.trim()) {
    blocks.push(`补充说明：\n${input.supplement.trim()}\n`);
  }
  return blocks.length > 0 ? `\n**参考资料**：\n${blocks.join("\n")}` : "";
}

function closing(input: GenerationInput): string {
  const language = input.language === "en" ? `\n${ENGLISH_INSTRUCTION}` : "";
  return `\n${ANSWER_STRUCTURE}${language}\n\n回答：`;
}

export function buildGroundedPrompt(input: GenerationInput): string {
  return `你是一个专业的医疗信息助手。请根据提供的医疗知识图谱信息回答用户的问题。

**重要规则**：
1. 优先使用知识图谱中提供的医学信息来回答问题
2. 回答要准确、专业，但表达要通俗易懂
3. 如果知识图谱中有相关信息，请一定据此回答；如果没有，请说明"暂无相关信息"，并给出合理的建议。
4. 始终提醒用户本系统仅供参考，不能替代医生诊断
5. 对于危险信号（如剧烈头痛、高热、意识改变、胸痛），要强调立即就医
6. 如果有对话历史，请结合上下文理解用户的问题（如代词指代、省略的主语等）
7. 一些基本信息你是可以回复的，比如日期等。

**医疗知识图谱信息**：
${input.graphContext}
${supportingBlocks(input)}${historyBlock(input.history)}
**当前用户问题**：
${input.question}
${closing(input)}`;
}

export function buildUngroundedPrompt(input: GenerationInput): string {
  return `你是一个专业的医疗信息助手。

**重要说明**：
当前未找到与用户问题直接相关的资料，请根据你的医学专业知识提供参考建议。

**回答要求**：
1. 回答要准确、专业，但表达要通俗易懂
2. 始终强调本回答仅供参考，不能替代专业医生的诊断和治疗
3. 对于危险信号（如剧烈头痛、高热不退、意识改变、胸痛、呼吸困难等），要强调立即就医
4. 不要提及资料来源或检索过程，直接给出专业建议即可
5. 如果有对话历史，请结合上下文理解用户的问题
${supportingBlocks(input)}${historyBlock(input.history)}
**用户问题**：
${input.question}
${closing(input)}`;
}

// System message, the recent history turns, then the grounded or ungrounded user prompt.
export function buildPromptMessages(input: GenerationInput): PromptMessage[] {
  const grounded = hasGraphContext(input);
  return [
    { role: "system", content: grounded ? GROUNDED_SYSTEM : UNGROUNDED_SYSTEM },
    ...recentHistory(input.history).map((message) => ({ role: message.role, content: message.content })),
    { role: "user", content: grounded ? buildGroundedPrompt(input) : buildUngroundedPrompt(input) },
  ];
}
