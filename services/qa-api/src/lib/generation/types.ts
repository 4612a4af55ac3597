import type { AnswerLanguage, ChatMessage, Evidence, MemoryHit } from "../../types.js";

export type ProviderId = "template" | "openai" | "siliconflow" | "gemini";

export type HostedProviderId = Exclude<ProviderId, "template">;

export type GenerationInput = {
  question: string;
  history: ChatMessage[];
  entities: string[];
  // Graph rendering or path fallback; empty when the graph contributed nothing.
  graphContext: string;
  memories: MemoryHit[];
  evidence: Evidence[];
  supplement?: string;
  language: AnswerLanguage;
};

export type FallbackReason = "timeout" | "transport_error";

export type GenerationOutcome =
  | {
      kind: "completed";
      text: string;
      strategyId: ProviderId;
      model: string;
    }
  | {
      kind: "fallback";
      reason: FallbackReason;
      text: string;
      strategyId: "template";
      model: string;
      error: string;
    };

export type GenerationChunk =
  | { type: "fragment"; text: string }
  | { type: "done"; outcome: GenerationOutcome };

export type GenerationStrategy = {
  readonly id: ProviderId;
  readonly modelName: string;
  readonly displayName: string;
  complete(input: GenerationInput): Promise<GenerationOutcome>;
  stream(input: GenerationInput): AsyncGenerator<GenerationChunk>;
};

export type PromptMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export function hasGraphContext(input: GenerationInput): boolean {
  return input.graphContext.trim().length > 0;
}
