import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";

import type { ProviderTransport } from "./hosted.js";
import type { PromptMessage } from "./types.js";

export type OpenAICompatibleSettings = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
};

function toChatMessages(messages: PromptMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      default:
        return { role: "user", content: message.content };
    }
  });
}

// OpenAI and SiliconFlow share the chat completions wire format; only the base URL differs.
export function createOpenAICompatibleTransport(settings: OpenAICompatibleSettings): ProviderTransport {
  const client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl, maxRetries: 0 });
  const temperature = settings.temperature ?? 0.3;
  const maxTokens = settings.maxTokens ?? 2000;

  return {
    async complete(messages, signal) {
      const response = await client.chat.completions.create(
        {
          model: settings.model,
          messages: toChatMessages(messages),
          temperature,
          max_tokens: maxTokens,
        },
        { signal },
      );
      return response.choices[0]?.message?.content ?? "";
    },

    async *stream(messages, signal) {
      const stream = await client.chat.completions.create(
        {
          model: settings.model,
          messages: toChatMessages(messages),
          temperature,
          max_tokens: maxTokens,
          stream: true,
        },
        { signal },
      );
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    },
  };
}
