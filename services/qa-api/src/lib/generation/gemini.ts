import { z } from "zod";

import { DEFAULT_GEMINI_BASE_URL } from "../../config.js";
import type { ProviderTransport } from "./hosted.js";
import type { PromptMessage } from "./types.js";

export type GeminiSettings = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
};

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      }),
    )
    .default([]),
});

type GeminiContent = {
  role: "user" | "model";
  parts: Array<{ text: string }>;
};

export function buildGeminiBody(messages: PromptMessage[]) {
  const system = messages
    .filter((message) => message.role === "system")
    .map((message) => message.content)
    .join("\n\n");
  const contents: GeminiContent[] = messages
    .filter((message) => message.role !== "system")
    .map((message) => ({
      role: message.role === "assistant" ? "model" : "user",
      parts: [{ text: message.content }],
    }));

  return {
    ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
    contents,
    generationConfig: {
      temperature: 0.3,
      maxOutputTokens: 2000,
    },
  };
}

export function extractGeminiText(payload: unknown): string {
  const parsed = GeminiResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`unexpected gemini response: ${parsed.error.message}`);
  }
  const [candidate] = parsed.data.candidates;
  return (candidate?.content?.parts ?? []).map((part) => part.text ?? "").join("");
}

// Yields the JSON payload of every `data:` line of a server-sent event body.
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  try {
    for (;;) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = done ? "" : lines.pop() ?? "";
      for (const line of lines) {
        if (line.startsWith("data:")) {
          const data = line.slice(5).trim();
          if (data && data !== "[DONE]") {
            yield data;
          }
        }
      }
      if (done) {
        return;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

export function createGeminiTransport(settings: GeminiSettings): ProviderTransport {
  const fetchImpl = settings.fetchImpl ?? fetch;
  const baseUrl = (settings.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, "");
  const endpoint = (method: string) => `${baseUrl}/models/${encodeURIComponent(settings.model)}:${method}`;

  async function post(url: string, messages: PromptMessage[], signal: AbortSignal): Promise<Response> {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-api-key": settings.apiKey,
      },
      body: JSON.stringify(buildGeminiBody(messages)),
      signal,
    });
    if (!response.ok) {
      throw new Error(`gemini request failed: ${response.status}`);
    }
    return response;
  }

  return {
    async complete(messages, signal) {
      const response = await post(endpoint("generateContent"), messages, signal);
      const payload: unknown = await response.json();
      return extractGeminiText(payload);
    },

    async *stream(messages, signal) {
      const response = await post(`${endpoint("streamGenerateContent")}?alt=sse`, messages, signal);
      if (!response.body) {
        throw new Error("gemini stream has no body");
      }
      for await (const data of readSseData(response.body)) {
        const text = extractGeminiText(JSON.parse(data));
        if (text) {
          yield text;
        }
      }
    },
  };
}
