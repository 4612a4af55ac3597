import { DEFAULT_SILICONFLOW_BASE_URL, type HostedProviderSettings, type LlmConfig } from "../../config.js";
import { errorMessage, type Logger } from "../logger.js";
import { createGeminiTransport } from "./gemini.js";
import { createHostedStrategy, type HostedStrategy } from "./hosted.js";
import { createOpenAICompatibleTransport } from "./openai-compatible.js";
import type { TemplateStrategy } from "./template.js";
import type { GenerationStrategy, HostedProviderId, ProviderId } from "./types.js";

export type ProviderSnapshot = {
  readonly provider: ProviderId;
  readonly strategy: GenerationStrategy;
  readonly version: number;
};

export type ProviderUpdate = {
  provider: ProviderId;
  api_key?: string;
  model?: string;
  base_url?: string;
};

export type ProviderStatus = {
  current_provider: ProviderId;
  current_model: string;
  available_providers: ProviderDescriptor[];
  has_api_key: Record<ProviderId, boolean>;
};

export type ProviderDescriptor = {
  id: ProviderId;
  name: string;
  description: string;
  models: Array<{ id: string; name: string }>;
  base_url?: string;
  requires_key: boolean;
};

export type ConnectionTestResult = {
  success: boolean;
  message: string;
  response?: string;
};

export type StrategyFactory = (provider: HostedProviderId, settings: HostedProviderSettings & { apiKey: string }) => HostedStrategy;

export type ProviderRegistry = {
  current(): ProviderSnapshot;
  reconfigure(update: ProviderUpdate): Promise<ProviderSnapshot>;
  status(): ProviderStatus;
  testConnection(update: ProviderUpdate): Promise<ConnectionTestResult>;
};

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderConfigError";
  }
}

export const PROVIDER_DESCRIPTORS: ProviderDescriptor[] = [
  {
    id: "siliconflow",
    name: "硅基流动 (SiliconFlow)",
    description: "支持 DeepSeek、Qwen 等模型",
    models: [
      { id: "deepseek-ai/DeepSeek-V3.2", name: "DeepSeek-V3.2 (快速)" },
      { id: "deepseek-ai/DeepSeek-R1", name: "DeepSeek-R1 (深度思考)" },
      { id: "Qwen/Qwen3-VL-32B-Instruct", name: "Qwen3-VL-32B (指令)" },
    ],
    base_url: DEFAULT_SILICONFLOW_BASE_URL,
    requires_key: true,
  },
  {
    id: "gemini",
    name: "Google Gemini",
    description: "Google 的 Gemini 模型",
    models: [{ id: "gemini-1.5-flash", name: "Gemini 1.5 Flash" }],
    requires_key: true,
  },
  {
    id: "openai",
    name: "OpenAI",
    description: "OpenAI GPT 系列模型",
    models: [
      { id: "gpt-4", name: "GPT-4" },
      { id: "gpt-3.5-turbo", name: "GPT-3.5 Turbo" },
    ],
    requires_key: true,
  },
  {
    id: "template",
    name: "知识图谱模式",
    description: "直接使用知识图谱数据回答，无需 API Key",
    models: [{ id: "knowledge-graph", name: "知识图谱直接回答" }],
    requires_key: false,
  },
];

const PROVIDER_LABELS: Record<HostedProviderId, string> = {
  openai: "OpenAI",
  siliconflow: "硅基流动",
  gemini: "Google Gemini",
};

export type ProviderRegistryOptions = {
  config: LlmConfig;
  template: TemplateStrategy;
  logger: Logger;
  factory?: StrategyFactory;
};

function displayNameFor(provider: HostedProviderId, model: string): string {
  switch (provider) {
    case "openai":
      return model === "gpt-4" ? "GPT-4" : model;
    case "gemini":
      return "Gemini";
    default:
      return model;
  }
}

export function createProviderRegistry(options: ProviderRegistryOptions): ProviderRegistry {
  const { template, logger } = options;
  const settings: Record<HostedProviderId, HostedProviderSettings> = {
    openai: { ...options.config.openai },
    siliconflow: { ...options.config.siliconflow },
    gemini: { ...options.config.gemini },
  };

  const factory: StrategyFactory =
    options.factory ??
    ((provider, resolved) =>
      createHostedStrategy({
        id: provider,
        modelName: resolved.model,
        displayName: displayNameFor(provider, resolved.model),
        transport:
          provider === "gemini"
            ? createGeminiTransport({ apiKey: resolved.apiKey, model: resolved.model, baseUrl: resolved.baseUrl })
            : createOpenAICompatibleTransport({
                apiKey: resolved.apiKey,
                model: resolved.model,
                baseUrl: resolved.baseUrl,
              }),
        fallback: template,
        timeoutMs: options.config.timeoutMs,
        logger,
      }));

  // Explicit values win, then the stored settings of that provider.
  function merge(provider: HostedProviderId, update: ProviderUpdate): HostedProviderSettings {
    const stored = settings[provider];
    return {
      apiKey: update.api_key ?? stored.apiKey,
      model: update.model ?? stored.model,
      baseUrl: update.base_url ?? stored.baseUrl,
    };
  }

  function build(provider: ProviderId, update: ProviderUpdate): { strategy: GenerationStrategy; resolved?: HostedProviderSettings } {
    if (provider === "template") {
      return { strategy: template };
    }
    const resolved = merge(provider, update);
    const apiKey = resolved.apiKey;
    if (!apiKey) {
      throw new ProviderConfigError(`${PROVIDER_LABELS[provider]} 需要提供 API Key`);
    }
    return { strategy: factory(provider, { ...resolved, apiKey }), resolved };
  }

  function initial(): ProviderSnapshot {
    const provider = options.config.provider;
    try {
      return { provider, strategy: build(provider, { provider }).strategy, version: 1 };
    } catch (error) {
      logger.warn({ provider, err: errorMessage(error) }, "provider not configured, using template answers");
      return { provider: "template", strategy: template, version: 1 };
    }
  }

  let snapshot = initial();
  let writes: Promise<unknown> = Promise.resolve();

  function apply(update: ProviderUpdate): ProviderSnapshot {
    const { strategy, resolved } = build(update.provider, update);
    if (update.provider !== "template" && resolved) {
      settings[update.provider] = resolved;
    }
    snapshot = { provider: update.provider, strategy, version: snapshot.version + 1 };
    logger.info({ provider: snapshot.provider, model: strategy.modelName }, "generation provider switched");
    return snapshot;
  }

  return {
    current() {
      return snapshot;
    },

    reconfigure(update) {
      const next = writes.then(() => apply(update));
      writes = next.catch(() => undefined);
      return next;
    },

    status() {
      return {
        current_provider: snapshot.provider,
        current_model: snapshot.strategy.modelName,
        available_providers: PROVIDER_DESCRIPTORS,
        has_api_key: {
          template: true,
          openai: Boolean(settings.openai.apiKey),
          siliconflow: Boolean(settings.siliconflow.apiKey),
          gemini: Boolean(settings.gemini.apiKey),
        },
      };
    },

    async testConnection(update) {
      if (update.provider === "template") {
        return { success: true, message: "知识图谱模式无需测试" };
      }
      const resolved = merge(update.provider, update);
      if (!resolved.apiKey) {
        return { success: false, message: "请提供 API Key" };
      }
      try {
        const strategy = factory(update.provider, { ...resolved, apiKey: resolved.apiKey });
        const response = await strategy.ping();
        return { success: true, message: `${PROVIDER_LABELS[update.provider]} 连接成功`, response };
      } catch (error) {
        return { success: false, message: `连接测试失败: ${errorMessage(error)}` };
      }
    },
  };
}
