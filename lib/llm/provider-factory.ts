import { BedrockGenerationBackend, createSdkTransport, type ConverseTransport } from "@/lib/llm/bedrock-backend";
import { getBedrockModelConfig } from "@/lib/llm/bedrock-client";
import { OpenAiCompatibleBackend } from "@/lib/llm/openai-backend";
import type { GenerationBackend } from "@/lib/llm/types";
import { createLogger } from "@/lib/logger";
import type { GenerationProvider } from "@/lib/runtime-config";

type Env = Record<string, string | undefined>;

const log = createLogger("provider-factory");

export class GenerationConfigError extends Error {
  readonly provider: GenerationProvider;

  constructor(provider: GenerationProvider, message: string) {
    super(message);
    this.name = "GenerationConfigError";
    this.provider = provider;
  }
}

export type BackendResolver = (provider: GenerationProvider, model?: string) => GenerationBackend;

/**
 * One backend per (provider, model), created on first use. Missing Bedrock
 * configuration throws `GenerationConfigError` at that point.
 */
export class GenerationBackendFactory {
  private readonly backends = new Map<string, GenerationBackend>();

  private readonly env: Env;

  private readonly bedrockTransport?: (region: string) => ConverseTransport;

  private readonly fetchImpl?: typeof fetch;

  constructor(input?: {
    env?: Env;
    bedrockTransport?: (region: string) => ConverseTransport;
    fetch?: typeof fetch;
  }) {
    this.env = input?.env ?? process.env;
    this.bedrockTransport = input?.bedrockTransport;
    this.fetchImpl = input?.fetch;
  }

  get: BackendResolver = (provider, model) => {
    const key = `${provider}_${model?.trim() || "default"}`;
    const cached = this.backends.get(key);
    if (cached) return cached;

    const backend = this.create(provider, model?.trim() || undefined);
    this.backends.set(key, backend);
    log.info("generation backend created", { provider, model: backend.model });
    return backend;
  };

  private create(provider: GenerationProvider, model?: string): GenerationBackend {
    const env = this.env;
    switch (provider) {
      case "bedrock": {
        const config = getBedrockModelConfig(model, env);
        if (!config.ok) {
          throw new GenerationConfigError(provider, config.error);
        }
        const transport = (this.bedrockTransport ?? createSdkTransport)(config.region);
        return new BedrockGenerationBackend({ modelId: config.modelId, transport });
      }
      case "openai": {
        const apiKey = env.OPENAI_API_KEY?.trim();
        if (!apiKey) {
          throw new GenerationConfigError(provider, "OPENAI_API_KEY missing");
        }
        return new OpenAiCompatibleBackend({
          provider,
          baseUrl: env.OPENAI_BASE_URL?.trim() || "https://api.openai.com/v1",
          apiKey,
          model: model ?? (env.OPENAI_MODEL?.trim() || "gpt-4o-mini"),
          fetch: this.fetchImpl,
        });
      }
      case "lmstudio":
        return new OpenAiCompatibleBackend({
          provider,
          baseUrl: env.LMSTUDIO_BASE_URL?.trim() || "http://localhost:1234/v1",
          apiKey: "lm-studio",
          model: model ?? (env.LMSTUDIO_MODEL?.trim() || "local-model"),
          fetch: this.fetchImpl,
        });
      case "custom":
        return new OpenAiCompatibleBackend({
          provider,
          baseUrl: env.CUSTOM_LLM_BASE_URL?.trim() || "http://localhost:8000/v1",
          apiKey: env.CUSTOM_LLM_API_KEY?.trim() || "not-needed",
          model: model ?? (env.CUSTOM_LLM_MODEL?.trim() || "custom-model"),
          fetch: this.fetchImpl,
        });
    }
  }
}
