export type ResourceClass = "generation" | "retrieval" | "legal-search" | "generic-http";

export type ResiliencePreset = {
  timeoutMs: number;
  retryMaxAttempts: number;
  retryBaseWaitMs: number;
  retryMaxWaitMs: number;
  retryMultiplier: number;
  circuitFailMax: number;
  circuitResetTimeoutMs: number;
};

export type GenerationProvider = "bedrock" | "openai" | "lmstudio" | "custom";

export type CacheTtls = {
  classificationSec: number;
  caseNumberSec: number;
  retrievalSearchSec: number;
  retrievalContextSec: number;
  legalContextSec: number;
  documentInventorySec: number;
  answerSec: number;
};

export type RuntimeConfig = {
  presets: Record<ResourceClass, ResiliencePreset>;
  classification: {
    timeoutMs: number;
    maxTokens: number;
    enabled: boolean;
  };
  generation: {
    provider: GenerationProvider;
    model?: string;
    temperature: number;
    maxTokens: number;
  };
  retrieval: {
    topK: number;
  };
  legal: {
    instance: string;
    searchLimit: number;
    previewCount: number;
  };
  cacheTtls: CacheTtls;
};

type NumberSetting = {
  env: string;
  defaultValue: number;
  min: number;
  cap: number;
};

type PresetSettings = Record<keyof ResiliencePreset, NumberSetting>;

function presetSettings(
  prefix: string,
  defaults: { timeoutMs: number; retryMaxAttempts: number },
): PresetSettings {
  return {
    timeoutMs: { env: `${prefix}_TIMEOUT_MS`, defaultValue: defaults.timeoutMs, min: 100, cap: 600_000 },
    retryMaxAttempts: {
      env: `${prefix}_RETRY_MAX_ATTEMPTS`,
      defaultValue: defaults.retryMaxAttempts,
      min: 1,
      cap: 10,
    },
    retryBaseWaitMs: { env: "RESILIENCE_RETRY_BASE_WAIT_MS", defaultValue: 1_000, min: 0, cap: 60_000 },
    retryMaxWaitMs: { env: "RESILIENCE_RETRY_MAX_WAIT_MS", defaultValue: 10_000, min: 0, cap: 120_000 },
    retryMultiplier: { env: "RESILIENCE_RETRY_MULTIPLIER", defaultValue: 2, min: 1, cap: 10 },
    circuitFailMax: { env: `${prefix}_CB_FAIL_MAX`, defaultValue: 5, min: 1, cap: 100 },
    circuitResetTimeoutMs: {
      env: `${prefix}_CB_RESET_TIMEOUT_MS`,
      defaultValue: 60_000,
      min: 1_000,
      cap: 3_600_000,
    },
  };
}

const PRESET_SETTINGS: Record<ResourceClass, PresetSettings> = {
  generation: presetSettings("RESILIENCE_GENERATION", { timeoutMs: 120_000, retryMaxAttempts: 2 }),
  retrieval: presetSettings("RESILIENCE_RETRIEVAL", { timeoutMs: 60_000, retryMaxAttempts: 3 }),
  "legal-search": presetSettings("RESILIENCE_LEGAL", { timeoutMs: 45_000, retryMaxAttempts: 3 }),
  "generic-http": presetSettings("RESILIENCE_HTTP", { timeoutMs: 30_000, retryMaxAttempts: 3 }),
};

export const RESOURCE_CLASSES: readonly ResourceClass[] = ["generation", "retrieval", "legal-search", "generic-http"];

export function isResourceClass(value: string): value is ResourceClass {
  return (RESOURCE_CLASSES as readonly string[]).includes(value);
}

export function resolveProfiledNumber(input: {
  value: string | undefined;
  defaultValue: number;
  min?: number;
  cap?: number;
  round?: "floor" | "none";
}): number {
  const parsed = input.value === undefined || input.value.trim() === "" ? Number.NaN : Number(input.value);
  let output = Number.isFinite(parsed) ? parsed : input.defaultValue;
  if (input.round === "floor") output = Math.floor(output);
  if (typeof input.min === "number") output = Math.max(output, input.min);
  if (typeof input.cap === "number") output = Math.min(output, input.cap);
  return output;
}

export function parseGenerationProvider(value: string | undefined): GenerationProvider {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "openai") return "openai";
  if (normalized === "lmstudio") return "lmstudio";
  if (normalized === "custom") return "custom";
  return "bedrock";
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, setting: NumberSetting, round: "floor" | "none" = "floor"): number {
  return resolveProfiledNumber({
    value: env[setting.env],
    defaultValue: setting.defaultValue,
    min: setting.min,
    cap: setting.cap,
    round,
  });
}

function readPreset(env: Env, settings: PresetSettings): ResiliencePreset {
  return {
    timeoutMs: readNumber(env, settings.timeoutMs),
    retryMaxAttempts: readNumber(env, settings.retryMaxAttempts),
    retryBaseWaitMs: readNumber(env, settings.retryBaseWaitMs),
    retryMaxWaitMs: readNumber(env, settings.retryMaxWaitMs),
    retryMultiplier: readNumber(env, settings.retryMultiplier, "none"),
    circuitFailMax: readNumber(env, settings.circuitFailMax),
    circuitResetTimeoutMs: readNumber(env, settings.circuitResetTimeoutMs),
  };
}

function ttl(env: Env, name: string, defaultValue: number): number {
  return resolveProfiledNumber({ value: env[name], defaultValue, min: 1, cap: 604_800, round: "floor" });
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  return {
    presets: {
      generation: readPreset(env, PRESET_SETTINGS.generation),
      retrieval: readPreset(env, PRESET_SETTINGS.retrieval),
      "legal-search": readPreset(env, PRESET_SETTINGS["legal-search"]),
      "generic-http": readPreset(env, PRESET_SETTINGS["generic-http"]),
    },
    classification: {
      timeoutMs: resolveProfiledNumber({
        value: env.CLASSIFIER_TIMEOUT_MS,
        defaultValue: 15_000,
        min: 200,
        cap: 60_000,
        round: "floor",
      }),
      maxTokens: resolveProfiledNumber({
        value: env.CLASSIFIER_MAX_TOKENS,
        defaultValue: 200,
        min: 50,
        cap: 1_000,
        round: "floor",
      }),
      enabled: parseFlag(env.CLASSIFIER_LLM_ENABLED, true),
    },
    generation: {
      provider: parseGenerationProvider(env.LLM_PROVIDER),
      model: env.LLM_MODEL?.trim() || undefined,
      temperature: resolveProfiledNumber({ value: env.LLM_TEMPERATURE, defaultValue: 0.7, min: 0, cap: 2 }),
      maxTokens: resolveProfiledNumber({
        value: env.LLM_MAX_TOKENS,
        defaultValue: 2_000,
        min: 64,
        cap: 32_000,
        round: "floor",
      }),
    },
    retrieval: {
      topK: resolveProfiledNumber({ value: env.RAG_TOP_K, defaultValue: 5, min: 1, cap: 50, round: "floor" }),
    },
    legal: {
      instance: env.LEGAL_SEARCH_INSTANCE?.trim() || "3",
      searchLimit: resolveProfiledNumber({
        value: env.LEGAL_SEARCH_LIMIT,
        defaultValue: 5,
        min: 1,
        cap: 50,
        round: "floor",
      }),
      previewCount: resolveProfiledNumber({
        value: env.LEGAL_PREVIEW_COUNT,
        defaultValue: 3,
        min: 1,
        cap: 20,
        round: "floor",
      }),
    },
    cacheTtls: {
      classificationSec: ttl(env, "CACHE_TTL_CLASSIFICATION_SEC", 21_600),
      caseNumberSec: ttl(env, "CACHE_TTL_CASE_NUMBER_SEC", 21_600),
      retrievalSearchSec: ttl(env, "CACHE_TTL_RAG_SEARCH_SEC", 3_600),
      retrievalContextSec: ttl(env, "CACHE_TTL_RAG_CONTEXT_SEC", 3_600),
      legalContextSec: ttl(env, "CACHE_TTL_LEGAL_CONTEXT_SEC", 3_600),
      documentInventorySec: ttl(env, "CACHE_TTL_DOCUMENT_INVENTORY_SEC", 300),
      answerSec: ttl(env, "CACHE_TTL_ANSWER_SEC", 1_800),
    },
  };
}
