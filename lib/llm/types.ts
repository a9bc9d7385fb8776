import type { GenerationProvider } from "@/lib/runtime-config";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerationUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type GenerationResult = {
  content: string;
  model: string;
  usage?: GenerationUsage;
};

export type GenerationRequest = {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
};

/**
 * A text-generation endpoint. Implementations forward `signal` to their
 * transport and throw raw transport errors; retries and circuit state live in
 * the resilience layer, not here.
 */
export type GenerationBackend = {
  readonly provider: GenerationProvider;
  readonly model: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
  streamGenerate(request: GenerationRequest): AsyncIterable<string>;
};
