import OpenAI from "openai";
import type { ChatMessage, GenerationBackend, GenerationRequest, GenerationResult } from "@/lib/llm/types";
import { MalformedResponse } from "@/lib/resilience/errors";
import type { GenerationProvider } from "@/lib/runtime-config";

export type OpenAiCompatibleOptions = {
  provider: Exclude<GenerationProvider, "bedrock">;
  baseUrl: string;
  apiKey: string;
  model: string;
  fetch?: typeof fetch;
};

export function toOpenAiMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      case "user":
        return { role: "user", content: message.content };
    }
  });
}

/** Chat completions over any OpenAI-compatible server (OpenAI, LM Studio, self-hosted). */
export class OpenAiCompatibleBackend implements GenerationBackend {
  readonly provider: Exclude<GenerationProvider, "bedrock">;

  readonly model: string;

  readonly baseUrl: string;

  private readonly client: OpenAI;

  constructor(options: OpenAiCompatibleOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      // Retries and timeouts belong to the resilience layer.
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toOpenAiMessages(request.messages),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new MalformedResponse(`${this.provider} returned no message content`, this.baseUrl);
    }

    return {
      content,
      model: response.model || this.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  async *streamGenerate(request: GenerationRequest): AsyncGenerator<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toOpenAiMessages(request.messages),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        stream: true,
      },
      { signal: request.signal },
    );

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) yield delta;
    }
  }
}
