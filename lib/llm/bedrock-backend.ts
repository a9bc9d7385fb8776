import {
  ConverseCommand,
  ConverseStreamCommand,
  type ConverseCommandInput,
  type ConverseCommandOutput,
  type ConverseStreamOutput,
  type Message,
  type SystemContentBlock,
} from "@aws-sdk/client-bedrock-runtime";
import { getBedrockClient } from "@/lib/llm/bedrock-client";
import type { GenerationBackend, GenerationRequest, GenerationResult } from "@/lib/llm/types";
import { MalformedResponse } from "@/lib/resilience/errors";

/** The two Bedrock runtime calls the backend needs; tests swap in a fake. */
export type ConverseTransport = {
  converse(input: ConverseCommandInput, signal?: AbortSignal): Promise<ConverseCommandOutput>;
  converseStream(input: ConverseCommandInput, signal?: AbortSignal): Promise<AsyncIterable<ConverseStreamOutput> | undefined>;
};

export function createSdkTransport(region: string): ConverseTransport {
  const client = getBedrockClient(region);
  return {
    converse: (input, signal) => client.send(new ConverseCommand(input), { abortSignal: signal }),
    converseStream: async (input, signal) => {
      const command = new ConverseStreamCommand({
        modelId: input.modelId,
        system: input.system,
        messages: input.messages,
        inferenceConfig: input.inferenceConfig,
      });
      const response = await client.send(command, { abortSignal: signal });
      return response.stream;
    },
  };
}

/**
 * System messages go to the `system` field; consecutive turns of the same role
 * are merged because Converse requires user/assistant alternation.
 */
export function toConverseInput(modelId: string, request: GenerationRequest): ConverseCommandInput {
  const system: SystemContentBlock[] = [];
  const messages: Message[] = [];

  for (const message of request.messages) {
    if (message.role === "system") {
      system.push({ text: message.content });
      continue;
    }
    const previous = messages[messages.length - 1];
    if (previous && previous.role === message.role) {
      previous.content = [...(previous.content ?? []), { text: message.content }];
      continue;
    }
    messages.push({ role: message.role, content: [{ text: message.content }] });
  }

  return {
    modelId,
    system: system.length > 0 ? system : undefined,
    messages,
    inferenceConfig: {
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    },
  };
}

export function extractConverseText(output: ConverseCommandOutput): string {
  return (output.output?.message?.content ?? [])
    .flatMap((block) => ("text" in block && typeof block.text === "string" ? [block.text] : []))
    .join("\n")
    .trim();
}

export class BedrockGenerationBackend implements GenerationBackend {
  readonly provider = "bedrock" as const;

  readonly model: string;

  private readonly transport: ConverseTransport;

  constructor(input: { modelId: string; transport: ConverseTransport }) {
    this.model = input.modelId;
    this.transport = input.transport;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const output = await this.transport.converse(toConverseInput(this.model, request), request.signal);
    const content = extractConverseText(output);
    if (!content) {
      throw new MalformedResponse("Bedrock returned an empty response", "bedrock:converse");
    }

    const usage = output.usage;
    return {
      content,
      model: this.model,
      usage: usage
        ? {
            inputTokens: usage.inputTokens ?? 0,
            outputTokens: usage.outputTokens ?? 0,
            totalTokens: usage.totalTokens ?? 0,
          }
        : undefined,
    };
  }

  async *streamGenerate(request: GenerationRequest): AsyncGenerator<string> {
    const stream = await this.transport.converseStream(toConverseInput(this.model, request), request.signal);
    if (!stream) {
      throw new MalformedResponse("Bedrock stream response had no event stream", "bedrock:converse-stream");
    }

    for await (const event of stream) {
      const text = event.contentBlockDelta?.delta?.text;
      if (text) yield text;
    }
  }
}
