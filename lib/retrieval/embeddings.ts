import { InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { getBedrockClient, getBedrockModelConfig } from "@/lib/llm/bedrock-client";
import { createLogger, errorMessage } from "@/lib/logger";
import { isRecord } from "@/lib/http/request-json";
import { classifyFailure, MalformedResponse } from "@/lib/resilience/errors";

export type EmbeddingKind = "query" | "passage";

export type Embedder = {
  embed(text: string, kind: EmbeddingKind, signal?: AbortSignal): Promise<number[]>;
};

const LOCAL_DIM = Math.max(32, Number(process.env.EMBEDDING_LOCAL_DIM ?? "192"));

const log = createLogger("embeddings");

function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function unitNormalize(values: number[]): number[] {
  let norm = 0;
  for (const value of values) {
    norm += value * value;
  }
  if (norm <= 0) return values;
  const inv = 1 / Math.sqrt(norm);
  return values.map((value) => Number((value * inv).toFixed(7)));
}

/** Signed feature hashing over word tokens; deterministic and offline. */
export function localEmbedding(text: string, dim = LOCAL_DIM): number[] {
  const values = new Array<number>(dim).fill(0);
  const tokens = normalizeText(text)
    .split(/\s+/)
    .filter((token) => token.length > 1);
  if (tokens.length === 0) return values;

  for (const token of tokens) {
    const hash = hashToken(token);
    const idx = hash % dim;
    const sign = hash % 2 === 0 ? 1 : -1;
    const weight = Math.min(3.2, 1 + token.length / 12);
    values[idx] += sign * weight;
  }

  return unitNormalize(values);
}

function numberArray(value: unknown): number[] | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") return null;
    out.push(item);
  }
  return out;
}

/** Titan returns `embedding`; Cohere returns `embeddings[0]`. */
export function extractEmbedding(payload: unknown): number[] | null {
  if (!isRecord(payload)) return null;
  const direct = numberArray(payload.embedding);
  if (direct) return direct;
  if (Array.isArray(payload.embeddings)) {
    return numberArray(payload.embeddings[0]);
  }
  return null;
}

export const localEmbedder: Embedder = {
  embed: async (text) => localEmbedding(text),
};

/**
 * Bedrock embedding model from `EMBEDDING_MODEL_ID`. Tries the Titan body
 * shape, then the Cohere one. Transport failures propagate unchanged so the
 * resilience layer can classify them.
 */
export class BedrockEmbedder implements Embedder {
  private readonly modelId: string;

  private readonly region: string;

  constructor(input: { modelId: string; region: string }) {
    this.modelId = input.modelId;
    this.region = input.region;
  }

  async embed(text: string, kind: EmbeddingKind, signal?: AbortSignal): Promise<number[]> {
    const bodies: Array<Record<string, unknown>> = [
      { inputText: text },
      { texts: [text], input_type: kind === "passage" ? "search_document" : "search_query", truncate: "END" },
    ];

    for (const body of bodies) {
      try {
        const command = new InvokeModelCommand({
          modelId: this.modelId,
          contentType: "application/json",
          accept: "application/json",
          body: JSON.stringify(body),
        });
        const response = await getBedrockClient(this.region).send(command, { abortSignal: signal });
        const raw = response.body ? await response.body.transformToString() : "";
        const embedding = extractEmbedding(raw ? JSON.parse(raw) : null);
        if (embedding) return unitNormalize(embedding);
      } catch (error) {
        const kind = classifyFailure(error);
        if (kind !== "http_status" && kind !== "malformed") throw error;
        log.warn("embedding request shape rejected", { modelId: this.modelId, error: errorMessage(error) });
      }
    }

    throw new MalformedResponse(`no embedding in ${this.modelId} response`, "bedrock:invoke-model");
  }
}

export function createEmbedder(env: Record<string, string | undefined> = process.env): Embedder {
  const modelId = env.EMBEDDING_MODEL_ID?.trim();
  if (!modelId) return localEmbedder;

  const config = getBedrockModelConfig(modelId, env);
  if (!config.ok) {
    log.warn("embedding model misconfigured, using local embedding", { error: config.error });
    return localEmbedder;
  }
  return new BedrockEmbedder({ modelId: config.modelId, region: config.region });
}
