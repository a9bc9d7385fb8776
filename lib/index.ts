import { SharedCache } from "@/lib/cache/shared-cache";
import { LawClient } from "@/lib/legal/law-client";
import { GenerationBackendFactory } from "@/lib/llm/provider-factory";
import { Resilience } from "@/lib/resilience/resilience";
import { createEmbedder } from "@/lib/retrieval/embeddings";
import { RetrievalService } from "@/lib/retrieval/retrieval-service";
import { QdrantDocumentStore } from "@/lib/retrieval/vector-store";
import { QueryRouter } from "@/lib/router/query-router";
import { loadRuntimeConfig } from "@/lib/runtime-config";

export { SharedCache, type CacheMode, type KeyValueCache } from "@/lib/cache/shared-cache";
export { CACHE_PREFIX, cacheKey, fingerprint } from "@/lib/cache/fingerprint";
export { chunkText, documentTypeFromName, type ChunkOptions } from "@/lib/ingestion/chunker";
export { LawClient } from "@/lib/legal/law-client";
export type { CaseDetails, CaseLookup, LegalCase, LegalSearchBackend } from "@/lib/legal/types";
export { GenerationBackendFactory, GenerationConfigError, type BackendResolver } from "@/lib/llm/provider-factory";
export type { ChatMessage, GenerationBackend, GenerationResult } from "@/lib/llm/types";
export { createLogger, type Logger } from "@/lib/logger";
export {
  CircuitOpen,
  HttpStatusError,
  MalformedResponse,
  OperationAborted,
  RetriesExhausted,
  TimeoutExceeded,
  TransientNetworkFailure,
} from "@/lib/resilience/errors";
export { Resilience, type ResilienceOverrides } from "@/lib/resilience/resilience";
export { RetrievalService, type RetrievalContext } from "@/lib/retrieval/retrieval-service";
export type { RetrievalBackend, RetrievalHit, StoredDocument } from "@/lib/retrieval/types";
export { QdrantDocumentStore } from "@/lib/retrieval/vector-store";
export { QueryRouter, type RouterHealth } from "@/lib/router/query-router";
export { classifyByRules } from "@/lib/router/rules";
export type { AnswerOptions, Classification, QueryIntent, RouterAnswer } from "@/lib/router/types";
export { loadRuntimeConfig, type GenerationProvider, type RuntimeConfig } from "@/lib/runtime-config";

type Env = Record<string, string | undefined>;

/** Wires the default stack: Upstash or in-memory cache, Qdrant, the law server and env-selected generation. */
export function createQueryRouter(env: Env = process.env): QueryRouter {
  const config = loadRuntimeConfig(env);
  const cache = new SharedCache({
    restUrl: env.UPSTASH_REDIS_REST_URL ?? "",
    restToken: env.UPSTASH_REDIS_REST_TOKEN ?? "",
  });
  const resilience = new Resilience({ presets: config.presets });
  const store = new QdrantDocumentStore({
    baseUrl: env.VECTOR_DB_URL,
    apiKey: env.VECTOR_DB_API_KEY ?? "",
    collection: env.VECTOR_COLLECTION,
    embedder: createEmbedder(env),
  });
  const retrieval = new RetrievalService({ backend: store, cache, resilience, ttls: config.cacheTtls });

  return new QueryRouter({
    cache,
    resilience,
    retrieval,
    legal: new LawClient({ baseUrl: env.LAW_SERVER_URL, apiKey: env.LAW_API_KEY ?? "" }),
    backends: new GenerationBackendFactory({ env }).get,
    config,
  });
}
