import { CACHE_PREFIX, cacheKey } from "@/lib/cache/fingerprint";
import type { KeyValueCache } from "@/lib/cache/shared-cache";
import { chunkText, documentTypeFromName, type ChunkOptions } from "@/lib/ingestion/chunker";
import { createLogger } from "@/lib/logger";
import type { Resilience } from "@/lib/resilience/resilience";
import type { DocumentChunk, RetrievalBackend, RetrievalHit, StoredDocument } from "@/lib/retrieval/types";
import { BUDGETS, truncate } from "@/lib/router/budgets";
import type { CacheTtls } from "@/lib/runtime-config";

const RESOURCE = "retrieval";

export type RetrievalContext = {
  text: string;
  truncated: boolean;
  hitCount: number;
};

const log = createLogger("retrieval-service");

export function formatRetrievalContext(hits: RetrievalHit[]): string {
  return hits.map((hit, index) => `[Документ ${index + 1}]\n${hit.text}\n`).join("\n");
}

/**
 * Cached access to the document store. Every call goes through the
 * `retrieval` resilience preset; add and delete clear every `rag:` key.
 */
export class RetrievalService {
  private readonly backend: RetrievalBackend;

  private readonly cache: KeyValueCache;

  private readonly resilience: Resilience;

  private readonly ttls: CacheTtls;

  private readonly chunking?: ChunkOptions;

  constructor(input: {
    backend: RetrievalBackend;
    cache: KeyValueCache;
    resilience: Resilience;
    ttls: CacheTtls;
    chunking?: ChunkOptions;
  }) {
    this.backend = input.backend;
    this.cache = input.cache;
    this.resilience = input.resilience;
    this.ttls = input.ttls;
    this.chunking = input.chunking;
  }

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalHit[]> {
    const key = cacheKey(CACHE_PREFIX.retrievalSearch, { query, topK });
    const cached = await this.cache.getJson<RetrievalHit[]>(key);
    if (cached) return cached;

    const hits = await this.resilience.call(RESOURCE, (inner) => this.backend.search(query, topK, inner), { signal });
    await this.cache.setJson(key, hits, this.ttls.retrievalSearchSec);
    return hits;
  }

  /** Top-k chunks as one labelled blob, capped at the retrieval budget. Empty when nothing matched. */
  async getContext(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalContext> {
    const key = cacheKey(CACHE_PREFIX.retrievalContext, { query, topK });
    const cached = await this.cache.getJson<RetrievalContext>(key);
    if (cached) return cached;

    const hits = await this.search(query, topK, signal);
    const body = truncate(formatRetrievalContext(hits), BUDGETS.retrievalContextChars);
    const context: RetrievalContext = {
      text: hits.length > 0 ? body.text : "",
      truncated: body.truncated,
      hitCount: hits.length,
    };
    await this.cache.setJson(key, context, this.ttls.retrievalContextSec);
    return context;
  }

  async listDocuments(signal?: AbortSignal): Promise<StoredDocument[]> {
    const cached = await this.cache.getJson<StoredDocument[]>(CACHE_PREFIX.documentInventory);
    if (cached) return cached;

    const documents = await this.resilience.call(RESOURCE, (inner) => this.backend.listDocuments(inner), { signal });
    await this.cache.setJson(CACHE_PREFIX.documentInventory, documents, this.ttls.documentInventorySec);
    return documents;
  }

  getDocumentChunks(name: string, signal?: AbortSignal): Promise<DocumentChunk[]> {
    return this.resilience.call(RESOURCE, (inner) => this.backend.getDocumentChunks(name, inner), { signal });
  }

  async getDocumentText(name: string, signal?: AbortSignal): Promise<string> {
    const chunks = await this.getDocumentChunks(name, signal);
    return chunks.map((chunk) => chunk.text).join("\n");
  }

  async addDocument(name: string, text: string, type?: string, signal?: AbortSignal): Promise<number> {
    const chunks = chunkText(text, this.chunking);
    if (chunks.length === 0) {
      log.warn("document has no text, skipped", { name });
      return 0;
    }

    const document = { name, type: type ?? documentTypeFromName(name) };
    const added = await this.resilience.call(RESOURCE, (inner) => this.backend.addChunks(document, chunks, inner), {
      signal,
    });
    await this.invalidate();
    log.info("document added", { name, chunks: added });
    return added;
  }

  async deleteDocument(name: string, signal?: AbortSignal): Promise<boolean> {
    const deleted = await this.resilience.call(RESOURCE, (inner) => this.backend.deleteDocument(name, inner), {
      signal,
    });
    if (deleted) {
      await this.invalidate();
      log.info("document deleted", { name });
    }
    return deleted;
  }

  invalidate(): Promise<number> {
    return this.cache.deleteByPrefix(CACHE_PREFIX.retrievalRoot);
  }
}
