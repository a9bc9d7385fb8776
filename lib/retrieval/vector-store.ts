import { createHash } from "crypto";
import { isRecord, requestJson } from "@/lib/http/request-json";
import { createLogger } from "@/lib/logger";
import { createEmbedder, type Embedder } from "@/lib/retrieval/embeddings";
import type {
  ChunkPayload,
  DocumentChunk,
  RetrievalBackend,
  RetrievalHit,
  StoredDocument,
} from "@/lib/retrieval/types";

const SCROLL_PAGE = Math.max(16, Number(process.env.VECTOR_SCROLL_PAGE ?? "256"));
const UPSERT_BATCH = 64;

const log = createLogger("vector-store");

type QdrantPoint = {
  id: string;
  score: number;
  payload: ChunkPayload;
};

function normalizeBaseUrl(value: string): string {
  return value.endsWith("/") ? value : `${value}/`;
}

/** Qdrant point ids must be UUIDs or integers; derive a stable UUID per chunk. */
export function chunkPointId(documentName: string, chunkIndex: number): string {
  const hex = createHash("sha256").update(`${documentName}#${chunkIndex}`).digest("hex");
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join("-");
}

function parsePayload(value: unknown): ChunkPayload | null {
  if (!isRecord(value)) return null;
  if (typeof value.documentName !== "string" || !value.documentName) return null;
  return {
    documentName: value.documentName,
    documentType: typeof value.documentType === "string" ? value.documentType : "unknown",
    chunkIndex: typeof value.chunkIndex === "number" ? value.chunkIndex : 0,
    text: typeof value.text === "string" ? value.text : "",
    indexedAt: typeof value.indexedAt === "string" ? value.indexedAt : "",
  };
}

function parsePoints(rows: unknown): QdrantPoint[] {
  if (!Array.isArray(rows)) return [];
  const out: QdrantPoint[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const id = String(row.id ?? "").trim();
    const score = Number(row.score ?? 0);
    const payload = parsePayload(row.payload);
    if (!id || !Number.isFinite(score) || !payload) continue;
    out.push({ id, score, payload });
  }
  return out;
}

function documentFilter(name: string): Record<string, unknown> {
  return { must: [{ key: "documentName", match: { value: name } }] };
}

/**
 * Documents as points in one Qdrant collection, one point per chunk, over the
 * REST API. Only chunk payloads are read back; vectors never leave the store.
 */
export class QdrantDocumentStore implements RetrievalBackend {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly collection: string;
  private readonly embedder: Embedder;

  constructor(input?: { baseUrl?: string; apiKey?: string; collection?: string; embedder?: Embedder }) {
    const baseUrl = input?.baseUrl?.trim() || process.env.VECTOR_DB_URL?.trim() || "http://localhost:6333";

    this.baseUrl = normalizeBaseUrl(baseUrl);
    this.apiKey = input?.apiKey?.trim() ?? process.env.VECTOR_DB_API_KEY?.trim() ?? "";
    this.collection = input?.collection?.trim() || process.env.VECTOR_COLLECTION?.trim() || "legal_documents";
    this.embedder = input?.embedder ?? createEmbedder();
  }

  private async call(
    path: string,
    body: unknown,
    endpoint: string,
    signal?: AbortSignal,
    method: "POST" | "PUT" = "POST",
  ): Promise<unknown> {
    const response = await requestJson({
      url: new URL(`collections/${encodeURIComponent(this.collection)}/${path}`, this.baseUrl),
      method,
      headers: this.apiKey ? { "api-key": this.apiKey } : {},
      body,
      signal,
      endpoint: `qdrant:${endpoint}`,
    });
    return isRecord(response.payload) ? response.payload.result : undefined;
  }

  private async scrollAll(input: {
    filter?: Record<string, unknown>;
    include: string[];
    signal?: AbortSignal;
  }): Promise<QdrantPoint[]> {
    const out: QdrantPoint[] = [];
    let offset: unknown = null;

    do {
      const result = await this.call(
        "points/scroll",
        {
          limit: SCROLL_PAGE,
          with_payload: { include: input.include },
          with_vector: false,
          filter: input.filter,
          offset: offset ?? undefined,
        },
        "scroll",
        input.signal,
      );
      if (!isRecord(result)) break;
      out.push(...parsePoints(result.points));
      offset = result.next_page_offset ?? null;
    } while (offset !== null);

    return out;
  }

  async search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalHit[]> {
    const vector = await this.embedder.embed(query, "query", signal);
    const result = await this.call(
      "points/search",
      {
        vector,
        limit: Math.max(1, Math.min(topK, 50)),
        with_payload: true,
      },
      "search",
      signal,
    );

    return parsePoints(result).map((point) => ({
      text: point.payload.text,
      score: point.score,
      metadata: {
        documentName: point.payload.documentName,
        documentType: point.payload.documentType,
        chunkIndex: point.payload.chunkIndex,
      },
    }));
  }

  async listDocuments(signal?: AbortSignal): Promise<StoredDocument[]> {
    const points = await this.scrollAll({ include: ["documentName", "documentType", "indexedAt"], signal });
    const byName = new Map<string, StoredDocument & { indexedAt: string }>();

    for (const point of points) {
      const existing = byName.get(point.payload.documentName);
      if (existing) {
        existing.chunkCount += 1;
        if (point.payload.indexedAt && point.payload.indexedAt < existing.indexedAt) {
          existing.indexedAt = point.payload.indexedAt;
        }
        continue;
      }
      byName.set(point.payload.documentName, {
        name: point.payload.documentName,
        type: point.payload.documentType,
        chunkCount: 1,
        indexedAt: point.payload.indexedAt,
      });
    }

    return [...byName.values()]
      .sort((left, right) => left.indexedAt.localeCompare(right.indexedAt) || left.name.localeCompare(right.name))
      .map(({ name, type, chunkCount }) => ({ name, type, chunkCount }));
  }

  async getDocumentChunks(name: string, signal?: AbortSignal): Promise<DocumentChunk[]> {
    const points = await this.scrollAll({
      filter: documentFilter(name),
      include: ["documentName", "documentType", "chunkIndex", "text"],
      signal,
    });

    return points
      .sort((left, right) => left.payload.chunkIndex - right.payload.chunkIndex)
      .map((point) => ({
        text: point.payload.text,
        metadata: {
          documentName: point.payload.documentName,
          documentType: point.payload.documentType,
          chunkIndex: point.payload.chunkIndex,
        },
      }));
  }

  async deleteDocument(name: string, signal?: AbortSignal): Promise<boolean> {
    const counted = await this.call("points/count", { filter: documentFilter(name), exact: true }, "count", signal);
    const count = isRecord(counted) && typeof counted.count === "number" ? counted.count : 0;
    if (count === 0) return false;

    await this.call("points/delete?wait=true", { filter: documentFilter(name) }, "delete", signal);
    log.info("document points deleted", { name, points: count });
    return true;
  }

  async addChunks(
    document: { name: string; type: string },
    chunks: string[],
    signal?: AbortSignal,
  ): Promise<number> {
    if (chunks.length === 0) return 0;

    // Re-indexing a name replaces it; stale higher chunk indexes would otherwise survive.
    await this.deleteDocument(document.name, signal);

    const indexedAt = new Date().toISOString();
    for (let start = 0; start < chunks.length; start += UPSERT_BATCH) {
      const batch = chunks.slice(start, start + UPSERT_BATCH);
      const points = [];
      for (const [offset, text] of batch.entries()) {
        const chunkIndex = start + offset;
        const payload: ChunkPayload = {
          documentName: document.name,
          documentType: document.type,
          chunkIndex,
          text,
          indexedAt,
        };
        points.push({
          id: chunkPointId(document.name, chunkIndex),
          vector: await this.embedder.embed(text, "passage", signal),
          payload,
        });
      }
      await this.call("points?wait=true", { points }, "upsert", signal, "PUT");
    }

    log.info("document indexed", { name: document.name, chunks: chunks.length });
    return chunks.length;
  }
}
