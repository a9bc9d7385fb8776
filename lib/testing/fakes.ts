import type { CaseDetails, CaseLookup, LegalCase, LegalSearchBackend } from "@/lib/legal/types";
import type { GenerationBackend, GenerationRequest, GenerationResult } from "@/lib/llm/types";
import { CircuitRegistry } from "@/lib/resilience/circuit-breaker";
import { Resilience } from "@/lib/resilience/resilience";
import type { DocumentChunk, RetrievalBackend, RetrievalHit, StoredDocument } from "@/lib/retrieval/types";
import { loadRuntimeConfig, type GenerationProvider } from "@/lib/runtime-config";

/** In-process stand-ins for the external collaborators, shared by the router tests. */

export function testResilience(): Resilience {
  const clock = { time: 0, now: () => clock.time };
  return new Resilience({
    registry: new CircuitRegistry(clock),
    clock,
    presets: loadRuntimeConfig({}).presets,
    sleep: async () => undefined,
    sleepSync: () => undefined,
  });
}

export class InMemoryRetrievalBackend implements RetrievalBackend {
  readonly documents = new Map<string, { type: string; chunks: string[] }>();

  readonly calls: string[] = [];

  failSearch?: Error;

  failList?: Error;

  /** Document names whose chunk reads throw. */
  readonly failChunks = new Set<string>();

  constructor(documents?: Array<{ name: string; type?: string; chunks: string[] }>) {
    for (const document of documents ?? []) {
      this.documents.set(document.name, { type: document.type ?? "text", chunks: document.chunks });
    }
  }

  async search(query: string, topK: number): Promise<RetrievalHit[]> {
    this.calls.push(`search:${query}`);
    if (this.failSearch) throw this.failSearch;

    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    const hits: RetrievalHit[] = [];
    for (const [documentName, document] of this.documents) {
      for (const [chunkIndex, text] of document.chunks.entries()) {
        const lower = text.toLowerCase();
        const score = terms.filter((term) => lower.includes(term)).length;
        if (score > 0) {
          hits.push({ text, score, metadata: { documentName, documentType: document.type, chunkIndex } });
        }
      }
    }
    return hits.sort((left, right) => right.score - left.score).slice(0, topK);
  }

  async listDocuments(): Promise<StoredDocument[]> {
    this.calls.push("list");
    if (this.failList) throw this.failList;
    return [...this.documents].map(([name, document]) => ({
      name,
      type: document.type,
      chunkCount: document.chunks.length,
    }));
  }

  async getDocumentChunks(name: string): Promise<DocumentChunk[]> {
    this.calls.push(`chunks:${name}`);
    if (this.failChunks.has(name)) throw new Error(`chunks of ${name} unavailable`);
    const document = this.documents.get(name);
    if (!document) return [];
    return document.chunks.map((text, chunkIndex) => ({
      text,
      metadata: { documentName: name, documentType: document.type, chunkIndex },
    }));
  }

  async deleteDocument(name: string): Promise<boolean> {
    this.calls.push(`delete:${name}`);
    return this.documents.delete(name);
  }

  async addChunks(document: { name: string; type: string }, chunks: string[]): Promise<number> {
    this.calls.push(`add:${document.name}`);
    this.documents.set(document.name, { type: document.type, chunks });
    return chunks.length;
  }
}

export class FakeLegalBackend implements LegalSearchBackend {
  readonly calls: string[] = [];

  cases: LegalCase[] = [];

  details: CaseDetails | null = null;

  fullText: string | null = null;

  failSearch?: Error;

  async searchCases(query: string, input: { instance: string; limit: number }): Promise<LegalCase[]> {
    this.calls.push(`search:${query}:${input.instance}:${input.limit}`);
    if (this.failSearch) throw this.failSearch;
    return this.cases.slice(0, input.limit);
  }

  async getCaseDetails(lookup: CaseLookup): Promise<CaseDetails | null> {
    this.calls.push(`details:${lookup.caseNumber ?? lookup.docId}`);
    return this.details;
  }

  async getCaseFullText(docId: string): Promise<string | null> {
    this.calls.push(`fulltext:${docId}`);
    return this.fullText;
  }
}

export type Responder = (request: GenerationRequest) => string | Error;

/** Answers with whatever `respond` returns; an `Error` is thrown instead. */
export class ScriptedGenerationBackend implements GenerationBackend {
  readonly provider: GenerationProvider = "lmstudio";

  readonly model: string;

  readonly requests: GenerationRequest[] = [];

  respond: Responder;

  constructor(respond: Responder, model = "test-model") {
    this.respond = respond;
    this.model = model;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const reply = this.respond(request);
    if (reply instanceof Error) throw reply;
    return {
      content: reply,
      model: this.model,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    };
  }

  async *streamGenerate(request: GenerationRequest): AsyncGenerator<string> {
    this.requests.push(request);
    const reply = this.respond(request);
    if (reply instanceof Error) throw reply;
    for (const word of reply.split(/(?<= )/)) {
      yield word;
    }
  }
}

export function lastUserMessage(request: GenerationRequest): string {
  const users = request.messages.filter((message) => message.role === "user");
  return users[users.length - 1]?.content ?? "";
}
