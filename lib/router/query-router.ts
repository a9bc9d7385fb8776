import { CACHE_PREFIX, cacheKey, fingerprint } from "@/lib/cache/fingerprint";
import type { CacheMode, KeyValueCache } from "@/lib/cache/shared-cache";
import type { LegalSearchBackend } from "@/lib/legal/types";
import type { BackendResolver } from "@/lib/llm/provider-factory";
import type { ChatMessage, GenerationBackend } from "@/lib/llm/types";
import { createLogger, errorMessage } from "@/lib/logger";
import type { CircuitSnapshot } from "@/lib/resilience/circuit-breaker";
import type { Resilience } from "@/lib/resilience/resilience";
import type { RetrievalService } from "@/lib/retrieval/retrieval-service";
import type { StoredDocument } from "@/lib/retrieval/types";
import { ContextAggregator } from "@/lib/router/aggregator";
import { QueryClassifier } from "@/lib/router/classifier";
import { ShortCircuits, type ShortCircuitResult } from "@/lib/router/short-circuits";
import type {
  AnswerMetadata,
  AnswerOptions,
  AnswerSource,
  Classification,
  ContextFragment,
  FragmentLabel,
  RouterAnswer,
} from "@/lib/router/types";
import type { RuntimeConfig } from "@/lib/runtime-config";

const GENERATION_RESOURCE = "generation";

const SYSTEM_PROMPT = `Ти юридичний асистент, який допомагає користувачам із юридичними питаннями.
Використовуй наданий контекст, щоб дати точну й корисну відповідь.
Якщо в контексті немає потрібної інформації, чесно про це скажи.`;

const SOURCE_BY_LABEL: Record<FragmentLabel, AnswerSource> = {
  document_summary: "documents",
  retrieval: "RAG",
  legal_search: "MCP_Law",
};

export type RouterHealth = {
  cache: CacheMode;
  circuits: CircuitSnapshot[];
};

type Prepared =
  | { kind: "answered"; result: RouterAnswer }
  | {
      kind: "generate";
      backend: GenerationBackend;
      messages: ChatMessage[];
      answerKey: string;
      sources: AnswerSource[];
      metadata: AnswerMetadata;
    };

const log = createLogger("query-router");

export function buildUserPrompt(query: string, fragments: ContextFragment[]): string {
  return [query, ...fragments.map((fragment) => fragment.text)].join("\n\n");
}

/** `label` tags the failure in `metadata.errors`; pass `null` when it is already recorded there. */
function errorAnswer(
  error: unknown,
  sources: AnswerSource[],
  metadata: AnswerMetadata,
  label: string | null = "LLM error",
): RouterAnswer {
  const message = errorMessage(error);
  return {
    answer: `Error processing request: ${message}`,
    sources,
    error: message,
    metadata: { ...metadata, errors: label ? [...metadata.errors, `${label}: ${message}`] : [...metadata.errors] },
  };
}

function isDeletion(classification: Classification): boolean {
  return classification.intent === "delete_all" || classification.intent === "delete_one";
}

/**
 * Per request: classify, run an intent short-circuit or collect context
 * fragments, then generate (or stream) one answer. Only the generation step
 * can produce a user-visible error; everything before it degrades.
 */
export class QueryRouter {
  private readonly cache: KeyValueCache;

  private readonly resilience: Resilience;

  private readonly retrieval: RetrievalService;

  private readonly backends: BackendResolver;

  private readonly config: RuntimeConfig;

  private readonly classifier: QueryClassifier;

  private readonly aggregator: ContextAggregator;

  private readonly shortCircuits: ShortCircuits;

  constructor(input: {
    cache: KeyValueCache;
    resilience: Resilience;
    retrieval: RetrievalService;
    legal: LegalSearchBackend;
    backends: BackendResolver;
    config: RuntimeConfig;
  }) {
    this.cache = input.cache;
    this.resilience = input.resilience;
    this.retrieval = input.retrieval;
    this.backends = input.backends;
    this.config = input.config;
    this.classifier = new QueryClassifier({
      cache: input.cache,
      resilience: input.resilience,
      ttls: input.config.cacheTtls,
      settings: input.config.classification,
    });
    this.aggregator = new ContextAggregator({
      retrieval: input.retrieval,
      legal: input.legal,
      cache: input.cache,
      resilience: input.resilience,
      ttls: input.config.cacheTtls,
      legalSettings: input.config.legal,
    });
    this.shortCircuits = new ShortCircuits({
      retrieval: input.retrieval,
      legal: input.legal,
      resilience: input.resilience,
      generation: input.config.generation,
    });
  }

  health(): RouterHealth {
    return { cache: this.cache.mode, circuits: this.resilience.registry.snapshot() };
  }

  private resolveBackend(options: AnswerOptions): { backend?: GenerationBackend; error?: unknown } {
    try {
      const provider = options.provider ?? this.config.generation.provider;
      return { backend: this.backends(provider, options.model ?? this.config.generation.model) };
    } catch (error) {
      log.error("generation backend unavailable", { error: errorMessage(error) });
      return { error };
    }
  }

  private async readInventory(
    errors: string[],
    signal?: AbortSignal,
  ): Promise<{ documents: StoredDocument[] | null; error?: unknown }> {
    try {
      return { documents: await this.retrieval.listDocuments(signal) };
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn("document inventory unavailable", { error: errorMessage(error) });
      errors.push(`document_summary: ${errorMessage(error)}`);
      return { documents: null, error };
    }
  }

  private async shortCircuit(input: {
    query: string;
    classification: Classification;
    caseNumber: string | null;
    documents: StoredDocument[] | null;
    backend?: GenerationBackend;
    signal?: AbortSignal;
  }): Promise<{ result: ShortCircuitResult; sources: AnswerSource[] } | null> {
    const { classification, documents, signal } = input;

    switch (classification.intent) {
      case "delete_all":
        if (!documents) return null;
        return { result: await this.shortCircuits.deleteAll(documents, signal), sources: [] };
      case "delete_one":
        if (!documents) return null;
        return {
          result: await this.shortCircuits.deleteOne({
            query: input.query,
            documents,
            documentNumber: classification.documentNumber,
            signal,
          }),
          sources: [],
        };
      case "full_text":
        if (!input.caseNumber) return null;
        return { result: await this.shortCircuits.fullText(input.caseNumber, signal), sources: ["MCP_Law"] };
      case "document_sweep":
        if (!documents || documents.length === 0 || !input.backend) return null;
        return {
          result: await this.shortCircuits.sweep({
            query: input.query,
            documents,
            documentNumber: classification.documentNumber,
            backend: input.backend,
            signal,
          }),
          sources: ["RAG"],
        };
      default:
        return null;
    }
  }

  private async prepare(query: string, options: AnswerOptions): Promise<Prepared> {
    const { signal } = options;
    const errors: string[] = [];
    const { backend, error: backendError } = this.resolveBackend(options);

    const classified = await this.classifier.classify(query, { backend, signal });
    const classification: Classification = {
      ...classified.classification,
      useRetrieval: options.useRetrieval ?? classified.classification.useRetrieval,
      useLegal: options.useLegal ?? classified.classification.useLegal,
    };
    const caseNumber = classification.hasCaseNumber
      ? await this.classifier.extractCaseNumber(query, { backend, signal })
      : null;
    const { documents, error: inventoryError } = await this.readInventory(errors, signal);

    const metadata: AnswerMetadata = {
      usedRetrieval: classification.useRetrieval,
      usedLegal: classification.useLegal,
      intent: classification.intent,
      classificationSource: classified.source,
      contextCount: 0,
      errors,
      cached: false,
      ...(caseNumber ? { caseNumber } : {}),
    };

    // Deleting is never left to the model, so a missing inventory ends the request.
    if (!documents && isDeletion(classification)) {
      log.error("deletion refused without a document inventory", { intent: classification.intent });
      return { kind: "answered", result: errorAnswer(inventoryError, [], metadata, null) };
    }

    try {
      const shortCircuit = await this.shortCircuit({ query, classification, caseNumber, documents, backend, signal });
      if (shortCircuit) {
        const { result, sources } = shortCircuit;
        log.info("short-circuit answered", { intent: classification.intent });
        return {
          kind: "answered",
          result: {
            answer: result.answer,
            sources,
            ...(result.model ? { model: result.model } : {}),
            ...(result.usage ? { usage: result.usage } : {}),
            metadata: {
              ...metadata,
              errors: [...errors, ...result.errors],
              ...(result.deletedCount === undefined ? {} : { deletedCount: result.deletedCount }),
              ...(result.sweptDocuments ? { sweptDocuments: result.sweptDocuments } : {}),
            },
          },
        };
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      log.error("short-circuit failed", { intent: classification.intent, error: errorMessage(error) });
      return { kind: "answered", result: errorAnswer(error, [], metadata) };
    }

    const collected = await this.aggregator.collect({
      query,
      classification,
      caseNumber,
      documents,
      topK: options.topK ?? this.config.retrieval.topK,
      signal,
    });
    signal?.throwIfAborted();

    errors.push(...collected.errors);
    const sources = collected.fragments.map((fragment) => SOURCE_BY_LABEL[fragment.label]);
    metadata.contextCount = collected.fragments.length;

    if (!backend) {
      return { kind: "answered", result: errorAnswer(backendError, sources, metadata) };
    }

    const answerKey = cacheKey(CACHE_PREFIX.answer, {
      query,
      provider: backend.provider,
      model: backend.model,
      useRetrieval: classification.useRetrieval,
      useLegal: classification.useLegal,
      context: fingerprint({ fragments: collected.fragments.map((fragment) => fragment.text) }),
    });

    return {
      kind: "generate",
      backend,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildUserPrompt(query, collected.fragments) },
      ],
      answerKey,
      sources,
      metadata,
    };
  }

  async answer(query: string, options: AnswerOptions = {}): Promise<RouterAnswer> {
    const prepared = await this.prepare(query, options);
    if (prepared.kind === "answered") return prepared.result;

    const cached = await this.cache.getJson<RouterAnswer>(prepared.answerKey);
    if (cached) {
      return { ...cached, metadata: { ...cached.metadata, cached: true } };
    }

    const { backend, messages, sources, metadata } = prepared;
    try {
      const generated = await this.resilience.call(
        GENERATION_RESOURCE,
        (signal) =>
          backend.generate({
            messages,
            temperature: this.config.generation.temperature,
            maxTokens: this.config.generation.maxTokens,
            signal,
          }),
        { signal: options.signal },
      );

      const result: RouterAnswer = {
        answer: generated.content,
        sources,
        model: generated.model,
        ...(generated.usage ? { usage: generated.usage } : {}),
        metadata,
      };
      await this.cache.setJson(prepared.answerKey, result, this.config.cacheTtls.answerSec);
      return result;
    } catch (error) {
      if (options.signal?.aborted) throw error;
      log.error("generation failed", { model: backend.model, error: errorMessage(error) });
      return errorAnswer(error, sources, metadata);
    }
  }

  async *streamAnswer(query: string, options: AnswerOptions = {}): AsyncGenerator<string> {
    const prepared = await this.prepare(query, options);
    if (prepared.kind === "answered") {
      yield prepared.result.answer;
      return;
    }

    const cached = await this.cache.getJson<RouterAnswer>(prepared.answerKey);
    if (cached) {
      yield cached.answer;
      return;
    }

    const { backend, messages, sources, metadata } = prepared;
    let text = "";
    try {
      const chunks = this.resilience.stream(
        GENERATION_RESOURCE,
        (signal) =>
          backend.streamGenerate({
            messages,
            temperature: this.config.generation.temperature,
            maxTokens: this.config.generation.maxTokens,
            signal,
          }),
        { signal: options.signal },
      );
      for await (const chunk of chunks) {
        text += chunk;
        yield chunk;
      }
    } catch (error) {
      if (options.signal?.aborted) throw error;
      log.error("generation stream failed", { model: backend.model, error: errorMessage(error) });
      yield `Error: ${errorMessage(error)}`;
      return;
    }

    const result: RouterAnswer = { answer: text, sources, model: backend.model, metadata };
    await this.cache.setJson(prepared.answerKey, result, this.config.cacheTtls.answerSec);
  }
}
