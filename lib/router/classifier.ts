import { CACHE_PREFIX, cacheKey } from "@/lib/cache/fingerprint";
import type { KeyValueCache } from "@/lib/cache/shared-cache";
import type { ChatMessage, GenerationBackend } from "@/lib/llm/types";
import { createLogger, errorMessage } from "@/lib/logger";
import { isRecord } from "@/lib/http/request-json";
import { MalformedResponse } from "@/lib/resilience/errors";
import type { Resilience } from "@/lib/resilience/resilience";
import {
  CASE_NUMBER_PATTERN,
  classifyByRules,
  findCaseNumber,
  isCaseNumber,
  readDocumentNumber,
  wantsFullText,
} from "@/lib/router/rules";
import { QUERY_INTENTS, type Classification, type ClassificationSource, type QueryIntent } from "@/lib/router/types";
import type { CacheTtls, RuntimeConfig } from "@/lib/runtime-config";

/** Own circuit, so a flaky classifier never opens the answer-generation circuit. */
export const CLASSIFIER_RESOURCE = "generation:classifier";

const CLASSIFY_PROMPT = `Ти класифікуєш запити до юридичного асистента. Відповідай лише одним JSON-об'єктом без пояснень:
{"use_law": bool, "use_rag": bool, "query_type": string, "has_case_number": bool, "is_document_text_query": bool, "document_number": number | null}
- use_law: потрібна судова практика або законодавство;
- use_rag: потрібні документи, завантажені користувачем;
- query_type: одне з ${QUERY_INTENTS.join(", ")};
- has_case_number: запит містить номер справи виду 123/456/78;
- is_document_text_query: відповідь треба шукати в тексті конкретних документів користувача;
- document_number: порядковий номер документа, якщо його названо.`;

const CASE_NUMBER_PROMPT =
  "Витягни номер судової справи із запиту. Відповідай лише номером у форматі цифри/цифри/цифри або словом none.";

export type ClassifyResult = {
  classification: Classification;
  source: ClassificationSource;
};

export type ClassifyInput = {
  backend?: GenerationBackend;
  signal?: AbortSignal;
};

const log = createLogger("query-classifier");

function isIntent(value: unknown): value is QueryIntent {
  return typeof value === "string" && (QUERY_INTENTS as readonly string[]).includes(value);
}

/** First `{...}` block of the reply; models like to wrap JSON in prose or fences. */
export function extractJsonObject(content: string): Record<string, unknown> {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new MalformedResponse("classifier reply has no JSON object", CLASSIFIER_RESOURCE);
  }
  const parsed: unknown = JSON.parse(content.slice(start, end + 1));
  if (!isRecord(parsed)) {
    throw new MalformedResponse("classifier reply is not a JSON object", CLASSIFIER_RESOURCE);
  }
  return parsed;
}

export function parseClassification(query: string, content: string): Classification {
  const parsed = extractJsonObject(content);
  const useLaw = parsed.use_law;
  const useRag = parsed.use_rag;
  if (typeof useLaw !== "boolean" || typeof useRag !== "boolean") {
    throw new MalformedResponse("classifier reply is missing use_law/use_rag", CLASSIFIER_RESOURCE);
  }

  // The token must really be in the query; the model only confirms it.
  const hasCaseNumber = parsed.has_case_number !== false && CASE_NUMBER_PATTERN.test(query);
  const queryType = parsed.query_type;
  let intent: QueryIntent = "general";
  if (isIntent(queryType)) {
    intent = queryType;
  } else if (parsed.is_document_text_query === true) {
    intent = "document_sweep";
  }
  if (intent === "full_text" && !hasCaseNumber) intent = "general";
  // Explicit full-text wording next to a case number is a direct lookup whatever the model says.
  if (hasCaseNumber && intent !== "delete_all" && intent !== "delete_one" && wantsFullText(query)) {
    intent = "full_text";
  }

  const named = parsed.document_number;
  const documentNumber =
    typeof named === "number" && Number.isInteger(named) && named >= 1 ? named : readDocumentNumber(query);

  return {
    useRetrieval: useRag,
    useLegal: useLaw,
    intent,
    hasCaseNumber,
    ...(documentNumber === undefined ? {} : { documentNumber }),
  };
}

/**
 * LLM classification with the keyword rules as the fallback for any failure.
 * Both classifications and extracted case numbers are cached per query.
 */
export class QueryClassifier {
  private readonly cache: KeyValueCache;

  private readonly resilience: Resilience;

  private readonly ttls: CacheTtls;

  private readonly settings: RuntimeConfig["classification"];

  constructor(input: {
    cache: KeyValueCache;
    resilience: Resilience;
    ttls: CacheTtls;
    settings: RuntimeConfig["classification"];
  }) {
    this.cache = input.cache;
    this.resilience = input.resilience;
    this.ttls = input.ttls;
    this.settings = input.settings;
  }

  private ask(backend: GenerationBackend, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    return this.resilience.call(
      CLASSIFIER_RESOURCE,
      async (inner) => {
        const result = await backend.generate({
          messages,
          temperature: 0,
          maxTokens: this.settings.maxTokens,
          signal: inner,
        });
        return result.content;
      },
      {
        signal,
        overrides: { timeoutMs: this.settings.timeoutMs, retryMaxAttempts: 1 },
      },
    );
  }

  async classify(query: string, input?: ClassifyInput): Promise<ClassifyResult> {
    const key = cacheKey(CACHE_PREFIX.classification, { query });
    const cached = await this.cache.getJson<Classification>(key);
    if (cached) return { classification: cached, source: "cache" };

    let classification: Classification | null = null;
    let source: ClassificationSource = "rules";
    const backend = input?.backend;

    if (query.trim() && backend && this.settings.enabled) {
      try {
        const content = await this.ask(
          backend,
          [
            { role: "system", content: CLASSIFY_PROMPT },
            { role: "user", content: query },
          ],
          input?.signal,
        );
        classification = parseClassification(query, content);
        source = "llm";
      } catch (error) {
        if (input?.signal?.aborted) throw error;
        log.warn("llm classification failed, using rules", { error: errorMessage(error) });
      }
    }

    const resolved = classification ?? classifyByRules(query);
    await this.cache.setJson(key, resolved, this.ttls.classificationSec);
    return { classification: resolved, source };
  }

  async extractCaseNumber(query: string, input?: ClassifyInput): Promise<string | null> {
    const key = cacheKey(CACHE_PREFIX.caseNumber, { query });
    const cached = await this.cache.getJson<{ caseNumber: string | null }>(key);
    if (cached) return cached.caseNumber;

    let caseNumber: string | null = null;
    const backend = input?.backend;
    if (backend && this.settings.enabled) {
      try {
        const content = (
          await this.ask(
            backend,
            [
              { role: "system", content: CASE_NUMBER_PROMPT },
              { role: "user", content: query },
            ],
            input?.signal,
          )
        ).trim();
        if (isCaseNumber(content)) caseNumber = content;
      } catch (error) {
        if (input?.signal?.aborted) throw error;
        log.warn("llm case-number extraction failed, using regex", { error: errorMessage(error) });
      }
    }

    const resolved = caseNumber ?? findCaseNumber(query);
    await this.cache.setJson(key, { caseNumber: resolved }, this.ttls.caseNumberSec);
    return resolved;
  }
}
