import { CACHE_PREFIX, cacheKey } from "@/lib/cache/fingerprint";
import type { KeyValueCache } from "@/lib/cache/shared-cache";
import type { CaseDetails, LegalSearchBackend } from "@/lib/legal/types";
import { createLogger, errorMessage } from "@/lib/logger";
import type { Resilience } from "@/lib/resilience/resilience";
import type { RetrievalService } from "@/lib/retrieval/retrieval-service";
import type { StoredDocument } from "@/lib/retrieval/types";
import { BUDGETS, preview, truncate } from "@/lib/router/budgets";
import { wantsFullText } from "@/lib/router/rules";
import type { Classification, ContextFragment, FragmentLabel } from "@/lib/router/types";
import type { CacheTtls, RuntimeConfig } from "@/lib/runtime-config";

export const LEGAL_RESOURCE = "legal-search";

const HEADERS: Record<FragmentLabel, string> = {
  document_summary: "=== Завантажені документи ===",
  retrieval: "=== Контекст з документів ===",
  legal_search: "=== Судова практика ===",
};

export type AggregateInput = {
  query: string;
  classification: Classification;
  caseNumber: string | null;
  /** Inventory read by the caller; `null` when it could not be read. */
  documents: StoredDocument[] | null;
  topK: number;
  signal?: AbortSignal;
};

export type AggregateResult = {
  fragments: ContextFragment[];
  errors: string[];
};

const log = createLogger("context-aggregator");

export function formatDocumentSummary(documents: StoredDocument[]): string {
  const lines = documents.map(
    (document, index) => `${index + 1}. ${document.name} (${document.type}, фрагментів: ${document.chunkCount})`,
  );
  return [HEADERS.document_summary, `Усього документів: ${documents.length}`, ...lines].join("\n");
}

function formatCaseDetails(caseNumber: string, details: CaseDetails): string {
  const lines = [`Справа № ${details.caseNumber ?? caseNumber}`, details.title];
  if (details.court) lines.push(`Суд: ${details.court}`);
  if (details.date) lines.push(`Дата: ${details.date}`);
  if (details.summary) lines.push(details.summary);
  else if (details.description) lines.push(details.description);
  return lines.join("\n");
}

/**
 * Collects the document summary, retrieval and legal fragments concurrently.
 * A failed branch is dropped and reported in `errors`; fragments always come
 * back in summary, retrieval, legal order.
 */
export class ContextAggregator {
  private readonly retrieval: RetrievalService;

  private readonly legal: LegalSearchBackend;

  private readonly cache: KeyValueCache;

  private readonly resilience: Resilience;

  private readonly ttls: CacheTtls;

  private readonly legalSettings: RuntimeConfig["legal"];

  constructor(input: {
    retrieval: RetrievalService;
    legal: LegalSearchBackend;
    cache: KeyValueCache;
    resilience: Resilience;
    ttls: CacheTtls;
    legalSettings: RuntimeConfig["legal"];
  }) {
    this.retrieval = input.retrieval;
    this.legal = input.legal;
    this.cache = input.cache;
    this.resilience = input.resilience;
    this.ttls = input.ttls;
    this.legalSettings = input.legalSettings;
  }

  async collect(input: AggregateInput): Promise<AggregateResult> {
    const branches: Array<[FragmentLabel, () => Promise<ContextFragment | null>]> = [
      ["document_summary", async () => this.summaryFragment(input.documents)],
      ["retrieval", () => this.retrievalFragment(input)],
      ["legal_search", () => this.legalFragment(input)],
    ];

    const settled = await Promise.allSettled(branches.map(([, run]) => run()));

    const fragments: ContextFragment[] = [];
    const errors: string[] = [];
    settled.forEach((outcome, index) => {
      const label = branches[index][0];
      if (outcome.status === "fulfilled") {
        if (outcome.value) fragments.push(outcome.value);
        return;
      }
      const message = errorMessage(outcome.reason);
      log.warn("context fragment failed", { label, error: message });
      errors.push(`${label}: ${message}`);
    });

    return { fragments, errors };
  }

  private summaryFragment(documents: StoredDocument[] | null): ContextFragment | null {
    if (!documents || documents.length === 0) return null;
    return { label: "document_summary", text: formatDocumentSummary(documents), truncated: false };
  }

  private async retrievalFragment(input: AggregateInput): Promise<ContextFragment | null> {
    const { classification } = input;
    if (!input.documents || input.documents.length === 0 || !classification.useRetrieval) return null;

    if (classification.intent === "list_documents") {
      return this.documentPreviews(input.documents, input.signal);
    }
    if (classification.intent === "document_sweep") return null;

    const context = await this.retrieval.getContext(input.query, input.topK, input.signal);
    if (!context.text) return null;
    return { label: "retrieval", text: `${HEADERS.retrieval}\n${context.text}`, truncated: context.truncated };
  }

  private async documentPreviews(documents: StoredDocument[], signal?: AbortSignal): Promise<ContextFragment> {
    const settled = await Promise.allSettled(
      documents.map((document) => this.retrieval.getDocumentChunks(document.name, signal)),
    );
    signal?.throwIfAborted();

    const lines: string[] = [HEADERS.retrieval];
    settled.forEach((outcome, index) => {
      const document = documents[index];
      lines.push(`${index + 1}. ${document.name} (${document.type})`);
      if (outcome.status === "rejected") {
        log.warn("document preview failed", { name: document.name, error: errorMessage(outcome.reason) });
        return;
      }
      if (outcome.value.length > 0) {
        lines.push(`   ${preview(outcome.value[0].text, BUDGETS.documentPreviewChars)}`);
      }
    });
    return { label: "retrieval", text: lines.join("\n"), truncated: false };
  }

  private async legalFragment(input: AggregateInput): Promise<ContextFragment | null> {
    if (!input.classification.useLegal) return null;

    const key = cacheKey(CACHE_PREFIX.legalContext, {
      query: input.query,
      caseNumber: input.caseNumber,
      instance: this.legalSettings.instance,
      limit: this.legalSettings.searchLimit,
    });
    const cached = await this.cache.getJson<ContextFragment>(key);
    if (cached) return cached;

    const fragment = input.caseNumber
      ? await this.caseFragment(input.caseNumber, wantsFullText(input.query), input.signal)
      : await this.searchFragment(input.query, input.signal);

    if (fragment) await this.cache.setJson(key, fragment, this.ttls.legalContextSec);
    return fragment;
  }

  private async caseFragment(caseNumber: string, fullText: boolean, signal?: AbortSignal): Promise<ContextFragment | null> {
    const details = await this.resilience.call(
      LEGAL_RESOURCE,
      (inner) => this.legal.getCaseDetails({ caseNumber }, inner),
      { signal },
    );
    if (!details) return null;

    let text = `${HEADERS.legal_search}\n${formatCaseDetails(caseNumber, details)}`;
    let truncated = false;
    const docId = details.docId;
    if (fullText && docId) {
      const body = await this.resilience.call(LEGAL_RESOURCE, (inner) => this.legal.getCaseFullText(docId, inner), {
        signal,
      });
      if (body) {
        const capped = truncate(body, BUDGETS.fullCaseTextChars);
        text += `\n\nПовний текст рішення:\n${capped.text}`;
        truncated = capped.truncated;
      }
    }
    return { label: "legal_search", text, truncated };
  }

  private async searchFragment(query: string, signal?: AbortSignal): Promise<ContextFragment | null> {
    const cases = await this.resilience.call(
      LEGAL_RESOURCE,
      (inner) =>
        this.legal.searchCases(
          query,
          { instance: this.legalSettings.instance, limit: this.legalSettings.searchLimit },
          inner,
        ),
      { signal },
    );
    if (cases.length === 0) return null;

    const lines = [HEADERS.legal_search];
    for (const [index, item] of cases.slice(0, this.legalSettings.previewCount).entries()) {
      const number = item.caseNumber ? ` (справа № ${item.caseNumber})` : "";
      lines.push(`${index + 1}. ${item.title}${number}`);
      if (item.description) {
        lines.push(`   ${preview(item.description, BUDGETS.legalPreviewChars)}`);
      }
    }
    return { label: "legal_search", text: lines.join("\n"), truncated: false };
  }
}
