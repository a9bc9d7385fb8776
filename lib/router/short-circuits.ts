import type { LegalSearchBackend } from "@/lib/legal/types";
import type { GenerationBackend, GenerationUsage } from "@/lib/llm/types";
import { createLogger, errorMessage } from "@/lib/logger";
import type { Resilience } from "@/lib/resilience/resilience";
import type { RetrievalService } from "@/lib/retrieval/retrieval-service";
import type { StoredDocument } from "@/lib/retrieval/types";
import { LEGAL_RESOURCE } from "@/lib/router/aggregator";
import { BUDGETS, truncate } from "@/lib/router/budgets";

/** Reply the sweep prompt asks for when a document does not hold the answer. */
export const NOT_FOUND_SENTINEL = "NOT_FOUND";

const SWEEP_PROMPT = `Ти юридичний асистент. Відповідай на питання лише за текстом наведеного документа.
Якщо в документі немає відповіді, відповідай рівно одним словом: ${NOT_FOUND_SENTINEL}`;

export type ShortCircuitResult = {
  answer: string;
  errors: string[];
  model?: string;
  usage?: GenerationUsage;
  deletedCount?: number;
  sweptDocuments?: string[];
};

const log = createLogger("short-circuits");

export function isNegativeAnswer(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  if (!normalized) return true;
  if (normalized.includes(NOT_FOUND_SENTINEL.toLowerCase())) return true;
  return /^(не знайдено|не найдено|not found|відповіді немає|ответа нет)/.test(normalized);
}

function addUsage(total: GenerationUsage | undefined, next: GenerationUsage | undefined): GenerationUsage | undefined {
  if (!next) return total;
  if (!total) return { ...next };
  return {
    inputTokens: total.inputTokens + next.inputTokens,
    outputTokens: total.outputTokens + next.outputTokens,
    totalTokens: total.totalTokens + next.totalTokens,
  };
}

function numberedList(documents: StoredDocument[]): string {
  return documents.map((document, index) => `${index + 1}. ${document.name}`).join("\n");
}

function nameTokens(name: string): string[] {
  const stem = name.toLowerCase().replace(/\.[a-z0-9]{2,4}$/, "");
  return stem.split(/[^\p{L}\p{N}]+/u).filter((token) => token.length >= 3);
}

/** Stored documents whose file name best matches the query; several means ambiguous. */
export function matchDocumentsByName(query: string, documents: StoredDocument[]): StoredDocument[] {
  const text = query.toLowerCase();
  let best = 0;
  let matches: StoredDocument[] = [];

  for (const document of documents) {
    const score = text.includes(document.name.toLowerCase())
      ? 100
      : nameTokens(document.name).filter((token) => text.includes(token)).length;
    if (score === 0 || score < best) continue;
    if (score > best) {
      best = score;
      matches = [];
    }
    matches.push(document);
  }
  return matches;
}

/**
 * Intents answered without the context aggregator: full case text, per-document
 * sweep and deletions.
 */
export class ShortCircuits {
  private readonly retrieval: RetrievalService;

  private readonly legal: LegalSearchBackend;

  private readonly resilience: Resilience;

  private readonly generation: { temperature: number; maxTokens: number };

  constructor(input: {
    retrieval: RetrievalService;
    legal: LegalSearchBackend;
    resilience: Resilience;
    generation: { temperature: number; maxTokens: number };
  }) {
    this.retrieval = input.retrieval;
    this.legal = input.legal;
    this.resilience = input.resilience;
    this.generation = input.generation;
  }

  /** Decision text returned as is; no generation round trip. */
  async fullText(caseNumber: string, signal?: AbortSignal): Promise<ShortCircuitResult> {
    const details = await this.resilience.call(
      LEGAL_RESOURCE,
      (inner) => this.legal.getCaseDetails({ caseNumber }, inner),
      { signal },
    );
    if (!details) {
      return { answer: `Справу № ${caseNumber} не знайдено.`, errors: [] };
    }

    const docId = details.docId;
    if (!docId) {
      return { answer: `Повний текст рішення у справі № ${caseNumber} недоступний.`, errors: [] };
    }
    const text = await this.resilience.call(LEGAL_RESOURCE, (inner) => this.legal.getCaseFullText(docId, inner), {
      signal,
    });
    if (!text) {
      return { answer: `Повний текст рішення у справі № ${caseNumber} недоступний.`, errors: [] };
    }
    return { answer: `Справа № ${caseNumber}\n${details.title}\n\n${text}`, errors: [] };
  }

  /**
   * Asks each document in turn and stops at the first answer that is not the
   * sentinel. Sequential on purpose: later documents are never queried once
   * one answers.
   */
  async sweep(input: {
    query: string;
    documents: StoredDocument[];
    documentNumber?: number;
    backend: GenerationBackend;
    signal?: AbortSignal;
  }): Promise<ShortCircuitResult> {
    const { documentNumber } = input;
    let targets = input.documents;
    if (documentNumber !== undefined) {
      const target = input.documents[documentNumber - 1];
      if (!target) {
        return {
          answer: `Документ № ${documentNumber} не знайдено. Усього документів: ${input.documents.length}.`,
          errors: [],
          sweptDocuments: [],
        };
      }
      targets = [target];
    }

    const swept: string[] = [];
    const errors: string[] = [];
    let usage: GenerationUsage | undefined;
    let model: string | undefined;

    for (const document of targets) {
      swept.push(document.name);
      try {
        const raw = await this.retrieval.getDocumentText(document.name, input.signal);
        const text = truncate(raw, BUDGETS.sweepDocumentChars);
        const result = await this.resilience.call(
          "generation",
          (inner) =>
            input.backend.generate({
              messages: [
                { role: "system", content: SWEEP_PROMPT },
                { role: "user", content: `Документ «${document.name}»:\n${text.text}\n\nПитання: ${input.query}` },
              ],
              temperature: this.generation.temperature,
              maxTokens: this.generation.maxTokens,
              signal: inner,
            }),
          { signal: input.signal },
        );
        usage = addUsage(usage, result.usage);
        model = result.model;
        if (!isNegativeAnswer(result.content)) {
          return {
            answer: `За документом «${document.name}»:\n${result.content.trim()}`,
            errors,
            model,
            usage,
            sweptDocuments: swept,
          };
        }
      } catch (error) {
        if (input.signal?.aborted) throw error;
        log.warn("sweep step failed", { document: document.name, error: errorMessage(error) });
        errors.push(`${document.name}: ${errorMessage(error)}`);
      }
    }

    return {
      answer: `Відповіді не знайдено в жодному з документів (перевірено: ${swept.length}).`,
      errors,
      model,
      usage,
      sweptDocuments: swept,
    };
  }

  async deleteAll(documents: StoredDocument[], signal?: AbortSignal): Promise<ShortCircuitResult> {
    if (documents.length === 0) {
      return { answer: "Немає завантажених документів.", errors: [], deletedCount: 0 };
    }

    let deleted = 0;
    const errors: string[] = [];
    for (const document of documents) {
      try {
        if (await this.retrieval.deleteDocument(document.name, signal)) deleted += 1;
      } catch (error) {
        if (signal?.aborted) throw error;
        errors.push(`${document.name}: ${errorMessage(error)}`);
      }
    }

    log.info("documents deleted", { deleted, total: documents.length, failed: errors.length });
    const lines = [`Видалено документів: ${deleted} з ${documents.length}.`];
    if (errors.length > 0) lines.push("Помилки:", ...errors.map((error) => `- ${error}`));
    return { answer: lines.join("\n"), errors, deletedCount: deleted };
  }

  /** Deletes the single document the query names; otherwise asks which one. */
  async deleteOne(input: {
    query: string;
    documents: StoredDocument[];
    documentNumber?: number;
    signal?: AbortSignal;
  }): Promise<ShortCircuitResult> {
    if (input.documents.length === 0) {
      return { answer: "Немає завантажених документів.", errors: [], deletedCount: 0 };
    }

    const matches =
      input.documentNumber !== undefined
        ? input.documents.slice(input.documentNumber - 1, input.documentNumber)
        : matchDocumentsByName(input.query, input.documents);

    if (matches.length !== 1) {
      return {
        answer: `Уточніть, який документ видалити:\n${numberedList(input.documents)}`,
        errors: [],
        deletedCount: 0,
      };
    }

    const [target] = matches;
    const deleted = await this.retrieval.deleteDocument(target.name, input.signal);
    return {
      answer: deleted ? `Документ «${target.name}» видалено.` : `Документ «${target.name}» не знайдено в сховищі.`,
      errors: [],
      deletedCount: deleted ? 1 : 0,
    };
  }
}
