import phrases from "@/lib/router/phrases.json";
import type { Classification, QueryIntent } from "@/lib/router/types";

type PhraseGroup = keyof typeof phrases;

export const CASE_NUMBER_PATTERN = /\d+\/\d+\/\d+/;

const EXACT_CASE_NUMBER = /^\d+\/\d+\/\d+$/;
const DOCUMENT_NUMBER = /(?:документ|document|файл|file)\p{L}*\s*(?:№|#|номер|number|no\.?)?\s*(\d{1,3})(?![\d/])/iu;
const FILE_NAME = /[\p{L}\p{N}_-]+\.[a-z0-9]{2,4}\b/iu;

function normalize(query: string): string {
  return query.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Padded so list entries with a trailing space ("all ") also match at the end. */
function hasPhrase(text: string, group: PhraseGroup): boolean {
  const padded = ` ${text} `;
  return phrases[group].some((phrase) => padded.includes(phrase));
}

export function findCaseNumber(query: string): string | null {
  return CASE_NUMBER_PATTERN.exec(query)?.[0] ?? null;
}

export function isCaseNumber(value: string): boolean {
  return EXACT_CASE_NUMBER.test(value);
}

export function readDocumentNumber(query: string): number | undefined {
  const match = DOCUMENT_NUMBER.exec(query);
  if (!match) return undefined;
  const value = Number(match[1]);
  return value >= 1 ? value : undefined;
}

export function wantsFullText(query: string): boolean {
  return hasPhrase(normalize(query), "fullText");
}

function detectIntent(text: string, input: { hasCaseNumber: boolean; documentNumber?: number; documentTerms: boolean }): QueryIntent {
  const deleting = hasPhrase(text, "delete");
  if (deleting && (input.documentTerms || input.documentNumber !== undefined || FILE_NAME.test(text))) {
    return hasPhrase(text, "all") ? "delete_all" : "delete_one";
  }
  if (input.hasCaseNumber && hasPhrase(text, "fullText")) return "full_text";
  if (hasPhrase(text, "list")) return "list_documents";
  if ((hasPhrase(text, "sweep") && input.documentTerms) || input.documentNumber !== undefined) {
    return "document_sweep";
  }
  return "general";
}

/**
 * Keyword classification used whenever the LLM classifier is unavailable or
 * returns something unusable. Precedence for source flags: a case number,
 * then an explicit "my documents" phrase, then legal terms, then both.
 */
export function classifyByRules(query: string): Classification {
  const text = normalize(query);
  if (!text) {
    return { useRetrieval: true, useLegal: true, intent: "general", hasCaseNumber: false };
  }

  const hasCaseNumber = CASE_NUMBER_PATTERN.test(text);
  const documentNumber = readDocumentNumber(text);
  const mine = hasPhrase(text, "myDocuments");
  const documentTerms = mine || hasPhrase(text, "document");
  const intent = detectIntent(text, { hasCaseNumber, documentNumber, documentTerms });
  const base = { intent, hasCaseNumber, ...(documentNumber === undefined ? {} : { documentNumber }) };

  switch (intent) {
    case "delete_all":
    case "delete_one":
    case "list_documents":
    case "document_sweep":
      return { ...base, useRetrieval: true, useLegal: false };
    case "full_text":
      return { ...base, useRetrieval: false, useLegal: true };
    case "general":
      break;
  }

  if (hasCaseNumber) return { ...base, useRetrieval: false, useLegal: true };
  if (mine) return { ...base, useRetrieval: true, useLegal: false };
  if (hasPhrase(text, "legal")) return { ...base, useRetrieval: documentTerms, useLegal: true };
  return { ...base, useRetrieval: true, useLegal: true };
}
