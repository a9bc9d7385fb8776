import type { GenerationUsage } from "@/lib/llm/types";
import type { GenerationProvider } from "@/lib/runtime-config";

export const QUERY_INTENTS = [
  "general",
  "list_documents",
  "delete_all",
  "delete_one",
  "full_text",
  "document_sweep",
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export type Classification = {
  useRetrieval: boolean;
  useLegal: boolean;
  intent: QueryIntent;
  hasCaseNumber: boolean;
  /** 1-based position in the document inventory, when the query names one. */
  documentNumber?: number;
};

export type ClassificationSource = "llm" | "rules" | "cache";

export type FragmentLabel = "document_summary" | "retrieval" | "legal_search";

export type ContextFragment = {
  label: FragmentLabel;
  text: string;
  truncated: boolean;
};

export type AnswerSource = "documents" | "RAG" | "MCP_Law";

export type AnswerOptions = {
  provider?: GenerationProvider;
  model?: string;
  useRetrieval?: boolean;
  useLegal?: boolean;
  topK?: number;
  signal?: AbortSignal;
};

export type AnswerMetadata = {
  usedRetrieval: boolean;
  usedLegal: boolean;
  intent: QueryIntent;
  classificationSource: ClassificationSource;
  contextCount: number;
  errors: string[];
  cached: boolean;
  caseNumber?: string;
  deletedCount?: number;
  sweptDocuments?: string[];
};

export type RouterAnswer = {
  answer: string;
  sources: AnswerSource[];
  model?: string;
  usage?: GenerationUsage;
  error?: string;
  metadata: AnswerMetadata;
};
