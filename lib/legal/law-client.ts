import { isRecord, requestJson } from "@/lib/http/request-json";
import type { CaseDetails, CaseLookup, LegalCase, LegalSearchBackend } from "@/lib/legal/types";

export type LawClientConfig = {
  baseUrl: string;
  apiKey?: string;
};

const DEFAULT_BASE_URL = "http://localhost:3000";

function readString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function parseCase(value: unknown): LegalCase | null {
  if (!isRecord(value)) return null;
  const docId = readString(value, "docId", "doc_id", "id");
  const caseNumber = readString(value, "caseNumber", "case_number", "cause_num");
  const title = readString(value, "title", "name") ?? (caseNumber ? `Справа № ${caseNumber}` : undefined);
  if (!title) return null;

  return {
    title,
    description: readString(value, "description", "snippet", "text"),
    docId,
    caseNumber,
    court: readString(value, "court", "court_name"),
    date: readString(value, "date", "adjudication_date"),
  };
}

function caseRows(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return [];
  for (const key of ["cases", "results", "items", "data"]) {
    const rows = payload[key];
    if (Array.isArray(rows)) return rows;
  }
  return [];
}

/**
 * HTTP client for the court-decision search server. A 404 on a lookup is a
 * normal "not found" and resolves to `null`.
 */
export class LawClient implements LegalSearchBackend {
  private readonly baseUrl: string;

  private readonly apiKey: string;

  constructor(config?: Partial<LawClientConfig>) {
    const baseUrl = config?.baseUrl?.trim() || process.env.LAW_SERVER_URL?.trim() || DEFAULT_BASE_URL;
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.apiKey = config?.apiKey?.trim() ?? process.env.LAW_API_KEY?.trim() ?? "";
  }

  private async post(tool: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const response = await requestJson({
      url: new URL(`mcp/zakononline/${tool}`, this.baseUrl),
      headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
      body,
      signal,
      endpoint: `law:${tool}`,
      allowNotFound: true,
    });
    return response.payload;
  }

  async searchCases(
    query: string,
    input: { instance: string; limit: number },
    signal?: AbortSignal,
  ): Promise<LegalCase[]> {
    const payload = await this.post("search_cases", { query, instance: input.instance, limit: input.limit }, signal);
    const out: LegalCase[] = [];
    for (const row of caseRows(payload)) {
      const parsed = parseCase(row);
      if (parsed) out.push(parsed);
    }
    return out;
  }

  async getCaseDetails(lookup: CaseLookup, signal?: AbortSignal): Promise<CaseDetails | null> {
    const body = lookup.caseNumber ? { caseNumber: lookup.caseNumber } : { docId: lookup.docId };
    const payload = await this.post("get_case_details", body, signal);
    const record = isRecord(payload) && isRecord(payload.case) ? payload.case : payload;
    const parsed = parseCase(record);
    if (!parsed || !isRecord(record)) return null;
    return {
      ...parsed,
      summary: readString(record, "summary", "resolution", "judgment"),
    };
  }

  async getCaseFullText(docId: string, signal?: AbortSignal): Promise<string | null> {
    const payload = await this.post("get_case_full_text", { docId }, signal);
    if (typeof payload === "string") return payload.trim() || null;
    if (!isRecord(payload)) return null;
    return readString(payload, "fullText", "full_text", "text") ?? null;
  }
}
