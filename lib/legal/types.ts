export type LegalCase = {
  title: string;
  description?: string;
  docId?: string;
  caseNumber?: string;
  court?: string;
  date?: string;
};

export type CaseDetails = LegalCase & {
  /** Judgment or resolution summary when the server returns one. */
  summary?: string;
};

export type CaseLookup = { caseNumber: string; docId?: never } | { docId: string; caseNumber?: never };

/** Court-decision search. `null` means not found; transport failures throw. */
export type LegalSearchBackend = {
  searchCases(query: string, input: { instance: string; limit: number }, signal?: AbortSignal): Promise<LegalCase[]>;
  getCaseDetails(lookup: CaseLookup, signal?: AbortSignal): Promise<CaseDetails | null>;
  getCaseFullText(docId: string, signal?: AbortSignal): Promise<string | null>;
};
