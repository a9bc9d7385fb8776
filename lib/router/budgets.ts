/** Character budgets for everything merged into a prompt. */
export const BUDGETS = {
  retrievalContextChars: 5_000,
  fullCaseTextChars: 95_000,
  sweepDocumentChars: 30_000,
  legalPreviewChars: 200,
  documentPreviewChars: 300,
} as const;

export const TRUNCATION_MARKER = "\n[...текст скорочено...]";

export type Truncated = {
  text: string;
  truncated: boolean;
};

/** Cuts `text` to exactly `budget` chars and appends the marker; shorter text passes through. */
export function truncate(text: string, budget: number): Truncated {
  if (text.length <= budget) return { text, truncated: false };
  return { text: `${text.slice(0, budget)}${TRUNCATION_MARKER}`, truncated: true };
}

/** Inline preview used in lists, with a plain ellipsis. */
export function preview(text: string, budget: number): string {
  const compact = text.replace(/\s+/g, " ").trim();
  return compact.length <= budget ? compact : `${compact.slice(0, budget)}...`;
}
