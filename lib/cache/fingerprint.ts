import { createHash } from "crypto";

export const CACHE_PREFIX = {
  classification: "classify:",
  caseNumber: "casenum:",
  retrievalRoot: "rag:",
  retrievalSearch: "rag:search:",
  retrievalContext: "rag:context:",
  documentInventory: "rag:documents",
  legalContext: "legal:context:",
  answer: "llm:answer:",
} as const;

type CanonicalValue = string | number | boolean | null | undefined | CanonicalValue[] | { [key: string]: CanonicalValue };

export function normalizeQuery(query: string): string {
  return query.toLowerCase().replace(/\s+/g, " ").trim();
}

/** JSON with object keys sorted, so equal payloads serialize identically. */
export function canonicalJson(value: CanonicalValue): string {
  if (value === undefined) return "null";
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(",")}}`;
}

export function fingerprint(payload: { [key: string]: CanonicalValue }): string {
  const normalized = typeof payload.query === "string" ? { ...payload, query: normalizeQuery(payload.query) } : payload;
  return createHash("sha256").update(canonicalJson(normalized)).digest("hex").slice(0, 32);
}

export function cacheKey(prefix: string, payload: { [key: string]: CanonicalValue }): string {
  return `${prefix}${fingerprint(payload)}`;
}
