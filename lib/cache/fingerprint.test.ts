import assert from "node:assert/strict";
import test from "node:test";
import { cacheKey, CACHE_PREFIX, canonicalJson, fingerprint, normalizeQuery } from "@/lib/cache/fingerprint";

test("normalizeQuery lower-cases and collapses whitespace", () => {
  assert.equal(normalizeQuery("  Show   ME\tcase  "), "show me case");
});

test("canonicalJson sorts keys at every depth", () => {
  assert.equal(canonicalJson({ b: 1, a: { d: [true, null], c: "x" } }), '{"a":{"c":"x","d":[true,null]},"b":1}');
});

test("fingerprint ignores key order and query spacing but not other inputs", () => {
  const first = fingerprint({ query: "Case  123/456/78", topK: 5 });
  const second = fingerprint({ topK: 5, query: "case 123/456/78 " });
  const third = fingerprint({ query: "case 123/456/78", topK: 6 });

  assert.equal(first, second);
  assert.notEqual(first, third);
  assert.match(first, /^[0-9a-f]{32}$/);
});

test("retrieval keys share one invalidation prefix", () => {
  const key = cacheKey(CACHE_PREFIX.retrievalContext, { query: "q", topK: 5 });

  assert.ok(key.startsWith("rag:context:"));
  assert.ok(CACHE_PREFIX.retrievalSearch.startsWith(CACHE_PREFIX.retrievalRoot));
  assert.ok(CACHE_PREFIX.documentInventory.startsWith(CACHE_PREFIX.retrievalRoot));
  assert.equal(CACHE_PREFIX.legalContext.startsWith(CACHE_PREFIX.retrievalRoot), false);
});
