import assert from "node:assert/strict";
import test from "node:test";
import { SharedCache } from "@/lib/cache/shared-cache";
import { RetrievalService } from "@/lib/retrieval/retrieval-service";
import { ContextAggregator } from "@/lib/router/aggregator";
import { TRUNCATION_MARKER } from "@/lib/router/budgets";
import type { Classification } from "@/lib/router/types";
import { loadRuntimeConfig } from "@/lib/runtime-config";
import { FakeLegalBackend, InMemoryRetrievalBackend, testResilience } from "@/lib/testing/fakes";

function setup() {
  const config = loadRuntimeConfig({});
  const cache = new SharedCache({ restUrl: "", restToken: "" });
  const resilience = testResilience();
  const store = new InMemoryRetrievalBackend([
    { name: "lease.pdf", type: "pdf", chunks: ["Орендна плата становить 5000 грн на місяць."] },
    { name: "act.docx", type: "docx", chunks: ["Акт приймання-передачі приміщення."] },
  ]);
  const legal = new FakeLegalBackend();
  const retrieval = new RetrievalService({ backend: store, cache, resilience, ttls: config.cacheTtls });
  const aggregator = new ContextAggregator({
    retrieval,
    legal,
    cache,
    resilience,
    ttls: config.cacheTtls,
    legalSettings: config.legal,
  });
  return { store, legal, retrieval, aggregator };
}

const general = (flags: Partial<Classification>): Classification => ({
  useRetrieval: true,
  useLegal: true,
  intent: "general",
  hasCaseNumber: false,
  ...flags,
});

test("the document summary is collected even when classification disables every source", async () => {
  const { store, retrieval, aggregator } = setup();

  const result = await aggregator.collect({
    query: "скільки документів я завантажив?",
    classification: general({ useRetrieval: false, useLegal: false }),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });

  assert.deepEqual(result.errors, []);
  assert.deepEqual(result.fragments, [
    {
      label: "document_summary",
      text: [
        "=== Завантажені документи ===",
        "Усього документів: 2",
        "1. lease.pdf (pdf, фрагментів: 1)",
        "2. act.docx (docx, фрагментів: 1)",
      ].join("\n"),
      truncated: false,
    },
  ]);
  assert.deepEqual(store.calls, ["list"]);
});

test("a failing branch is recorded without dropping the others, and order is fixed", async () => {
  const { store, legal, retrieval, aggregator } = setup();
  store.failSearch = new Error("qdrant down");
  legal.cases = [
    { title: "Про стягнення боргу", caseNumber: "1/2/3", description: "x".repeat(250) },
    { title: "B" },
    { title: "C" },
    { title: "D" },
  ];

  const result = await aggregator.collect({
    query: "оренда",
    classification: general({}),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });

  assert.deepEqual(result.errors, ["retrieval: qdrant down"]);
  assert.deepEqual(
    result.fragments.map((fragment) => fragment.label),
    ["document_summary", "legal_search"],
  );
  assert.equal(
    result.fragments[1].text,
    `=== Судова практика ===\n1. Про стягнення боргу (справа № 1/2/3)\n   ${"x".repeat(200)}...\n2. B\n3. C`,
  );
  assert.deepEqual(legal.calls, ["search:оренда:3:5"]);
});

test("retrieval context is labelled and skipped when no documents exist", async () => {
  const { aggregator, retrieval } = setup();

  const withDocuments = await aggregator.collect({
    query: "орендна плата",
    classification: general({ useLegal: false }),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });
  assert.equal(
    withDocuments.fragments[1].text,
    "=== Контекст з документів ===\n[Документ 1]\nОрендна плата становить 5000 грн на місяць.\n",
  );

  const empty = await aggregator.collect({
    query: "орендна плата",
    classification: general({ useLegal: false }),
    caseNumber: null,
    documents: [],
    topK: 5,
  });
  assert.deepEqual(empty.fragments, []);
});

test("a case number fetches details and a capped full text, then serves it from cache", async () => {
  const { legal, aggregator } = setup();
  legal.details = { title: "Постанова", docId: "42", caseNumber: "123/456/78", court: "Верховний Суд" };
  legal.fullText = "y".repeat(95_010);
  const input = {
    query: "повний текст 123/456/78 та висновки",
    classification: general({ useRetrieval: false, hasCaseNumber: true }),
    caseNumber: "123/456/78",
    documents: [],
    topK: 5,
  };

  const first = await aggregator.collect(input);
  const second = await aggregator.collect(input);

  const fragment = first.fragments[0];
  assert.equal(fragment.label, "legal_search");
  assert.equal(fragment.truncated, true);
  assert.ok(fragment.text.startsWith("=== Судова практика ===\nСправа № 123/456/78\nПостанова\nСуд: Верховний Суд\n\nПовний текст рішення:\n"));
  assert.ok(fragment.text.endsWith(`${"y".repeat(10)}${TRUNCATION_MARKER}`));
  assert.deepEqual(second.fragments, first.fragments);
  assert.deepEqual(legal.calls, ["details:123/456/78", "fulltext:42"]);
});

test("list_documents replaces semantic search with a preview of every document", async () => {
  const { store, retrieval, aggregator } = setup();

  const result = await aggregator.collect({
    query: "список документів",
    classification: general({ intent: "list_documents", useLegal: false }),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });

  assert.equal(
    result.fragments[1].text,
    [
      "=== Контекст з документів ===",
      "1. lease.pdf (pdf)",
      "   Орендна плата становить 5000 грн на місяць.",
      "2. act.docx (docx)",
      "   Акт приймання-передачі приміщення.",
    ].join("\n"),
  );
  assert.deepEqual(store.calls, ["list", "chunks:lease.pdf", "chunks:act.docx"]);
});

test("list_documents previews respect a disabled retrieval flag", async () => {
  const { store, retrieval, aggregator } = setup();

  const result = await aggregator.collect({
    query: "список документів",
    classification: general({ intent: "list_documents", useRetrieval: false, useLegal: false }),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });

  assert.deepEqual(
    result.fragments.map((fragment) => fragment.label),
    ["document_summary"],
  );
  assert.deepEqual(store.calls, ["list"]);
});

test("one unreadable document keeps its line and the other previews", async () => {
  const { store, retrieval, aggregator } = setup();
  store.failChunks.add("lease.pdf");

  const result = await aggregator.collect({
    query: "список документів",
    classification: general({ intent: "list_documents", useLegal: false }),
    caseNumber: null,
    documents: await retrieval.listDocuments(),
    topK: 5,
  });

  assert.deepEqual(result.errors, []);
  assert.equal(
    result.fragments[1].text,
    [
      "=== Контекст з документів ===",
      "1. lease.pdf (pdf)",
      "2. act.docx (docx)",
      "   Акт приймання-передачі приміщення.",
    ].join("\n"),
  );
});
