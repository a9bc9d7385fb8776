import assert from "node:assert/strict";
import test from "node:test";
import { CACHE_PREFIX, cacheKey } from "@/lib/cache/fingerprint";
import { SharedCache } from "@/lib/cache/shared-cache";
import { RetrievalService } from "@/lib/retrieval/retrieval-service";
import { loadRuntimeConfig } from "@/lib/runtime-config";
import { InMemoryRetrievalBackend, testResilience } from "@/lib/testing/fakes";

function setup() {
  const backend = new InMemoryRetrievalBackend([
    { name: "a.pdf", type: "pdf", chunks: ["Орендна плата становить 5000 грн."] },
    { name: "b.docx", type: "docx", chunks: ["Строк оренди два роки."] },
  ]);
  const cache = new SharedCache({ restUrl: "", restToken: "" });
  const service = new RetrievalService({
    backend,
    cache,
    resilience: testResilience(),
    ttls: loadRuntimeConfig({}).cacheTtls,
  });
  return { backend, cache, service };
}

test("getContext formats hits and serves repeats from cache", async () => {
  const { backend, service } = setup();

  const first = await service.getContext("орендна плата", 5);
  const second = await service.getContext("  Орендна   ПЛАТА ", 5);

  assert.deepEqual(first, {
    text: "[Документ 1]\nОрендна плата становить 5000 грн.\n",
    truncated: false,
    hitCount: 1,
  });
  assert.deepEqual(second, first);
  assert.deepEqual(backend.calls, ["search:орендна плата"]);
});

test("deleteDocument invalidates retrieval context written before it", async () => {
  const { backend, cache, service } = setup();
  await service.getContext("оренда", 5);
  await service.listDocuments();
  const contextKey = cacheKey(CACHE_PREFIX.retrievalContext, { query: "оренда", topK: 5 });
  assert.notEqual(await cache.getString(contextKey), null);

  assert.equal(await service.deleteDocument("a.pdf"), true);

  assert.equal(await cache.getString(contextKey), null);
  assert.equal(await cache.getString(CACHE_PREFIX.documentInventory), null);
  assert.deepEqual(
    (await service.listDocuments()).map((document) => document.name),
    ["b.docx"],
  );
  assert.equal(backend.calls.filter((call) => call === "list").length, 2);
});

test("deleting an unknown document leaves the cache alone", async () => {
  const { cache, service } = setup();
  await service.listDocuments();

  assert.equal(await service.deleteDocument("missing.pdf"), false);
  assert.notEqual(await cache.getString(CACHE_PREFIX.documentInventory), null);
});

test("addDocument chunks text, infers the type and refreshes the inventory", async () => {
  const { backend, service } = setup();
  await service.listDocuments();

  const added = await service.addDocument("c.txt", "Перше речення. Друге речення.");

  assert.equal(added, 1);
  assert.deepEqual(backend.documents.get("c.txt"), { type: "text", chunks: ["Перше речення. Друге речення."] });
  assert.deepEqual(
    (await service.listDocuments()).map((document) => [document.name, document.chunkCount]),
    [
      ["a.pdf", 1],
      ["b.docx", 1],
      ["c.txt", 1],
    ],
  );
  assert.equal(await service.addDocument("blank.txt", "   "), 0);
});
